import type { FastifyInstance } from 'fastify';
import type { LedgerService } from '../../modules/ledger/ledger.service.js';
import {
  callerHeaderSchema,
  depositCollateralSchema,
  positionParamsSchema,
  repaySchema,
  requestLoanSchema,
  userParamsSchema,
} from '../schemas.js';
import { outcomeToJson, positionToJson, statsToJson } from '../serialize.js';
import { validationFailed } from '../validation.js';

export async function positionRoutes(app: FastifyInstance, ledger: LedgerService): Promise<void> {
  app.post('/collateral/deposits', async (request, reply) => {
    const caller = callerHeaderSchema.safeParse(request.headers);
    if (!caller.success) return validationFailed(reply, caller.error);
    const parsed = depositCollateralSchema.safeParse(request.body);
    if (!parsed.success) return validationFailed(reply, parsed.error);

    await ledger.depositCollateral(caller.data['x-caller-id'], parsed.data.amount);
    return reply.status(201).send({ deposited: parsed.data.amount.toString() });
  });

  app.post('/positions', async (request, reply) => {
    const caller = callerHeaderSchema.safeParse(request.headers);
    if (!caller.success) return validationFailed(reply, caller.error);
    const parsed = requestLoanSchema.safeParse(request.body);
    if (!parsed.success) return validationFailed(reply, parsed.error);

    const { collateral, debt } = parsed.data;
    const id = await ledger.requestLoan(caller.data['x-caller-id'], collateral, debt);
    return reply.status(201).send(positionToJson(ledger.getPosition(id)));
  });

  app.get('/positions/:id', async (request, reply) => {
    const params = positionParamsSchema.safeParse(request.params);
    if (!params.success) return validationFailed(reply, params.error);

    return reply.send(positionToJson(ledger.getPosition(params.data.id)));
  });

  app.post('/positions/:id/repay', async (request, reply) => {
    const caller = callerHeaderSchema.safeParse(request.headers);
    if (!caller.success) return validationFailed(reply, caller.error);
    const params = positionParamsSchema.safeParse(request.params);
    if (!params.success) return validationFailed(reply, params.error);
    const parsed = repaySchema.safeParse(request.body);
    if (!parsed.success) return validationFailed(reply, parsed.error);

    await ledger.repay(caller.data['x-caller-id'], params.data.id, parsed.data.amount);
    return reply.send(positionToJson(ledger.getPosition(params.data.id)));
  });

  app.post('/positions/:id/liquidation-check', async (request, reply) => {
    const params = positionParamsSchema.safeParse(request.params);
    if (!params.success) return validationFailed(reply, params.error);

    const outcome = await ledger.checkLiquidation(params.data.id);
    return reply.send(outcomeToJson(outcome));
  });

  app.get('/users/:user/positions', async (request, reply) => {
    const params = userParamsSchema.safeParse(request.params);
    if (!params.success) return validationFailed(reply, params.error);

    const ids = ledger.getUserPositions(params.data.user);
    return reply.send({
      user: params.data.user,
      positions: ids.map((id) => positionToJson(ledger.getPosition(id))),
    });
  });

  app.get('/stats', async (_request, reply) => {
    return reply.send(statsToJson(ledger.getStats()));
  });
}
