import type { FastifyInstance } from 'fastify';
import type { RiskParamsService } from '../../modules/risk-params/risk-params.service.js';
import { callerHeaderSchema, parameterValueSchema } from '../schemas.js';
import { riskParamsToJson } from '../serialize.js';
import { validationFailed } from '../validation.js';

type ParameterSetter = 'setMinimumRatio' | 'setLiquidationThreshold' | 'setFeeRate';

const PARAMETER_ROUTES: Array<{ path: string; setter: ParameterSetter }> = [
  { path: '/admin/risk/minimum-ratio', setter: 'setMinimumRatio' },
  { path: '/admin/risk/liquidation-threshold', setter: 'setLiquidationThreshold' },
  { path: '/admin/risk/fee-rate', setter: 'setFeeRate' },
];

export async function adminRoutes(app: FastifyInstance, riskParams: RiskParamsService): Promise<void> {
  app.post('/admin/initialize', async (request, reply) => {
    const caller = callerHeaderSchema.safeParse(request.headers);
    if (!caller.success) return validationFailed(reply, caller.error);

    await riskParams.initialize(caller.data['x-caller-id']);
    return reply.send({ initialized: true });
  });

  for (const { path, setter } of PARAMETER_ROUTES) {
    app.put(path, async (request, reply) => {
      const caller = callerHeaderSchema.safeParse(request.headers);
      if (!caller.success) return validationFailed(reply, caller.error);
      const parsed = parameterValueSchema.safeParse(request.body);
      if (!parsed.success) return validationFailed(reply, parsed.error);

      await riskParams[setter](caller.data['x-caller-id'], parsed.data.value);
      return reply.send(riskParamsToJson(riskParams.getRiskParameters()));
    });
  }

  app.get('/risk', async (_request, reply) => {
    return reply.send({
      initialized: riskParams.isInitialized(),
      ...riskParamsToJson(riskParams.getRiskParameters()),
    });
  });
}
