import type { FastifyInstance } from 'fastify';
import type { OracleService } from '../../modules/oracle/oracle.service.js';
import { assetParamsSchema, callerHeaderSchema, setPriceSchema } from '../schemas.js';
import { validationFailed } from '../validation.js';

export async function oracleRoutes(app: FastifyInstance, oracle: OracleService): Promise<void> {
  app.put('/oracle/prices/:asset', async (request, reply) => {
    const caller = callerHeaderSchema.safeParse(request.headers);
    if (!caller.success) return validationFailed(reply, caller.error);
    const params = assetParamsSchema.safeParse(request.params);
    if (!params.success) return validationFailed(reply, params.error);
    const parsed = setPriceSchema.safeParse(request.body);
    if (!parsed.success) return validationFailed(reply, parsed.error);

    await oracle.setPrice(caller.data['x-caller-id'], params.data.asset, parsed.data.price);
    return reply.send({ asset: params.data.asset, price: parsed.data.price.toString() });
  });

  app.get('/oracle/prices/:asset', async (request, reply) => {
    const params = assetParamsSchema.safeParse(request.params);
    if (!params.success) return validationFailed(reply, params.error);

    const price = oracle.getPrice(params.data.asset);
    return reply.send({ asset: params.data.asset, price: price.toString() });
  });
}
