import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { z } from 'zod/v4';

import type { FastifyZodPlugin } from '../fastifyTypes.js';

const sweepResponseSchema = z.object({
  expired: z.number().int().nonnegative(),
  skipped: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative()
});

export const registerAdminRoutes: FastifyZodPlugin = async (fastify) => {
  const app = fastify.withTypeProvider<ZodTypeProvider>();

  // 永続化済みの採点結果から順位表を作り直す
  app.post('/admin/leaderboard/refresh', {
    preHandler: fastify.authorizeAdmin,
    schema: {
      response: {
        200: z.object({ total: z.number().int().nonnegative() })
      }
    }
  }, async (request, reply) => {
    const { leaderboard } = fastify.deps;
    await leaderboard.refresh();
    const page = await leaderboard.rank(1, 0);
    request.log.info({ msg: 'leaderboard rebuilt', total: page.total });
    return reply.send({ total: page.total });
  });

  app.post('/admin/sessions/sweep', {
    preHandler: fastify.authorizeAdmin,
    schema: {
      response: {
        200: sweepResponseSchema
      }
    }
  }, async (_request, reply) => {
    const result = await fastify.deps.sweeper.runOnce();
    return reply.send(result);
  });
};
