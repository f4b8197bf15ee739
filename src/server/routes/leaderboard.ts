import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { z } from 'zod/v4';

import type { FastifyZodPlugin } from '../fastifyTypes.js';
import { domainErrorResponses, handleDomainError } from '../httpErrors.js';

const leaderboardEntrySchema = z.object({
  rank: z.number().int().positive(),
  userId: z.string(),
  username: z.string().nullable(),
  gamesPlayed: z.number().int().positive(),
  meanDeviationMs: z.number().nonnegative(),
  bestDeviationMs: z.number().int().nonnegative(),
  bestScore: z.number().int().nonnegative(),
  accuracy: z.number()
});

const leaderboardResponseSchema = z.object({
  entries: z.array(leaderboardEntrySchema),
  total: z.number().int().nonnegative()
});

export const registerLeaderboardRoutes: FastifyZodPlugin = async (fastify) => {
  const app = fastify.withTypeProvider<ZodTypeProvider>();
  const querySchema = z.object({
    limit: z.coerce.number().int().min(1).max(100).default(fastify.config.game.leaderboardTopCount),
    offset: z.coerce.number().int().min(0).default(0)
  });

  app.get('/leaderboard', {
    schema: {
      querystring: querySchema,
      response: {
        200: leaderboardResponseSchema,
        ...domainErrorResponses
      }
    }
  }, async (request, reply) => {
    const { leaderboard, store } = fastify.deps;
    try {
      const page = await leaderboard.rank(request.query.limit, request.query.offset);
      const usernames = await store.findUsernames(page.entries.map((entry) => entry.userId));
      return reply.send({
        entries: page.entries.map((entry) => ({
          ...entry,
          username: usernames.get(entry.userId) ?? null
        })),
        total: page.total
      });
    } catch (error) {
      const handled = handleDomainError(error);
      if (handled) {
        return reply.code(handled.status).send({ message: handled.message });
      }
      throw error;
    }
  });
};
