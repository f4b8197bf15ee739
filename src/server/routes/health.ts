import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { z } from 'zod/v4';

import type { FastifyZodPlugin } from '../fastifyTypes.js';
import { LEADERBOARD_ROOM } from './games.js';

export const registerHealthRoutes: FastifyZodPlugin = async (fastify) => {
  const app = fastify.withTypeProvider<ZodTypeProvider>();

  app.get('/health', {
    schema: {
      response: {
        200: z.object({
          ok: z.literal(true),
          activeSessions: z.number().int().nonnegative()
        })
      }
    }
  }, async (_request, reply) => {
    return reply.send({ ok: true, activeSessions: fastify.deps.sessions.activeCount() });
  });

  // socket.io の接続数（順位表ルームの購読者と全体）
  app.get('/connections/status', {
    schema: {
      response: {
        200: z.object({
          leaderboardConnections: z.number().int().nonnegative(),
          totalConnections: z.number().int().nonnegative()
        })
      }
    }
  }, async (_request, reply) => {
    const { io } = fastify;
    return reply.send({
      leaderboardConnections: io.sockets.adapter.rooms.get(LEADERBOARD_ROOM)?.size ?? 0,
      totalConnections: io.engine.clientsCount
    });
  });
};
