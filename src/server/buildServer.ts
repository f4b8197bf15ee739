import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import fastifyJwt from '@fastify/jwt';
import Fastify, { type FastifyBaseLogger, type FastifyReply, type FastifyRequest } from 'fastify';
import { serializerCompiler, validatorCompiler, type ZodTypeProvider } from 'fastify-type-provider-zod';
import { Server as SocketIOServer } from 'socket.io';

import type { ServerConfig } from './config.js';
import type { ServerDependencies } from './dependencies.js';
import { getJwtUser, normalizeJwtUser } from './auth/jwtUser.js';
import type { ClientToServerEvents, FastifyZodInstance, ServerToClientEvents } from './fastifyTypes.js';
import { registerAdminRoutes } from './routes/admin.js';
import { registerAnalyticsRoutes } from './routes/analytics.js';
import { registerAuthRoutes } from './routes/auth.js';
import { LEADERBOARD_ROOM, registerGameRoutes } from './routes/games.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerLeaderboardRoutes } from './routes/leaderboard.js';

// ルートのインスタンスへ直接 decorate する（register() 内だと子コンテキストに閉じる）
function decorateAuthenticate(fastify: FastifyZodInstance): void {
  fastify.decorate('authenticate', async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const payload = await request.jwtVerify();
      const normalized = normalizeJwtUser(payload);
      if (!normalized) {
        request.log.warn({
          msg: 'authenticate: jwt payload missing required fields',
          payloadKeys: typeof payload === 'object' ? Object.keys(payload) : undefined
        });
        await reply.code(401).send({ message: '認証に失敗しました。' });
        return reply;
      }
      request.user = normalized;
      request.log.debug({
        msg: 'authenticate: user verified',
        userId: normalized.userId,
        role: normalized.role
      });
    } catch (error) {
      request.log.warn({
        msg: 'authenticate: jwtVerify failed',
        cause: error instanceof Error ? error.message : error
      });
      await reply.code(401).send({ message: '認証に失敗しました。' });
      return reply;
    }
    return undefined;
  });
}

function decorateAuthorizeAdmin(fastify: FastifyZodInstance): void {
  fastify.decorate('authorizeAdmin', async (request: FastifyRequest, reply: FastifyReply) => {
    const authenticationResult = await fastify.authenticate(request, reply);
    if (authenticationResult) {
      return authenticationResult;
    }
    const user = getJwtUser(request);
    if (!user) {
      request.log.warn({ msg: 'authorizeAdmin: user missing after authenticate' });
      await reply.code(401).send({ message: '認証に失敗しました。' });
      return reply;
    }
    if (user.role !== 'admin') {
      request.log.warn({ msg: 'authorizeAdmin: role mismatch', role: user.role, userId: user.userId });
      await reply.code(403).send({ message: '管理者権限が必要です。' });
      return reply;
    }
    return undefined;
  });
}

export interface BuildServerOptions {
  config: ServerConfig;
  dependencies: ServerDependencies;
}

export async function buildServer({ config, dependencies }: BuildServerOptions): Promise<FastifyZodInstance> {
  const loggerInstance: FastifyBaseLogger = dependencies.logger;
  const fastify = Fastify({ loggerInstance }).withTypeProvider<ZodTypeProvider>();

  fastify.setValidatorCompiler(validatorCompiler);
  fastify.setSerializerCompiler(serializerCompiler);

  fastify.decorate('deps', dependencies);
  fastify.decorate('config', config);

  await fastify.register(cors, {
    origin: config.corsOrigins ?? true,
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With'],
    preflightContinue: false
  });
  await fastify.register(helmet, {
    contentSecurityPolicy: false
  });
  await fastify.register(fastifyJwt, {
    secret: config.jwtSecret,
    sign: {
      expiresIn: '15m'
    }
  });
  decorateAuthenticate(fastify);
  decorateAuthorizeAdmin(fastify);
  const io = new SocketIOServer<ClientToServerEvents, ServerToClientEvents>(fastify.server, {
    cors: {
      origin: config.socketCorsOrigins ?? config.corsOrigins ?? true
    }
  });

  fastify.decorate('io', io);

  io.on('connection', (socket) => {
    socket.on('leaderboard:join', () => {
      void socket.join(LEADERBOARD_ROOM);
      dependencies.leaderboard.rank(config.game.leaderboardTopCount, 0).then(
        (page) => {
          socket.emit('leaderboard:update', { top: page.entries, total: page.total, me: null });
        },
        (error: unknown) => {
          fastify.log.warn({
            msg: 'leaderboard snapshot failed',
            socketId: socket.id,
            cause: error instanceof Error ? error.message : error
          });
        }
      );
    });
    socket.on('leaderboard:leave', () => {
      void socket.leave(LEADERBOARD_ROOM);
    });
  });

  fastify.setErrorHandler((error, _request, reply) => {
    if (error.validation && error.validationContext === 'params') {
      const invalidUuid = error.validation.find((issue) => issue.keyword === 'invalid_format' && issue.params.format === 'uuid');
      if (invalidUuid) {
        const rawPath = invalidUuid.instancePath;
        const paramName = rawPath.startsWith('/') ? rawPath.slice(1) : rawPath;
        const label = paramName !== '' ? paramName : 'ID';
        return reply.status(400).send({ message: `${label} は UUID 形式で指定してください。` });
      }
    }
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      reply.log.error({ msg: 'unhandled error', cause: error.message });
    }
    return reply.status(statusCode).send({ message: error.message || '予期せぬエラーが発生しました。' });
  });

  await fastify.register(registerAuthRoutes, { prefix: '/api/v1' });
  await fastify.register(registerGameRoutes, { prefix: '/api/v1' });
  await fastify.register(registerLeaderboardRoutes, { prefix: '/api/v1' });
  await fastify.register(registerAnalyticsRoutes, { prefix: '/api/v1' });
  await fastify.register(registerAdminRoutes, { prefix: '/api/v1' });
  await fastify.register(registerHealthRoutes, { prefix: '/api/v1' });

  fastify.addHook('onClose', async () => {
    dependencies.sweeper.stop();
    await io.close();
    await dependencies.pool.end();
  });

  return fastify;
}
