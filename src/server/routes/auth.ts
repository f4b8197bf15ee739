import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { z } from 'zod/v4';

import { ConflictError } from '../../domain/errors.js';
import type { UserRecord } from '../../services/gameStore.js';
import { ensureJwtUser, normalizeJwtUser } from '../auth/jwtUser.js';
import type { FastifyZodPlugin } from '../fastifyTypes.js';
import { messageResponseSchema } from '../httpErrors.js';

const userSchema = z.object({
  id: z.string().uuid(),
  username: z.string(),
  email: z.string().email(),
  role: z.enum(['user', 'admin'])
});

const authPayloadSchema = z.object({
  accessToken: z.string(),
  refreshToken: z.string(),
  user: userSchema
});

const signupBodySchema = z.object({
  email: z.string().email(),
  username: z.string().min(3).max(32),
  password: z.string().min(8).max(128)
});

const signinBodySchema = z.object({
  username: z.string().min(3).max(32),
  password: z.string().min(8).max(128)
});

const refreshBodySchema = z.object({
  refreshToken: z.string().min(10)
});

const signoutBodySchema = refreshBodySchema.partial();

function toUserResponse(user: UserRecord): z.infer<typeof userSchema> {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    role: user.role
  };
}

const INVALID_CREDENTIALS = 'ユーザー名またはパスワードが正しくありません。';

export const registerAuthRoutes: FastifyZodPlugin = async (fastify) => {
  const app = fastify.withTypeProvider<ZodTypeProvider>();

  app.post('/auth/signup', {
    schema: {
      body: signupBodySchema,
      response: {
        201: authPayloadSchema,
        409: messageResponseSchema
      }
    }
  }, async (request, reply) => {
    const body = request.body;
    const { store, auth } = fastify.deps;
    const [byEmail, byUsername] = await Promise.all([
      store.findUserByEmail(body.email),
      store.findUserByUsername(body.username)
    ]);
    if (byEmail || byUsername) {
      return reply.code(409).send({ message: '指定されたメールアドレスまたはユーザー名は既に使用されています。' });
    }
    const passwordHash = await auth.hashPassword(body.password);
    try {
      const user = await store.createUser({
        email: body.email,
        username: body.username,
        passwordHash
      });
      const accessToken = fastify.jwt.sign({ userId: user.id, role: user.role });
      const refresh = await auth.issueRefreshToken(user.id);
      request.log.info({ msg: 'user signed up', userId: user.id });
      return reply.code(201).send({
        accessToken,
        refreshToken: refresh.token,
        user: toUserResponse(user)
      });
    } catch (error: unknown) {
      if (error instanceof ConflictError) {
        return reply.code(409).send({ message: error.message });
      }
      throw error;
    }
  });

  app.post('/auth/signin', {
    schema: {
      body: signinBodySchema,
      response: {
        200: authPayloadSchema,
        401: messageResponseSchema
      }
    }
  }, async (request, reply) => {
    const body = request.body;
    const { store, auth } = fastify.deps;
    const user = await store.findUserByUsername(body.username);
    if (!user) {
      return reply.code(401).send({ message: INVALID_CREDENTIALS });
    }
    const valid = await auth.verifyPassword(body.password, user.passwordHash);
    if (!valid) {
      request.log.info({ msg: 'signin rejected', userId: user.id });
      return reply.code(401).send({ message: INVALID_CREDENTIALS });
    }
    const accessToken = fastify.jwt.sign({ userId: user.id, role: user.role });
    const refresh = await auth.issueRefreshToken(user.id);
    return reply.send({
      accessToken,
      refreshToken: refresh.token,
      user: toUserResponse(user)
    });
  });

  app.post('/auth/refresh', {
    schema: {
      body: refreshBodySchema,
      response: {
        200: authPayloadSchema,
        401: messageResponseSchema
      }
    }
  }, async (request, reply) => {
    const { store, auth } = fastify.deps;
    const rotation = await auth.rotateRefreshToken(request.body.refreshToken);
    if (!rotation) {
      return reply.code(401).send({ message: 'リフレッシュトークンが無効です。' });
    }
    const user = await store.findUserById(rotation.userId);
    if (!user) {
      await auth.revokeRefreshToken(rotation.newToken);
      return reply.code(401).send({ message: 'リフレッシュトークンが無効です。' });
    }
    const accessToken = fastify.jwt.sign({ userId: user.id, role: user.role });
    return reply.send({
      accessToken,
      refreshToken: rotation.newToken,
      user: toUserResponse(user)
    });
  });

  app.post('/auth/signout', {
    schema: {
      body: signoutBodySchema.optional(),
      response: {
        204: z.null()
      }
    }
  }, async (request, reply) => {
    const { auth } = fastify.deps;
    const refreshToken = request.body?.refreshToken;
    if (refreshToken) {
      await auth.revokeRefreshToken(refreshToken);
    } else if (request.headers.authorization) {
      try {
        const user = normalizeJwtUser(await request.jwtVerify());
        if (user) {
          await auth.revokeAll(user.userId);
        }
      } catch (error) {
        request.log.debug({
          msg: 'signout: access token rejected',
          cause: error instanceof Error ? error.message : error
        });
      }
    }
    return reply.code(204).send(null);
  });

  app.get('/auth/profile', {
    preHandler: fastify.authenticate,
    schema: {
      response: {
        200: userSchema,
        404: messageResponseSchema
      }
    }
  }, async (request, reply) => {
    const currentUser = await ensureJwtUser(request, reply);
    if (!currentUser) {
      return reply;
    }
    const user = await fastify.deps.store.findUserById(currentUser.userId);
    if (!user) {
      return reply.code(404).send({ message: 'ユーザーが見つかりません。' });
    }
    return reply.send(toUserResponse(user));
  });
};
