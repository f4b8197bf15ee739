import type { FastifyReply, FastifyRequest } from 'fastify';

export type JwtUser = {
  userId: string;
  role: 'user' | 'admin';
};

export function normalizeJwtUser(raw: unknown): JwtUser | null {
  if (!raw || typeof raw !== 'object') {
    return null;
  }
  if (Buffer.isBuffer(raw)) {
    return null;
  }
  const userIdCandidate = [
    Reflect.get(raw, 'userId'),
    Reflect.get(raw, 'id'),
    Reflect.get(raw, 'sub')
  ].find((value): value is string => typeof value === 'string' && value.length > 0);
  if (!userIdCandidate) {
    return null;
  }
  const roleCandidate: unknown = Reflect.get(raw, 'role');
  let role: JwtUser['role'] | null = null;
  if (typeof roleCandidate === 'string') {
    const normalizedRole = roleCandidate.toLowerCase();
    if (normalizedRole === 'admin' || normalizedRole === 'user') {
      role = normalizedRole;
    }
  }
  if (!role) {
    return null;
  }
  return { userId: userIdCandidate, role } satisfies JwtUser;
}

export function getJwtUser(request: FastifyRequest): JwtUser | null {
  const normalized = normalizeJwtUser(request.user);
  if (!normalized) {
    return null;
  }
  request.user = normalized;
  return normalized;
}

export async function ensureJwtUser(
  request: FastifyRequest,
  reply: FastifyReply,
  message = '認証に失敗しました。'
): Promise<JwtUser | null> {
  const existingUser = getJwtUser(request);
  if (existingUser) {
    return existingUser;
  }

  try {
    const payload = await request.jwtVerify();
    const normalized = normalizeJwtUser(payload);
    if (!normalized) {
      throw new Error('Invalid JWT payload');
    }
    request.user = normalized;
    return normalized;
  } catch (error) {
    request.log.error({
      msg: 'JWT user payload is missing on an authenticated request.',
      cause: error instanceof Error ? error.message : error
    });
    if (!reply.sent) {
      await reply.code(401).send({ message });
    }
    return null;
  }
}
