import type { FastifyReply, FastifyRequest } from 'fastify';
import type { JwtUser } from '../src/server/auth/jwtUser.js';
import type { ServerConfig } from '../src/server/config.js';
import type { ServerDependencies } from '../src/server/dependencies.js';
import type { GameSocketServer } from '../src/server/fastifyTypes.js';

declare module 'fastify' {
  interface FastifyInstance {
    deps: ServerDependencies;
    config: ServerConfig;
    io: GameSocketServer;
    authenticate: (request: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply | undefined>;
    authorizeAdmin: (request: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply | undefined>;
  }
}

declare module '@fastify/jwt' {
  interface FastifyJWT {
    payload: JwtUser;
    user: JwtUser;
  }
}
