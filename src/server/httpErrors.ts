import { z } from 'zod/v4';

import {
  ConflictError,
  ForbiddenError,
  InternalInconsistencyError,
  InvalidStateError,
  NotFoundError,
  ValidationError
} from '../domain/errors.js';

export const messageResponseSchema = z.object({ message: z.string() });

/** handleDomainError が返しうるステータスの応答スキーマ。 */
export const domainErrorResponses = {
  400: messageResponseSchema,
  403: messageResponseSchema,
  404: messageResponseSchema,
  409: messageResponseSchema,
  500: messageResponseSchema
};

type HandledError = { status: 400 | 403 | 404 | 409 | 500; message: string };

const INTERNAL_MESSAGE = '内部で不整合が発生しました。時間をおいて再度お試しください。';

/** ドメインエラーを HTTP 応答に変換する。内部不整合は SessionManager 側で記録済みなのでここでは記録しない。 */
export function handleDomainError(error: unknown): HandledError | null {
  if (error instanceof NotFoundError) {
    return { status: 404, message: error.message };
  }
  if (error instanceof ValidationError) {
    return { status: 400, message: error.message };
  }
  if (error instanceof ForbiddenError) {
    return { status: 403, message: error.message };
  }
  if (error instanceof ConflictError || error instanceof InvalidStateError) {
    return { status: 409, message: error.message };
  }
  if (error instanceof InternalInconsistencyError) {
    return { status: 500, message: INTERNAL_MESSAGE };
  }
  return null;
}
