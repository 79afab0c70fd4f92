/**
 * Domain error → HTTP response mapping
 */

import {
  AlreadyRegisteredError,
  AuthorizationError,
  CapabilityMissingError,
  NotActiveError,
  NotOwnerError,
  NotRegisteredError,
  OperationFailedError,
  PausedError,
  PostconditionError,
  ReentrancyError,
  RecyclerError,
  UnitNotFoundError,
  ValidationError,
} from '@recycler/core';
import type { ContentfulStatusCode } from 'hono/utils/http-status';

type RecyclerErrorClass = abstract new (...args: never[]) => RecyclerError;

const STATUS_BY_ERROR: ReadonlyArray<readonly [RecyclerErrorClass, ContentfulStatusCode]> = [
  [ValidationError, 400],
  [AuthorizationError, 403],
  [NotRegisteredError, 404],
  [UnitNotFoundError, 404],
  [AlreadyRegisteredError, 409],
  [NotActiveError, 409],
  [NotOwnerError, 409],
  [ReentrancyError, 409],
  [CapabilityMissingError, 422],
  [PausedError, 423],
  [PostconditionError, 500],
  [OperationFailedError, 502],
];

export interface ErrorResponse {
  status: ContentfulStatusCode;
  body: { error: string; code: string };
}

/**
 * Returns null for anything that is not a recycler error
 */
export function toErrorResponse(error: unknown): ErrorResponse | null {
  if (!(error instanceof RecyclerError)) {
    return null;
  }

  const match = STATUS_BY_ERROR.find(([errorClass]) => error instanceof errorClass);
  return {
    status: match ? match[1] : 500,
    body: { error: error.message, code: error.code },
  };
}
