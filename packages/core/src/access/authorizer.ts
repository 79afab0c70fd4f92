import { AuthorizationError } from '../errors.js';

export const ADMIN_OPERATIONS = [
  'register',
  'updateRate',
  'setActive',
  'deactivate',
  'pause',
  'unpause',
  'emergencyRescue',
] as const;

export type AdminOperation = (typeof ADMIN_OPERATIONS)[number];

/**
 * Authorization capability for administrative operations.
 * How the actor identity was established is the caller's concern.
 */
export interface Authorizer {
  authorize(actor: string, operation: AdminOperation): boolean;
}

export class SingleAdminAuthorizer implements Authorizer {
  constructor(private readonly adminId: string) {}

  authorize(actor: string, _operation: AdminOperation): boolean {
    return actor.length > 0 && actor === this.adminId;
  }
}

export function requireAdmin(
  authorizer: Authorizer,
  actor: string,
  operation: AdminOperation
): void {
  if (!authorizer.authorize(actor, operation)) {
    throw new AuthorizationError(actor, operation);
  }
}
