/**
 * Recycling Domain Errors
 *
 * Raised by the exchange pipeline; batch processing turns them into item failures
 */

import { RecyclerError } from '../errors.js';

export class NotOwnerError extends RecyclerError {
  constructor(unitId: string, actor: string) {
    super('NOT_OWNER', `Unit ${unitId} is not owned by ${actor}`);
  }
}

export class UnitNotFoundError extends RecyclerError {
  constructor(classId: string, unitId: string, options?: ErrorOptions) {
    super('UNIT_NOT_FOUND', `Unit ${unitId} of asset class ${classId} could not be resolved`, options);
  }
}

export class OperationFailedError extends RecyclerError {
  constructor(message: string, options?: ErrorOptions) {
    super('OPERATION_FAILED', message, options);
  }
}

/**
 * The collaborator reported a successful destruction but the unit still resolves.
 * Never recoverable.
 */
export class PostconditionError extends RecyclerError {
  constructor(classId: string, unitId: string, owner: string) {
    super(
      'POSTCONDITION_VIOLATED',
      `Unit ${unitId} of asset class ${classId} still exists (owner ${owner}) after reported destruction`
    );
  }
}

export class PausedError extends RecyclerError {
  constructor() {
    super('PAUSED', 'Recycling is paused');
  }
}
