/**
 * Registry Domain Errors
 */

import { RecyclerError } from '../errors.js';

export class NotRegisteredError extends RecyclerError {
  constructor(classId: string) {
    super('NOT_REGISTERED', `Asset class ${classId} is not registered`);
  }
}

export class NotActiveError extends RecyclerError {
  constructor(classId: string) {
    super('NOT_ACTIVE', `Asset class ${classId} is not accepted for recycling`);
  }
}

export class AlreadyRegisteredError extends RecyclerError {
  constructor(classId: string) {
    super('ALREADY_REGISTERED', `Asset class ${classId} is already registered and active`);
  }
}

export class CapabilityMissingError extends RecyclerError {
  constructor(classId: string, capability: string, options?: ErrorOptions) {
    super(
      'CAPABILITY_MISSING',
      `Asset class ${classId} does not support required capability ${capability}`,
      options
    );
  }
}
