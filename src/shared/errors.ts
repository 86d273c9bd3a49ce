export type AdmissionDenial = 'not_allowed' | 'rate_limited';

export class RelayError extends Error {
  constructor(message: string, readonly code: string) {
    super(message);
    this.name = 'RelayError';
  }
}

export class AdmissionError extends RelayError {
  constructor(readonly reason: AdmissionDenial, readonly userId: string, readonly retryAfterMs?: number) {
    super(`admission denied for ${userId}: ${reason}`, reason);
    this.name = 'AdmissionError';
  }
}

export class ConfigurationError extends RelayError {
  constructor(message: string, readonly hint?: string) {
    super(message, 'configuration');
    this.name = 'ConfigurationError';
  }
}

export class AliasConflictError extends RelayError {
  constructor(readonly alias: string, readonly existingSessionId: string) {
    super(`alias ${alias} is already bound to another session`, 'alias_conflict');
    this.name = 'AliasConflictError';
  }
}

export class AliasExhaustedError extends RelayError {
  constructor(readonly attempts: number) {
    super(`no free alias after ${attempts} attempts`, 'alias_exhausted');
    this.name = 'AliasExhaustedError';
  }
}

export class LockQueueFullError extends RelayError {
  constructor(readonly maxWaiting: number) {
    super(`conversation queue is full (${maxWaiting} waiting)`, 'queue_full');
    this.name = 'LockQueueFullError';
  }
}

export class HandoffError extends RelayError {
  constructor(message: string, readonly hint?: string) {
    super(message, 'handoff');
    this.name = 'HandoffError';
  }
}

export const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));

/** `code` of a Node system error such as ENOENT, if there is one. */
export const systemErrorCode = (error: unknown): string | undefined => {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
};
