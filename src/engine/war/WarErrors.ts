// ─────────────────────────────────────────────
//  War Errors: typed failure taxonomy.
//  Every failing action throws one of these before any state
//  is committed; the core never retries.
// ─────────────────────────────────────────────

export class WarError extends Error {
  code: string;
  details?: unknown;

  constructor(code: string, message: string, details?: unknown) {
    super(message);
    this.code = code;
    this.details = details;
    this.name = 'WarError';
  }
}

export class NotInitializedError extends WarError {
  constructor(message = 'war state has not been initialized') {
    super('NOT_INITIALIZED', message);
    this.name = 'NotInitializedError';
  }
}

export class InvalidStateTransitionError extends WarError {
  constructor(message: string, details?: unknown) {
    super('INVALID_STATE_TRANSITION', message, details);
    this.name = 'InvalidStateTransitionError';
  }
}

export class CooldownActiveError extends WarError {
  readonly remainingSeconds: number;

  constructor(message: string, remainingSeconds: number) {
    super('COOLDOWN_ACTIVE', message, { remainingSeconds });
    this.remainingSeconds = remainingSeconds;
    this.name = 'CooldownActiveError';
  }
}

export class CapacityExceededError extends WarError {
  constructor(message: string, details?: unknown) {
    super('CAPACITY_EXCEEDED', message, details);
    this.name = 'CapacityExceededError';
  }
}

export class OwnershipConflictError extends WarError {
  constructor(message: string, details?: unknown) {
    super('OWNERSHIP_CONFLICT', message, details);
    this.name = 'OwnershipConflictError';
  }
}

export class InsufficientStakeError extends WarError {
  constructor(message: string, details?: unknown) {
    super('INSUFFICIENT_STAKE', message, details);
    this.name = 'InsufficientStakeError';
  }
}

export class ConfigurationError extends WarError {
  constructor(message: string, details?: unknown) {
    super('CONFIGURATION_ERROR', message, details);
    this.name = 'ConfigurationError';
  }
}

export class UnauthorizedError extends WarError {
  constructor(message: string, details?: unknown) {
    super('UNAUTHORIZED', message, details);
    this.name = 'UnauthorizedError';
  }
}

export class NotFoundError extends WarError {
  constructor(message: string, details?: unknown) {
    super('NOT_FOUND', message, details);
    this.name = 'NotFoundError';
  }
}
