export class LedgerWatchError extends Error {
  constructor(public readonly message: string, public readonly code = 'INTERNAL_ERROR', public readonly details?: unknown) {
    super(message);
    this.name = 'LedgerWatchError';
  }
}

export class LedgerUnavailableError extends LedgerWatchError {
  constructor(message = 'Ledger unavailable', public readonly status?: number, details?: unknown) {
    super(message, 'LEDGER_UNAVAILABLE', details);
    this.name = 'LedgerUnavailableError';
  }
}

export class ValidationError extends LedgerWatchError {
  constructor(message = 'Validation failed', details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}
