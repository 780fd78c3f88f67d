/**
 * Raised when a caller passes a parameter the pipeline cannot honour: while
 * the construct tree is declared, or by the status ledger before any request
 * is sent.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly parameter?: string,
  ) {
    super(parameter ? `${parameter}: ${message}` : message);
    this.name = 'ConfigurationError';
  }
}

/** Raised by the status ledger when a stored item does not match the record schema. */
export class StatusLedgerError extends Error {
  constructor(
    message: string,
    public readonly itemId: string,
  ) {
    super(message);
    this.name = 'StatusLedgerError';
  }
}
