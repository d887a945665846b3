export class NormalizationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NormalizationError';
  }
}

export class CanonicalSchemaError extends Error {
  constructor(readonly missing: string[]) {
    super(`Validation failed: CSV headers missing or incorrect (${missing.join(', ')})`);
    this.name = 'CanonicalSchemaError';
  }
}

export class RowParseError extends Error {
  constructor(
    readonly row: number,
    detail: string,
  ) {
    super(`Row ${row} parsing failed: ${detail}`);
    this.name = 'RowParseError';
  }
}

export class DuplicateTransactionError extends Error {
  constructor() {
    super('Transaction already exists.');
    this.name = 'DuplicateTransactionError';
  }
}

export class LifecycleTransitionError extends Error {
  constructor(state: string, event: string) {
    super(`No lifecycle transition from ${state} on ${event}`);
    this.name = 'LifecycleTransitionError';
  }
}
