// src/lib/errors.ts

/** The workbook or in-memory tables are malformed. No partial model is ever built. */
export class SchemaError extends Error {
  readonly issues: readonly string[];

  constructor(issues: string | readonly string[]) {
    const list = typeof issues === 'string' ? [issues] : issues;
    super(`Invalid ship data: ${list.join('; ')}`);
    this.name = 'SchemaError';
    this.issues = list;
  }
}

/**
 * A draft, displacement or heel angle fell outside the loaded table.
 * Extends the built-in RangeError so generic callers can still catch it as one.
 */
export class OutOfRangeError extends RangeError {
  constructor(
    readonly quantity: string,
    readonly value: number,
    readonly min: number,
    readonly max: number,
    readonly unit = '',
  ) {
    const label = quantity.charAt(0).toUpperCase() + quantity.slice(1);
    super(`${label} ${value}${unit} is outside valid range [${min}, ${max}]${unit}`);
    this.name = 'OutOfRangeError';
  }
}

/** User-supplied draft or KG failed a sanity rule. */
export class ValidationError extends Error {
  constructor(readonly reason: string) {
    super(reason);
    this.name = 'ValidationError';
  }
}
