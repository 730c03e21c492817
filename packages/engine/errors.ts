/**
 * Engine error taxonomy.
 *
 * Every error here is a local, recoverable configuration problem. Callers
 * processing many strata catch `CrossTabError` per stratum and continue.
 */

/**
 * Context attached to an engine error so the caller can locate the problem.
 */
export interface ErrorContext {
  /** variable (field) the problem was found in */
  readonly variable?: string;
  /** offending raw value or label */
  readonly value?: string | number;
  /** position of the offending value in its input sequence */
  readonly index?: number;
  /** stratum being processed, when stratified */
  readonly stratum?: string;
}

export class CrossTabError extends Error {
  readonly context: ErrorContext;

  constructor(message: string, context: ErrorContext = {}) {
    super(message);
    this.name = new.target.name;
    this.context = context;
  }
}

/** A raw value matched no recoding rule under the 'error' policy. */
export class RecodeError extends CrossTabError {}

/** Tabulation found a label outside the declared level order. */
export class UnknownCategoryError extends CrossTabError {}

/** Margins were requested on a matrix that already carries them. */
export class AlreadyAugmentedError extends CrossTabError {}

/** A variable has no levels to tabulate against. */
export class EmptyLevelSetError extends CrossTabError {}

/** A configuration object failed validation. */
export class ConfigError extends CrossTabError {}

/**
 * Render a raw value for an error message.
 */
export function describeValue(value: unknown): string {
  if (typeof value === 'string') return `'${value}'`;
  if (typeof value === 'symbol') return '<missing>';
  return String(value);
}
