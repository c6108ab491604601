export const ERROR_CODES = {
  // Preconditions on scalar inputs
  INVALID_INPUT: 'input.invalid',

  // Discrete selectors
  UNKNOWN_CONFIGURATION: 'config.unknown',
  UNSUPPORTED_PASS_COUNT: 'config.unsupported_pass_count',

  // Correlation inversion
  EFFECTIVENESS_UNATTAINABLE: 'effectiveness.unattainable',
  ROOT_BRACKET_FAILURE: 'solver.root_bracket',

  // Heat balance
  INSUFFICIENT_INPUT: 'balance.insufficient',
  INCONSISTENT_INPUT: 'balance.inconsistent',
} as const;

export type ExchangerErrorCode = typeof ERROR_CODES[keyof typeof ERROR_CODES];

/**
 * Base class for every failure raised by the engine.
 *
 * All failures are user-input errors: they are raised where they are detected
 * and reach the caller unmodified.
 */
export class ExchangerError extends Error {
  readonly code: ExchangerErrorCode;

  constructor(code: ExchangerErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidInputError extends ExchangerError {
  /** Name of the offending input, e.g. `Cr` or `streams.mh`. */
  readonly field: string;

  constructor(field: string, message: string) {
    super(ERROR_CODES.INVALID_INPUT, message);
    this.field = field;
  }
}

export class UnknownConfigurationError extends ExchangerError {
  readonly tag: string;

  constructor(tag: string) {
    super(ERROR_CODES.UNKNOWN_CONFIGURATION, `Heat exchanger configuration "${tag}" is not recognised.`);
    this.tag = tag;
  }
}

export class UnsupportedPassCountError extends ExchangerError {
  readonly family: string;
  readonly tubePasses: number;
  readonly supported: readonly number[];

  constructor(family: string, tubePasses: number, supported: readonly number[]) {
    super(
      ERROR_CODES.UNSUPPORTED_PASS_COUNT,
      `${family} correlations support ${supported.join(', ')} tube passes; got ${tubePasses}.`,
    );
    this.family = family;
    this.tubePasses = tubePasses;
    this.supported = supported;
  }
}

/** The requested effectiveness lies at or above what the configuration can reach. */
export class EffectivenessUnattainableError extends ExchangerError {
  readonly effectiveness: number;
  readonly maxEffectiveness: number;

  constructor(effectiveness: number, maxEffectiveness: number) {
    super(
      ERROR_CODES.EFFECTIVENESS_UNATTAINABLE,
      `The specified effectiveness (${effectiveness}) is not physically possible for this configuration; ` +
      `the maximum effectiveness possible is ${maxEffectiveness}.`,
    );
    this.effectiveness = effectiveness;
    this.maxEffectiveness = maxEffectiveness;
  }
}

export class RootBracketFailureError extends ExchangerError {
  readonly lower: number;
  readonly upper: number;
  readonly residualLower: number;
  readonly residualUpper: number;

  constructor(lower: number, upper: number, residualLower: number, residualUpper: number) {
    super(
      ERROR_CODES.ROOT_BRACKET_FAILURE,
      `No root bracketed in [${lower}, ${upper}]: residuals ${residualLower} and ${residualUpper} ` +
      `do not change sign.`,
    );
    this.lower = lower;
    this.upper = upper;
    this.residualLower = residualLower;
    this.residualUpper = residualUpper;
  }
}

export class InsufficientInputError extends ExchangerError {
  constructor(message: string) {
    super(ERROR_CODES.INSUFFICIENT_INPUT, message);
  }
}

export class InconsistentInputError extends ExchangerError {
  readonly hotSideQ: number;
  readonly coldSideQ: number;
  readonly relativeDifference: number;

  constructor(hotSideQ: number, coldSideQ: number, relativeDifference: number) {
    super(
      ERROR_CODES.INCONSISTENT_INPUT,
      `The specified heat capacities, mass flows, and temperatures are inconsistent: ` +
      `hot side Q = ${hotSideQ} W, cold side Q = ${coldSideQ} W ` +
      `(${(relativeDifference * 100).toFixed(2)} % apart).`,
    );
    this.hotSideQ = hotSideQ;
    this.coldSideQ = coldSideQ;
    this.relativeDifference = relativeDifference;
  }
}

export function isExchangerError(error: unknown): error is ExchangerError {
  return error instanceof ExchangerError;
}
