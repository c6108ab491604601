/**
 * Shared precondition checks.
 *
 * Each helper returns the value unchanged when it passes, so call sites can
 * validate inline, and throws InvalidInputError naming the field otherwise.
 */
import { InvalidInputError } from '../../contracts/ExchangerErrors';

export function requireFinite(field: string, value: number): number {
  if (!Number.isFinite(value)) {
    throw new InvalidInputError(field, `${field} must be a finite number; got ${value}.`);
  }
  return value;
}

export function requirePositive(field: string, value: number): number {
  if (requireFinite(field, value) <= 0) {
    throw new InvalidInputError(field, `${field} must be greater than zero; got ${value}.`);
  }
  return value;
}

export function requireNonNegative(field: string, value: number): number {
  if (requireFinite(field, value) < 0) {
    throw new InvalidInputError(field, `${field} must not be negative; got ${value}.`);
  }
  return value;
}

/** Heat capacity rate ratio: Cr ≤ 1 by definition of Cmin / Cmax. */
export function requireCapacityRatio(Cr: number): number {
  requireNonNegative('Cr', Cr);
  if (Cr > 1) {
    throw new InvalidInputError('Cr', `Heat capacity rate ratio must be at most 1 by definition; got ${Cr}.`);
  }
  return Cr;
}

export function requireFraction(field: string, value: number): number {
  requireNonNegative(field, value);
  if (value > 1) {
    throw new InvalidInputError(field, `${field} must lie in [0, 1]; got ${value}.`);
  }
  return value;
}
