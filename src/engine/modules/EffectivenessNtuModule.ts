/**
 * EffectivenessNtuModule: ε ↔ NTU correlations per flow arrangement.
 *
 * Forward (ε from NTU) is closed-form for every arrangement. The inverse is
 * closed-form except crossflow with both fluids unmixed, which has no analytic
 * inverse and is solved with a bracketed Brent root-find.
 *
 * With Cr = 0 (one stream changing phase) the arrangement does not matter:
 *   ε = 1 − exp(−NTU)      NTU = −ln(1 − ε)
 *
 * References: Bergman et al., Introduction to Heat Transfer 6E (2011);
 * Shah & Sekulic, Fundamentals of Heat Exchanger Design (2002);
 * Holman, Heat Transfer 10E (2009).
 */
import type { ExchangerConfiguration } from '../schema/ExchangerInputV1';
import { EffectivenessUnattainableError } from '../../contracts/ExchangerErrors';
import { requireCapacityRatio, requireFraction, requireNonNegative } from '../utils/guards';
import { brentRoot, type RootFindOptions } from '../utils/rootFinding';

/**
 * NTU bracket searched when inverting the unmixed crossflow correlation.
 * Targets whose NTU falls outside it raise RootBracketFailureError.
 */
export const CROSSFLOW_NTU_BRACKET: readonly [number, number] = [1e-7, 1e5];

export interface NtuInversionOptions extends RootFindOptions {
  /** Overrides CROSSFLOW_NTU_BRACKET. */
  bracket?: readonly [number, number];
}

// ── Single-shell TEMA E and shells in series ────────────────────────────────

/** One TEMA E shell (one shell pass, even number of tube passes). */
function temaEShellEffectiveness(NTU1: number, Cr: number): number {
  const root = Math.sqrt(1 + Cr * Cr);
  const decay = Math.exp(-NTU1 * root);
  return 2 / (1 + Cr + root * (1 + decay) / (1 - decay));
}

/** Combine `shells` equal-UA shells of single-shell effectiveness e1 in series. */
function shellsInSeries(e1: number, Cr: number, shells: number): number {
  if (shells === 1) return e1;
  if (Cr === 1) {
    return shells * e1 / (1 + (shells - 1) * e1);
  }
  const term = ((1 - e1 * Cr) / (1 - e1)) ** shells;
  return (term - 1) / (term - Cr);
}

/** Single-shell effectiveness that N shells in series turn into `effectiveness`. */
function singleShellFromSeries(effectiveness: number, Cr: number, shells: number): number {
  if (shells === 1) return effectiveness;
  if (Cr === 1) {
    return effectiveness / (shells - (shells - 1) * effectiveness);
  }
  const F = ((effectiveness * Cr - 1) / (effectiveness - 1)) ** (1 / shells);
  return (F - 1) / (F - Cr);
}

function crossflowUnmixedEffectiveness(NTU: number, Cr: number): number {
  return 1 - Math.exp((1 / Cr) * NTU ** 0.22 * (Math.exp(-Cr * NTU ** 0.78) - 1));
}

// ── Forward ────────────────────────────────────────────────────────────────

/**
 * Effectiveness of an exchanger of size `NTU` at capacity ratio `Cr`.
 *
 * Throws InvalidInputError for NTU < 0 or Cr outside [0, 1].
 */
export function effectivenessFromNtu(NTU: number, Cr: number, configuration: ExchangerConfiguration): number {
  requireNonNegative('NTU', NTU);
  requireCapacityRatio(Cr);

  if (Cr === 0) return 1 - Math.exp(-NTU);

  switch (configuration.kind) {
    case 'counterflow': {
      // NTU/(1+NTU) is the limit of the general form, which is 0/0 at Cr = 1
      if (Cr === 1) return NTU / (1 + NTU);
      const decay = Math.exp(-NTU * (1 - Cr));
      return (1 - decay) / (1 - Cr * decay);
    }
    case 'parallel':
      return (1 - Math.exp(-NTU * (1 + Cr))) / (1 + Cr);
    case 'shell_and_tube': {
      if (NTU === 0) return 0;
      const e1 = temaEShellEffectiveness(NTU / configuration.shells, Cr);
      return shellsInSeries(e1, Cr, configuration.shells);
    }
    case 'crossflow':
      return crossflowUnmixedEffectiveness(NTU, Cr);
    case 'crossflow_mixed_cmin':
      return 1 - Math.exp(-(1 / Cr) * (1 - Math.exp(-Cr * NTU)));
    case 'crossflow_mixed_cmax':
      return (1 / Cr) * (1 - Math.exp(-Cr * (1 - Math.exp(-NTU))));
    case 'boiler':
    case 'condenser':
      return 1 - Math.exp(-NTU);
  }
}

// ── Feasibility ────────────────────────────────────────────────────────────

/**
 * Supremum of ε over all NTU for the arrangement, reached only as NTU → ∞.
 *
 * Returns undefined for unmixed crossflow, which has no closed-form limit;
 * its inverse is bounded by the root-find bracket instead.
 */
export function maxEffectiveness(Cr: number, configuration: ExchangerConfiguration): number | undefined {
  requireCapacityRatio(Cr);
  if (Cr === 0) return 1;

  switch (configuration.kind) {
    case 'counterflow':
    case 'boiler':
    case 'condenser':
      return 1;
    case 'parallel':
      return 1 / (1 + Cr);
    case 'shell_and_tube': {
      const e1Max = 2 / (1 + Cr + Math.sqrt(1 + Cr * Cr));
      return shellsInSeries(e1Max, Cr, configuration.shells);
    }
    case 'crossflow':
      return undefined;
    case 'crossflow_mixed_cmin':
      return 1 - Math.exp(-1 / Cr);
    case 'crossflow_mixed_cmax':
      return (1 - Math.exp(-Cr)) / Cr;
  }
}

// ── Inverse ────────────────────────────────────────────────────────────────

/**
 * NTU needed to reach `effectiveness` at capacity ratio `Cr`.
 *
 * Throws EffectivenessUnattainableError (carrying the maximum) when the target
 * is at or above maxEffectiveness, and RootBracketFailureError when unmixed
 * crossflow cannot reach it inside the NTU bracket.
 */
export function ntuFromEffectiveness(
  effectiveness: number,
  Cr: number,
  configuration: ExchangerConfiguration,
  options: NtuInversionOptions = {},
): number {
  requireFraction('effectiveness', effectiveness);
  requireCapacityRatio(Cr);

  if (effectiveness === 0) return 0;

  const maximum = maxEffectiveness(Cr, configuration);
  if (maximum !== undefined && effectiveness >= maximum) {
    throw new EffectivenessUnattainableError(effectiveness, maximum);
  }

  if (Cr === 0) return -Math.log(1 - effectiveness);

  switch (configuration.kind) {
    case 'counterflow':
      if (Cr === 1) return effectiveness / (1 - effectiveness);
      return Math.log((effectiveness - 1) / (effectiveness * Cr - 1)) / (Cr - 1);
    case 'parallel':
      return -Math.log(1 - effectiveness * (1 + Cr)) / (1 + Cr);
    case 'shell_and_tube': {
      const { shells } = configuration;
      const root = Math.sqrt(1 + Cr * Cr);
      const e1 = singleShellFromSeries(effectiveness, Cr, shells);
      const E = (2 / e1 - (1 + Cr)) / root;
      return -shells * Math.log((E - 1) / (E + 1)) / root;
    }
    case 'crossflow': {
      const [lower, upper] = options.bracket ?? CROSSFLOW_NTU_BRACKET;
      return brentRoot(
        NTU => crossflowUnmixedEffectiveness(NTU, Cr) - effectiveness,
        lower,
        upper,
        options,
      );
    }
    case 'crossflow_mixed_cmin':
      return -Math.log(Cr * Math.log(1 - effectiveness) + 1) / Cr;
    case 'crossflow_mixed_cmax':
      return -Math.log(1 + Math.log(1 - effectiveness * Cr) / Cr);
    case 'boiler':
    case 'condenser':
      return -Math.log(1 - effectiveness);
  }
}
