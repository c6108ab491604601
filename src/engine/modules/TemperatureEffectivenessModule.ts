/**
 * TemperatureEffectivenessModule: P-NTU correlations.
 *
 * Everything here is parameterised with respect to a named stream 1:
 *   R1 = C1 / C2      NTU1 = UA / C1      P1 = (temperature change of 1) / (inlet ΔT)
 * and the stream-2 view follows from R2 = 1/R1, NTU2 = NTU1·R1, P2 = P1·R1.
 *
 * Three independent correlation families are dispatched over a closed union:
 *   basic   idealised arrangements (Shah & Sekulic table 3.6)
 *   tema_j  divided-flow shell, 1, 2 or 4 tube passes
 *   tema_h  double-split shell, 1 or 2 tube passes
 * The TEMA correlations are separately published per pass count; their
 * removable singularities (R1 = 2, R1 = 4, R2 = 1/4) are explicit branches.
 *
 * References: Shah & Sekulic, Fundamentals of Heat Exchanger Design (2002);
 * Thulukkanam, Heat Exchanger Design Handbook 2E (2013);
 * Rohsenow, Hartnett & Cho, Handbook of Heat Transfer 3E (1998).
 */
import type {
  BasicFlowArrangement,
  PntuConfiguration,
  PntuInputV1,
  PntuState,
} from '../schema/ExchangerInputV1';
import { InvalidInputError, UnsupportedPassCountError } from '../../contracts/ExchangerErrors';
import { requireNonNegative, requirePositive } from '../utils/guards';

export const TEMA_J_TUBE_PASSES = [1, 2, 4] as const;
export const TEMA_H_TUBE_PASSES = [1, 2] as const;

function requireTemaRatio(R1: number): number {
  if (requireNonNegative('R1', R1) === 0) {
    throw new InvalidInputError('R1', 'TEMA shell correlations require R1 > 0.');
  }
  return R1;
}

// ── Basic arrangements ─────────────────────────────────────────────────────

export function temperatureEffectivenessBasic(
  R1: number,
  NTU1: number,
  arrangement: BasicFlowArrangement,
): number {
  requireNonNegative('R1', R1);
  requireNonNegative('NTU1', NTU1);

  if (NTU1 === 0) return 0;
  // Stream 2 has infinite capacity: every arrangement collapses to one form
  if (R1 === 0) return 1 - Math.exp(-NTU1);

  switch (arrangement) {
    case 'counterflow': {
      if (R1 === 1) return NTU1 / (1 + NTU1);
      const decay = Math.exp(-NTU1 * (1 - R1));
      return (1 - decay) / (1 - R1 * decay);
    }
    case 'parallel':
      return (1 - Math.exp(-NTU1 * (1 + R1))) / (1 + R1);
    case 'crossflow':
      // Approximation; the exact result is an infinite series
      return 1 - Math.exp(NTU1 ** 0.22 / R1 * (Math.exp(-R1 * NTU1 ** 0.78) - 1));
    case 'crossflow_mixed_1': {
      const K = 1 - Math.exp(-R1 * NTU1);
      return 1 - Math.exp(-K / R1);
    }
    case 'crossflow_mixed_2': {
      const K = 1 - Math.exp(-NTU1);
      return (1 - Math.exp(-K * R1)) / R1;
    }
    case 'crossflow_mixed_12': {
      const K1 = 1 - Math.exp(-NTU1);
      const K2 = 1 - Math.exp(-R1 * NTU1);
      return 1 / (1 / K1 + R1 / K2 - 1 / NTU1);
    }
  }
}

// ── TEMA J (divided flow) ──────────────────────────────────────────────────

/**
 * TEMA J shell, shell fluid mixed; with 2 or 4 passes the tube fluid is mixed
 * between passes.
 */
export function temperatureEffectivenessTemaJ(R1: number, NTU1: number, Ntp: number): number {
  requireTemaRatio(R1);
  requireNonNegative('NTU1', NTU1);

  if (Ntp === 1) {
    if (NTU1 === 0) return 0;
    const A = Math.exp(NTU1);
    if (R1 === 2) {
      return 0.5 * (1 - (1 + A ** -2) / (2 * (1 + NTU1)));
    }
    const B = Math.exp(-NTU1 * R1 / 2);
    return (1 / R1) * (1 - (2 - R1) * (2 * A + R1 * B) / (2 + R1) / (2 * A - R1 / B));
  }

  if (Ntp === 2 || Ntp === 4) {
    if (NTU1 === 0) return 0;
    const lambda = Math.sqrt(1 + R1 * R1 / (Ntp === 2 ? 4 : 16));
    const A = Math.exp(NTU1);
    const Al = A ** lambda;
    const B = (Al + 1) / (Al - 1);
    const C = A ** ((1 + lambda) / 2) / (lambda - 1 + (1 + lambda) * Al);
    const D = 1 + lambda * A ** ((lambda - 1) / 2) / (Al - 1);
    const core = lambda * B - 2 * lambda * C * D;
    if (Ntp === 2) {
      return 1 / (1 + R1 / 2 + core);
    }
    const E = Math.exp(R1 * NTU1 / 2);
    return 1 / (1 + (R1 / 4) * (1 + 3 * E) / (1 + E) + core);
  }

  throw new UnsupportedPassCountError('TEMA J', Ntp, TEMA_J_TUBE_PASSES);
}

// ── TEMA H (double split flow) ─────────────────────────────────────────────

/** 1-2 TEMA H with the tube inlet beside the shell inlet, evaluated from stream 2. */
function temaHTwoPassReversedP2(R2: number, NTU2: number): number {
  const alpha = NTU2 / 8 * (4 * R2 - 1);
  const beta = NTU2 / 8 * (4 * R2 + 1);
  const H = (Math.exp(-2 * beta) - 1) / (4 * R2 + 1);
  const E = (Math.exp(-beta) - 1) / (4 * R2 + 1);
  const B = (1 + H) * (1 + E) ** 2;
  const D = R2 === 0.25 ? -NTU2 / 8 : (1 - Math.exp(-alpha)) / (1 - 4 * R2);
  const G = (1 - D) ** 2 * (D * D + E * E) + D * D * (1 + E) ** 2;
  return 1 - (B + 4 * G * R2) / (1 - D) ** 4;
}

/**
 * TEMA H shell.
 *
 * Ntp = 1: tube fluid split into two individually mixed streams, shell fluid
 * mixed. Ntp = 2: fluids mixed in each pass at the cross section; `optimal`
 * selects the tube-inlet orientation, the non-optimal one being evaluated from
 * stream 2's side (NTU2 = NTU1·R1, R2 = 1/R1) and converted back via P1 = P2/R1.
 */
export function temperatureEffectivenessTemaH(
  R1: number,
  NTU1: number,
  Ntp: number,
  optimal = true,
): number {
  requireTemaRatio(R1);
  requireNonNegative('NTU1', NTU1);

  if (Ntp === 1) {
    const A = 1 / (1 + R1 / 2) * (1 - Math.exp(-NTU1 * (1 + R1 / 2) / 2));
    const D = Math.exp(-NTU1 * (1 - R1 / 2) / 2);
    const B = R1 === 2 ? NTU1 / (2 + NTU1) : (1 - D) / (1 - R1 * D / 2);
    const E = (A + B - A * B * R1 / 2) / 2;
    return E * (1 + (1 - B * R1 / 2) * (1 - A * R1 / 2 + A * B * R1)) - A * B * (1 - B * R1 / 2);
  }

  if (Ntp === 2 && optimal) {
    const alpha = NTU1 * (4 + R1) / 8;
    const beta = NTU1 * (4 - R1) / 8;
    const D = (1 - Math.exp(-alpha)) / (4 / R1 + 1);
    const E = R1 === 4 ? NTU1 / 2 : (1 - Math.exp(-beta)) / (4 / R1 - 1);
    const H = R1 === 4 ? NTU1 : (1 - Math.exp(-2 * beta)) / (4 / R1 - 1);
    const G = (1 - D) ** 2 * (D * D + E * E) + D * D * (1 + E) ** 2;
    const B = (1 + H) * (1 + E) ** 2;
    return (1 / R1) * (1 - (1 - D) ** 4 / (B - 4 * G / R1));
  }

  if (Ntp === 2) {
    return temaHTwoPassReversedP2(1 / R1, NTU1 * R1) / R1;
  }

  throw new UnsupportedPassCountError('TEMA H', Ntp, TEMA_H_TUBE_PASSES);
}

// ── Dispatch ───────────────────────────────────────────────────────────────

export function temperatureEffectiveness(R1: number, NTU1: number, configuration: PntuConfiguration): number {
  switch (configuration.family) {
    case 'basic':
      return temperatureEffectivenessBasic(R1, NTU1, configuration.arrangement);
    case 'tema_j':
      return temperatureEffectivenessTemaJ(R1, NTU1, configuration.tubePasses);
    case 'tema_h':
      return temperatureEffectivenessTemaH(R1, NTU1, configuration.tubePasses, configuration.optimal ?? true);
  }
}

/** Build the stream-1 P-NTU state from capacity rates and UA. */
export function runTemperatureEffectivenessModule(input: PntuInputV1): PntuState {
  const C1 = requirePositive('C1', input.C1);
  const C2 = requirePositive('C2', input.C2);
  const UA = requireNonNegative('UA', input.UA);

  const R1 = C1 / C2;
  const NTU1 = UA / C1;
  const P1 = temperatureEffectiveness(R1, NTU1, input.configuration);

  return input.configuration.family === 'basic'
    ? { R1, NTU1, P1 }
    : { R1, NTU1, P1, Ntp: input.configuration.tubePasses };
}

/** The same exchanger seen from stream 2. */
export function stream2View(state: PntuState): { R2: number; NTU2: number; P2: number } {
  return { R2: 1 / state.R1, NTU2: state.NTU1 * state.R1, P2: state.P1 * state.R1 };
}

/**
 * Translate a P-NTU state into the Cmin/Cmax frame of the ε-NTU method.
 * Stream 1 is the Cmin stream when R1 ≤ 1; otherwise stream 2 is.
 */
export function effectivenessFromPntu(state: PntuState): { effectiveness: number; NTU: number; Cr: number } {
  if (state.R1 <= 1) {
    return { effectiveness: state.P1, NTU: state.NTU1, Cr: state.R1 };
  }
  const { R2, NTU2, P2 } = stream2View(state);
  return { effectiveness: P2, NTU: NTU2, Cr: R2 };
}
