/**
 * HeatBalanceModule: solve a two-stream exchanger by the ε-NTU method.
 *
 * Two mutually exclusive modes, selected by whether UA is supplied:
 *
 *   rating (UA known): one complete temperature pair anchors Q; the other
 *     two temperatures follow from Q and Ch / Cc.
 *   sizing (UA unknown): one stream has both temperatures, the other at least
 *     one; ε = Q / (Cmin·(Thi − Tci)) is inverted to NTU.
 *
 * Every path returns the full ThermalState.
 */
import type {
  CapacityRates,
  HeatBalanceInputV1,
  HeatBalanceOptions,
  HeatBalanceResultV1,
  RatingAnchor,
} from '../schema/ExchangerInputV1';
import {
  InconsistentInputError,
  InsufficientInputError,
  InvalidInputError,
} from '../../contracts/ExchangerErrors';
import { calcCapacityRates, ntuFromUA, uaFromNTU } from './CapacityRateModule';
import { effectivenessFromNtu, ntuFromEffectiveness } from './EffectivenessNtuModule';
import { requireFinite, requireNonNegative } from '../utils/guards';

/**
 * Relative mismatch tolerated between hot- and cold-side duties when all four
 * temperatures are supplied in sizing mode.
 */
export const DEFAULT_CONSISTENCY_TOLERANCE = 0.01;

interface Temperatures {
  Thi?: number;
  Tho?: number;
  Tci?: number;
  Tco?: number;
}

function optionalTemperature(field: keyof Temperatures, value: number | undefined): number | undefined {
  return value === undefined ? undefined : requireFinite(field, value);
}

/** A complete temperature pair that anchors Q in rating mode. */
export type AnchorPair =
  | { anchor: 'Thi_Tci'; Thi: number; Tci: number }
  | { anchor: 'Tho_Tco'; Tho: number; Tco: number }
  | { anchor: 'Thi_Tco'; Thi: number; Tco: number }
  | { anchor: 'Tho_Tci'; Tho: number; Tci: number };

/** Pairs are tried inlets first, then outlets, then the two mixed pairs. */
export function pickAnchor(t: Temperatures): AnchorPair | undefined {
  const { Thi, Tho, Tci, Tco } = t;
  if (Thi !== undefined && Tci !== undefined) return { anchor: 'Thi_Tci', Thi, Tci };
  if (Tho !== undefined && Tco !== undefined) return { anchor: 'Tho_Tco', Tho, Tco };
  if (Thi !== undefined && Tco !== undefined) return { anchor: 'Thi_Tco', Thi, Tco };
  if (Tho !== undefined && Tci !== undefined) return { anchor: 'Tho_Tci', Tho, Tci };
  return undefined;
}

/**
 * Heat duty implied by effectiveness `eff` and one anchoring temperature pair.
 *
 * Only the (Thi, Tci) form is the direct definition of ε; the other three are
 * that definition rearranged with the stream energy balances. Their
 * denominators vanish when the pair cannot fix Q (balanced counterflow at
 * ε = 0.5 for the outlets, ε = 1 on the Cmin side for the mixed pairs), and
 * that raises `InsufficientInputError`.
 */
export function dutyFromAnchor(pair: AnchorPair, eff: number, rates: CapacityRates): number {
  const { Cmin, Ch, Cc } = rates;
  switch (pair.anchor) {
    case 'Thi_Tci':
      return eff * Cmin * (pair.Thi - pair.Tci);
    case 'Tho_Tco':
      return rearrangedDuty(pair, eff * Cmin * Cc * Ch * (pair.Tco - pair.Tho), eff * Cmin * (Cc + Ch) - Ch * Cc);
    case 'Thi_Tco':
      return rearrangedDuty(pair, eff * Cmin * Cc * (pair.Tco - pair.Thi), eff * Cmin - Cc);
    case 'Tho_Tci':
      return rearrangedDuty(pair, eff * Cmin * Ch * (pair.Tci - pair.Tho), eff * Cmin - Ch);
  }
}

export const ANCHOR_LABEL: Record<RatingAnchor, string> = {
  Thi_Tci: '(Thi, Tci)',
  Tho_Tco: '(Tho, Tco)',
  Thi_Tco: '(Thi, Tco)',
  Tho_Tci: '(Tho, Tci)',
};

function rearrangedDuty(pair: AnchorPair, numerator: number, denominator: number): number {
  const Q = numerator / denominator;
  if (denominator === 0 || !Number.isFinite(Q)) {
    throw new InsufficientInputError(
      `The pair ${ANCHOR_LABEL[pair.anchor]} does not determine the heat duty at this effectiveness; supply the inlet temperatures instead.`,
    );
  }
  return Q;
}

function rate(
  input: HeatBalanceInputV1,
  UA: number,
  rates: CapacityRates,
  t: Temperatures,
): HeatBalanceResultV1 {
  const pair = pickAnchor(t);
  if (pair === undefined) {
    throw new InsufficientInputError(
      'One set of (Thi, Tci), (Tho, Tco), (Thi, Tco) or (Tho, Tci) is required along with UA.',
    );
  }

  const NTU = ntuFromUA(UA, rates.Cmin);
  const effectiveness = effectivenessFromNtu(NTU, rates.Cr, input.configuration);
  const Q = dutyFromAnchor(pair, effectiveness, rates);

  // Inlet-anchored where the pair holds that stream's inlet, outlet-anchored otherwise
  const hot = 'Thi' in pair
    ? { Thi: pair.Thi, Tho: pair.Thi - Q / rates.Ch }
    : { Thi: pair.Tho + Q / rates.Ch, Tho: pair.Tho };
  const cold = 'Tci' in pair
    ? { Tci: pair.Tci, Tco: pair.Tci + Q / rates.Cc }
    : { Tci: pair.Tco - Q / rates.Cc, Tco: pair.Tco };

  return {
    mode: 'rating',
    anchor: pair.anchor,
    state: {
      Q, UA, Cr: rates.Cr, Cmin: rates.Cmin, Cmax: rates.Cmax,
      effectiveness, NTU, ...hot, ...cold,
    },
  };
}

function size(
  input: HeatBalanceInputV1,
  rates: CapacityRates,
  t: Temperatures,
  tolerance: number,
): HeatBalanceResultV1 {
  let { Thi, Tho, Tci, Tco } = t;
  let Q: number;
  let crossChecked = false;

  if (Thi !== undefined && Tho !== undefined) {
    Q = rates.Ch * (Thi - Tho);
    if (Tci !== undefined && Tco !== undefined) {
      const coldQ = rates.Cc * (Tco - Tci);
      // Measured against the hot-side duty; zero hot duty tolerates only zero cold duty
      const relativeDifference = Q === 0
        ? (coldQ === 0 ? 0 : Number.POSITIVE_INFINITY)
        : Math.abs((Q - coldQ) / Q);
      if (relativeDifference > tolerance) {
        throw new InconsistentInputError(Q, coldQ, relativeDifference);
      }
      crossChecked = true;
    } else if (Tci !== undefined) {
      Tco = Tci + Q / rates.Cc;
    } else if (Tco !== undefined) {
      Tci = Tco - Q / rates.Cc;
    } else {
      throw new InsufficientInputError('At least one temperature is required to be specified on the cold side.');
    }
  } else if (Tci !== undefined && Tco !== undefined) {
    Q = rates.Cc * (Tco - Tci);
    if (Thi !== undefined) {
      Tho = Thi - Q / rates.Ch;
    } else if (Tho !== undefined) {
      Thi = Tho + Q / rates.Ch;
    } else {
      throw new InsufficientInputError('At least one temperature is required to be specified on the hot side.');
    }
  } else {
    throw new InsufficientInputError(
      'Without UA, both temperatures of one stream and at least one of the other are required.',
    );
  }

  if (Thi === Tci) {
    throw new InvalidInputError('Thi', 'Hot and cold inlet temperatures coincide; effectiveness is undefined.');
  }

  const effectiveness = Q / rates.Cmin / (Thi - Tci);
  const NTU = ntuFromEffectiveness(effectiveness, rates.Cr, input.configuration);
  const UA = uaFromNTU(NTU, rates.Cmin);

  return {
    mode: 'sizing',
    crossChecked,
    state: {
      Q, UA, Cr: rates.Cr, Cmin: rates.Cmin, Cmax: rates.Cmax,
      effectiveness, NTU, Thi, Tho, Tci, Tco,
    },
  };
}

/**
 * Fill in every unknown of a two-stream exchanger.
 *
 * @param input    Streams, configuration, any known temperatures, and optionally UA.
 * @param options  `consistencyTolerance` for the sizing-mode duty cross-check.
 */
export function solveHeatBalance(
  input: HeatBalanceInputV1,
  options: HeatBalanceOptions = {},
): HeatBalanceResultV1 {
  const rates = calcCapacityRates(input.streams);
  const tolerance = requireNonNegative(
    'consistencyTolerance',
    options.consistencyTolerance ?? DEFAULT_CONSISTENCY_TOLERANCE,
  );

  const t: Temperatures = {
    Thi: optionalTemperature('Thi', input.Thi),
    Tho: optionalTemperature('Tho', input.Tho),
    Tci: optionalTemperature('Tci', input.Tci),
    Tco: optionalTemperature('Tco', input.Tco),
  };

  if (input.UA !== undefined) {
    return rate(input, requireNonNegative('UA', input.UA), rates, t);
  }
  return size(input, rates, t, tolerance);
}
