/**
 * CapacityRateModule: heat capacity rates of the two streams.
 *
 *   Ch = mh·Cph      Cc = mc·Cpc
 *   Cmin = min(Ch, Cc)   Cmax = max(Ch, Cc)   Cr = Cmin / Cmax
 *
 * The hot/cold order of the raw helpers does not change Cmin, Cmax or Cr.
 * Only calcCapacityRates validates its inputs; the raw helpers let a zero
 * Cmax propagate as a non-finite ratio.
 */
import type { CapacityRates, StreamPair } from '../schema/ExchangerInputV1';
import { requirePositive } from '../utils/guards';

export function calcCmin(mh: number, mc: number, Cph: number, Cpc: number): number {
  return Math.min(mh * Cph, mc * Cpc);
}

export function calcCmax(mh: number, mc: number, Cph: number, Cpc: number): number {
  return Math.max(mh * Cph, mc * Cpc);
}

export function calcCr(mh: number, mc: number, Cph: number, Cpc: number): number {
  return calcCmin(mh, mc, Cph, Cpc) / calcCmax(mh, mc, Cph, Cpc);
}

/** NTU = UA / Cmin */
export function ntuFromUA(UA: number, Cmin: number): number {
  return UA / Cmin;
}

/** UA = NTU · Cmin */
export function uaFromNTU(NTU: number, Cmin: number): number {
  return NTU * Cmin;
}

/**
 * Validate a stream pair and derive every capacity rate in one pass.
 * Flows and heat capacities must all be finite and positive.
 */
export function calcCapacityRates(streams: StreamPair): CapacityRates {
  const mh = requirePositive('streams.mh', streams.mh);
  const mc = requirePositive('streams.mc', streams.mc);
  const Cph = requirePositive('streams.Cph', streams.Cph);
  const Cpc = requirePositive('streams.Cpc', streams.Cpc);

  const Ch = mh * Cph;
  const Cc = mc * Cpc;
  const Cmin = Math.min(Ch, Cc);
  const Cmax = Math.max(Ch, Cc);
  return { Ch, Cc, Cmin, Cmax, Cr: Cmin / Cmax };
}
