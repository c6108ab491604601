import type { ExchangerConfiguration } from './schema/ExchangerInputV1';
import { normalizeConfiguration, describeConfiguration } from './normalizer/ConfigurationNormalizer';
import { effectivenessFromNtu } from './modules/EffectivenessNtuModule';
import { InvalidInputError } from '../contracts/ExchangerErrors';
import { requireCapacityRatio, requirePositive } from './utils/guards';

export interface EffectivenessCurveInput {
  Cr: number;
  configurations: readonly (ExchangerConfiguration | string)[];
  ntuMax: number;
  /** Samples including both ends, at least 2. */
  points: number;
}

/** One sample: `ntu` plus one ε column per configuration, keyed by its label. */
export interface EffectivenessCurveRow {
  ntu: number;
  [label: string]: number;
}

export interface EffectivenessCurve {
  /** Column keys in the order the configurations were given. */
  series: string[];
  rows: EffectivenessCurveRow[];
}

/**
 * ε against NTU on an even grid over [0, ntuMax], one series per configuration,
 * shaped for a recharts LineChart.
 */
export function buildEffectivenessCurve(input: EffectivenessCurveInput): EffectivenessCurve {
  const Cr = requireCapacityRatio(input.Cr);
  const ntuMax = requirePositive('ntuMax', input.ntuMax);
  if (!Number.isInteger(input.points) || input.points < 2) {
    throw new InvalidInputError('points', `points must be an integer of at least 2; got ${input.points}.`);
  }

  const columns = input.configurations.map(tag => {
    const config = normalizeConfiguration(tag);
    return { config, label: describeConfiguration(config) };
  });
  const labels = new Set<string>();
  for (const { label } of columns) {
    if (labels.has(label)) {
      throw new InvalidInputError('configurations', `Configuration "${label}" is listed more than once.`);
    }
    labels.add(label);
  }
  const step = ntuMax / (input.points - 1);

  const rows = Array.from({ length: input.points }, (_, i) => {
    // Last sample lands exactly on ntuMax
    const ntu = i === input.points - 1 ? ntuMax : i * step;
    const row: EffectivenessCurveRow = { ntu };
    for (const { config, label } of columns) {
      row[label] = effectivenessFromNtu(ntu, Cr, config);
    }
    return row;
  });

  return { series: columns.map(c => c.label), rows };
}
