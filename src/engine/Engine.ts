import type {
  EngineResultV1,
  ExchangerInputV1,
  HeatBalanceOptions,
  HeatBalanceResultV1,
  RatingAnchor,
} from './schema/ExchangerInputV1';
import { normalizeConfiguration, describeConfiguration } from './normalizer/ConfigurationNormalizer';
import { ANCHOR_LABEL, solveHeatBalance } from './modules/HeatBalanceModule';

const ANCHOR_MEMBERS: Record<RatingAnchor, readonly ('Thi' | 'Tho' | 'Tci' | 'Tco')[]> = {
  Thi_Tci: ['Thi', 'Tci'],
  Tho_Tco: ['Tho', 'Tco'],
  Thi_Tco: ['Thi', 'Tco'],
  Tho_Tci: ['Tho', 'Tci'],
};

function buildNotes(input: ExchangerInputV1, result: HeatBalanceResultV1): string[] {
  const notes: string[] = [];

  if (result.mode === 'rating' && result.anchor !== undefined) {
    const members = ANCHOR_MEMBERS[result.anchor];
    notes.push(`Rated from UA with Q anchored on ${ANCHOR_LABEL[result.anchor]}.`);
    for (const key of ['Thi', 'Tho', 'Tci', 'Tco'] as const) {
      if (input[key] !== undefined && !members.includes(key)) {
        notes.push(`Supplied ${key} was replaced by the value the energy balance gives.`);
      }
    }
  }

  if (result.mode === 'sizing') {
    notes.push(
      result.crossChecked
        ? 'Sized from all four temperatures; hot- and cold-side duties agree within tolerance.'
        : 'Sized from three temperatures; the fourth follows from the energy balance.',
    );
  }

  return notes;
}

/**
 * Solve an exchanger from raw input.
 *
 * The configuration may be a tag string; it is parsed before the solver runs,
 * so an unknown tag fails before any numeric validation.
 */
export function runEngine(input: ExchangerInputV1, options: HeatBalanceOptions = {}): EngineResultV1 {
  const configuration = normalizeConfiguration(input.configuration);
  const result = solveHeatBalance({ ...input, configuration }, options);
  const { state } = result;

  return {
    state,
    mode: result.mode,
    configuration,
    configurationLabel: describeConfiguration(configuration),
    qMaxW: state.Cmin * (state.Thi - state.Tci),
    notes: buildNotes(input, result),
  };
}
