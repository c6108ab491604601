import type { ConfigurationKind, ExchangerConfiguration } from '../schema/ExchangerInputV1';
import { InvalidInputError, UnknownConfigurationError } from '../../contracts/ExchangerErrors';

/** Tag strings accepted at the input boundary, keyed to the typed kind. */
const TAG_TO_KIND = new Map<string, Exclude<ConfigurationKind, 'shell_and_tube'>>([
  ['counterflow', 'counterflow'],
  ['parallel', 'parallel'],
  ['crossflow', 'crossflow'],
  ['crossflow, mixed cmin', 'crossflow_mixed_cmin'],
  ['crossflow, mixed cmax', 'crossflow_mixed_cmax'],
  ['crossflow_mixed_cmin', 'crossflow_mixed_cmin'],
  ['crossflow_mixed_cmax', 'crossflow_mixed_cmax'],
  ['boiler', 'boiler'],
  ['condenser', 'condenser'],
]);

const SHELL_AND_TUBE_TAG = /^(\d*)\s*s&t$/;

export const CONFIGURATION_KINDS: readonly ConfigurationKind[] = [
  'counterflow',
  'parallel',
  'shell_and_tube',
  'crossflow',
  'crossflow_mixed_cmin',
  'crossflow_mixed_cmax',
  'boiler',
  'condenser',
];

const KIND_LABEL: Record<ConfigurationKind, string> = {
  counterflow: 'Counterflow',
  parallel: 'Parallel flow',
  shell_and_tube: 'Shell & tube (TEMA E)',
  crossflow: 'Crossflow, both unmixed',
  crossflow_mixed_cmin: 'Crossflow, Cmin mixed',
  crossflow_mixed_cmax: 'Crossflow, Cmax mixed',
  boiler: 'Boiler',
  condenser: 'Condenser',
};

export function shellAndTube(shells = 1): ExchangerConfiguration {
  if (!Number.isInteger(shells) || shells < 1) {
    throw new InvalidInputError('shells', `Shell count must be a positive integer; got ${shells}.`);
  }
  return { kind: 'shell_and_tube', shells };
}

/**
 * Parse a configuration tag into the typed variant.
 *
 * Matching is case-insensitive. 'S&T' is one shell; '<n>S&T' is n shells in
 * series.
 */
export function parseConfiguration(tag: string): ExchangerConfiguration {
  const key = tag.trim().toLowerCase();

  const kind = TAG_TO_KIND.get(key);
  if (kind !== undefined) return { kind };

  const match = SHELL_AND_TUBE_TAG.exec(key);
  if (match) {
    const prefix = match[1];
    return shellAndTube(prefix ? parseInt(prefix, 10) : 1);
  }

  throw new UnknownConfigurationError(tag);
}

/** Accept either an already-typed configuration or a tag string. */
export function normalizeConfiguration(configuration: ExchangerConfiguration | string): ExchangerConfiguration {
  if (typeof configuration === 'string') return parseConfiguration(configuration);
  if (configuration.kind === 'shell_and_tube') return shellAndTube(configuration.shells);
  return configuration;
}

export function describeConfiguration(configuration: ExchangerConfiguration): string {
  if (configuration.kind === 'shell_and_tube') {
    return configuration.shells === 1
      ? KIND_LABEL.shell_and_tube
      : `${KIND_LABEL.shell_and_tube} × ${configuration.shells} shells`;
  }
  return KIND_LABEL[configuration.kind];
}

/** Inverse of parseConfiguration, producing the canonical tag string. */
export function configurationTag(configuration: ExchangerConfiguration): string {
  switch (configuration.kind) {
    case 'shell_and_tube':
      return configuration.shells === 1 ? 'S&T' : `${configuration.shells}S&T`;
    case 'crossflow_mixed_cmin':
      return 'crossflow, mixed Cmin';
    case 'crossflow_mixed_cmax':
      return 'crossflow, mixed Cmax';
    default:
      return configuration.kind;
  }
}
