/**
 * ExchangerInputV1: value types shared by every engine module.
 *
 * Units are consistent SI-derived throughout:
 *   mass flow kg/s · specific heat J/(kg·K) · temperature K or °C · UA W/K · Q W
 */

export interface StreamPair {
  mh: number;  // kg/s, hot stream mass flow
  mc: number;  // kg/s, cold stream mass flow
  Cph: number; // J/(kg·K), averaged hot-stream heat capacity
  Cpc: number; // J/(kg·K), averaged cold-stream heat capacity
}

export interface CapacityRates {
  Ch: number;   // W/K
  Cc: number;   // W/K
  Cmin: number; // W/K
  Cmax: number; // W/K
  /** Cmin / Cmax, always in [0, 1]. */
  Cr: number;
}

/**
 * Flow arrangements of the ε-NTU correlation library.
 *
 * `crossflow` is single-pass crossflow with both fluids unmixed.
 * `shell_and_tube` is TEMA E (one shell pass, even tube passes), N shells in
 * series with equal UA.
 */
export type ExchangerConfiguration =
  | { kind: 'counterflow' }
  | { kind: 'parallel' }
  | { kind: 'crossflow' }
  | { kind: 'crossflow_mixed_cmin' }
  | { kind: 'crossflow_mixed_cmax' }
  | { kind: 'boiler' }
  | { kind: 'condenser' }
  | { kind: 'shell_and_tube'; shells: number };

export type ConfigurationKind = ExchangerConfiguration['kind'];

export interface ThermalState {
  Q: number;             // W
  UA: number;            // W/K
  Cr: number;
  Cmin: number;          // W/K
  Cmax: number;          // W/K
  effectiveness: number;
  NTU: number;
  Thi: number;
  Tho: number;
  Tci: number;
  Tco: number;
}

export interface HeatBalanceInputV1 {
  streams: StreamPair;
  configuration: ExchangerConfiguration;
  Thi?: number;
  Tho?: number;
  Tci?: number;
  Tco?: number;
  /** When supplied the solver rates the exchanger; otherwise it sizes it. */
  UA?: number;
}

export interface HeatBalanceOptions {
  /** Relative Q mismatch allowed when all four temperatures are given (default 0.01). */
  consistencyTolerance?: number;
}

export type RatingAnchor = 'Thi_Tci' | 'Tho_Tco' | 'Thi_Tco' | 'Tho_Tci';

export type HeatBalanceMode = 'rating' | 'sizing';

export interface HeatBalanceResultV1 {
  state: ThermalState;
  mode: HeatBalanceMode;
  /** Temperature pair that anchored Q in rating mode. */
  anchor?: RatingAnchor;
  /** True when sizing mode cross-checked two independently computed duties. */
  crossChecked?: boolean;
}

// ── P-NTU ────────────────────────────────────────────────────────────────────

export type BasicFlowArrangement =
  | 'counterflow'
  | 'parallel'
  | 'crossflow'
  | 'crossflow_mixed_1'
  | 'crossflow_mixed_2'
  | 'crossflow_mixed_12';

export type PntuConfiguration =
  | { family: 'basic'; arrangement: BasicFlowArrangement }
  | { family: 'tema_j'; tubePasses: number }
  | { family: 'tema_h'; tubePasses: number; optimal?: boolean };

export interface PntuState {
  R1: number;   // C1 / C2
  NTU1: number; // UA / C1
  P1: number;
  /** Tube passes, for TEMA shell families. */
  Ntp?: number;
}

export interface PntuInputV1 {
  C1: number; // W/K, capacity rate of the distinguished stream
  C2: number; // W/K
  UA: number; // W/K
  configuration: PntuConfiguration;
}

// ── Engine facade ────────────────────────────────────────────────────────────

export interface ExchangerInputV1 extends Omit<HeatBalanceInputV1, 'configuration'> {
  /** Typed variant, or a tag such as 'counterflow', 'crossflow, mixed Cmax' or '3S&T'. */
  configuration: ExchangerConfiguration | string;
}

export interface EngineResultV1 {
  state: ThermalState;
  mode: HeatBalanceMode;
  configuration: ExchangerConfiguration;
  configurationLabel: string;
  /** Heat duty at unit effectiveness, Cmin·(Thi − Tci) (W). */
  qMaxW: number;
  notes: string[];
}
