import { describe, it, expect } from 'vitest';
import {
  temperatureEffectiveness,
  temperatureEffectivenessBasic,
  temperatureEffectivenessTemaH,
  temperatureEffectivenessTemaJ,
  runTemperatureEffectivenessModule,
  stream2View,
  effectivenessFromPntu,
} from '../modules/TemperatureEffectivenessModule';
import { effectivenessFromNtu } from '../modules/EffectivenessNtuModule';
import type { BasicFlowArrangement } from '../schema/ExchangerInputV1';
import { InvalidInputError, UnsupportedPassCountError } from '../../contracts/ExchangerErrors';

const ARRANGEMENTS: BasicFlowArrangement[] = [
  'counterflow',
  'parallel',
  'crossflow',
  'crossflow_mixed_1',
  'crossflow_mixed_2',
  'crossflow_mixed_12',
];

describe('TemperatureEffectivenessModule', () => {
  describe('basic arrangements', () => {
    it('evaluates every arrangement at R1 = 0.5, NTU1 = 2', () => {
      const expected: Record<BasicFlowArrangement, number> = {
        counterflow: 0.7746003264394359,
        parallel: 0.6334752877547574,
        crossflow: 0.7387584625420098,
        crossflow_mixed_1: 0.7175464361494597,
        crossflow_mixed_2: 0.7020127152802531,
        crossflow_mixed_12: 0.6908434249226126,
      };
      for (const arrangement of ARRANGEMENTS) {
        expect(temperatureEffectivenessBasic(0.5, 2, arrangement)).toBeCloseTo(expected[arrangement], 12);
      }
    });

    it('evaluates every arrangement with stream 1 the larger capacity', () => {
      const expected: Record<BasicFlowArrangement, number> = {
        counterflow: 0.38730016321971794,
        parallel: 0.3167376438773787,
        crossflow: 0.35100635764012655,
        crossflow_mixed_1: 0.35100635764012655,
        crossflow_mixed_2: 0.35877321807472984,
        crossflow_mixed_12: 0.3454217124613063,
      };
      for (const arrangement of ARRANGEMENTS) {
        expect(temperatureEffectivenessBasic(2, 1, arrangement)).toBeCloseTo(expected[arrangement], 12);
      }
    });

    it('agrees with the counterflow reference point', () => {
      expect(temperatureEffectivenessBasic(0.1, 4, 'counterflow')).toBeCloseTo(0.9753412729761263, 12);
    });

    it('uses NTU1/(1+NTU1) for balanced counterflow', () => {
      expect(temperatureEffectivenessBasic(1, 3, 'counterflow')).toBe(0.75);
    });

    it('reduces to 1 − exp(−NTU1) when R1 = 0', () => {
      for (const arrangement of ARRANGEMENTS) {
        expect(temperatureEffectivenessBasic(0, 2, arrangement)).toBeCloseTo(1 - Math.exp(-2), 14);
      }
    });

    it('is zero when NTU1 = 0', () => {
      for (const arrangement of ARRANGEMENTS) {
        expect(temperatureEffectivenessBasic(0.5, 0, arrangement)).toBe(0);
      }
    });

    it('rejects negative inputs', () => {
      expect(() => temperatureEffectivenessBasic(-0.5, 1, 'parallel')).toThrow(InvalidInputError);
      expect(() => temperatureEffectivenessBasic(0.5, -1, 'parallel')).toThrow(InvalidInputError);
    });
  });

  describe('TEMA J', () => {
    it('evaluates 1, 2 and 4 tube passes', () => {
      expect(temperatureEffectivenessTemaJ(1 / 3, 1, 1)).toBeCloseTo(0.5699085193651295, 12);
      expect(temperatureEffectivenessTemaJ(1 / 3, 1, 2)).toBeCloseTo(0.5688878232315694, 12);
      expect(temperatureEffectivenessTemaJ(1 / 3, 1, 4)).toBeCloseTo(0.5688711846568248, 12);
    });

    it('is continuous through the R1 = 2 branch', () => {
      const atTwo = temperatureEffectivenessTemaJ(2, 1, 1);
      expect(atTwo).toBeCloseTo(0.3580830895954234, 12);
      expect(Math.abs(temperatureEffectivenessTemaJ(2 - 1e-6, 1, 1) - atTwo)).toBeLessThan(1e-6);
      expect(Math.abs(temperatureEffectivenessTemaJ(2 + 1e-6, 1, 1) - atTwo)).toBeLessThan(1e-6);
    });

    it('rejects unsupported pass counts', () => {
      expect(() => temperatureEffectivenessTemaJ(0.5, 1, 3)).toThrow(UnsupportedPassCountError);
      expect(() => temperatureEffectivenessTemaJ(0.5, 1, 3)).toThrow(
        'TEMA J correlations support 1, 2, 4 tube passes; got 3.',
      );
    });

    it('requires R1 > 0', () => {
      expect(() => temperatureEffectivenessTemaJ(0, 1, 1)).toThrow('TEMA shell correlations require R1 > 0.');
    });
  });

  describe('TEMA H', () => {
    it('evaluates one pass and both two-pass orientations', () => {
      expect(temperatureEffectivenessTemaH(1 / 3, 1, 1)).toBeCloseTo(0.5730728284905833, 12);
      expect(temperatureEffectivenessTemaH(1 / 3, 1, 2)).toBeCloseTo(0.5824437803128222, 12);
      expect(temperatureEffectivenessTemaH(1 / 3, 1, 2, false)).toBeCloseTo(0.5560057072310012, 12);
    });

    it('the optimal two-pass orientation outperforms the reversed one', () => {
      expect(temperatureEffectivenessTemaH(1 / 3, 1, 2, true)).toBeGreaterThan(
        temperatureEffectivenessTemaH(1 / 3, 1, 2, false),
      );
    });

    it('is continuous through its removable singularities', () => {
      const cases: Array<[number, 1 | 2, boolean, number]> = [
        [2, 1, true, 0.3640257049950876],
        [4, 2, true, 0.2366953352462191],
        [4, 2, false, 0.19223481412807347],
      ];
      for (const [R1, Ntp, optimal, expected] of cases) {
        const at = temperatureEffectivenessTemaH(R1, 1, Ntp, optimal);
        expect(at).toBeCloseTo(expected, 12);
        expect(Math.abs(temperatureEffectivenessTemaH(R1 - 1e-6, 1, Ntp, optimal) - at)).toBeLessThan(1e-6);
        expect(Math.abs(temperatureEffectivenessTemaH(R1 + 1e-6, 1, Ntp, optimal) - at)).toBeLessThan(1e-6);
      }
    });

    it('rejects unsupported pass counts', () => {
      expect(() => temperatureEffectivenessTemaH(0.5, 1, 4)).toThrow(
        'TEMA H correlations support 1, 2 tube passes; got 4.',
      );
    });
  });

  describe('dispatch and stream views', () => {
    it('routes each family to its correlation', () => {
      expect(temperatureEffectiveness(0.5, 2, { family: 'basic', arrangement: 'parallel' })).toBeCloseTo(
        0.6334752877547574,
        12,
      );
      expect(temperatureEffectiveness(1 / 3, 1, { family: 'tema_j', tubePasses: 4 })).toBeCloseTo(
        0.5688711846568248,
        12,
      );
      expect(
        temperatureEffectiveness(1 / 3, 1, { family: 'tema_h', tubePasses: 2, optimal: false }),
      ).toBeCloseTo(0.5560057072310012, 12);
    });

    it('builds the stream-1 state from capacity rates and UA', () => {
      const state = runTemperatureEffectivenessModule({
        C1: 1000,
        C2: 3000,
        UA: 1000,
        configuration: { family: 'tema_j', tubePasses: 1 },
      });
      expect(state.R1).toBeCloseTo(1 / 3, 15);
      expect(state.NTU1).toBe(1);
      expect(state.P1).toBeCloseTo(0.5699085193651295, 12);
      expect(state.Ntp).toBe(1);
    });

    it('omits Ntp for basic arrangements', () => {
      const state = runTemperatureEffectivenessModule({
        C1: 1000,
        C2: 2000,
        UA: 2000,
        configuration: { family: 'basic', arrangement: 'counterflow' },
      });
      expect(state.Ntp).toBeUndefined();
      expect(state.P1).toBeCloseTo(0.7746003264394359, 12);
    });

    it('mirrors the state onto stream 2', () => {
      const view = stream2View({ R1: 2, NTU1: 1, P1: 0.38730016321971794 });
      expect(view.R2).toBe(0.5);
      expect(view.NTU2).toBe(2);
      expect(view.P2).toBeCloseTo(temperatureEffectivenessBasic(0.5, 2, 'counterflow'), 12);
    });

    it('maps onto the Cmin frame of the ε-NTU method', () => {
      const state = runTemperatureEffectivenessModule({
        C1: 3000,
        C2: 1000,
        UA: 3000,
        configuration: { family: 'basic', arrangement: 'counterflow' },
      });
      const frame = effectivenessFromPntu(state);
      expect(frame.Cr).toBeCloseTo(1 / 3, 15);
      expect(frame.NTU).toBe(3);
      expect(frame.effectiveness).toBeCloseTo(effectivenessFromNtu(3, 1 / 3, { kind: 'counterflow' }), 12);
    });

    it('rejects non-positive capacity rates', () => {
      expect(() =>
        runTemperatureEffectivenessModule({
          C1: 0,
          C2: 1000,
          UA: 100,
          configuration: { family: 'basic', arrangement: 'parallel' },
        }),
      ).toThrow(InvalidInputError);
    });
  });
});
