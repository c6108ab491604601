import { describe, it, expect } from 'vitest';
import { buildEffectivenessCurve } from '../CurveBuilder';
import { effectivenessFromNtu } from '../modules/EffectivenessNtuModule';
import { InvalidInputError, UnknownConfigurationError } from '../../contracts/ExchangerErrors';

describe('buildEffectivenessCurve', () => {
  const curve = buildEffectivenessCurve({
    Cr: 0.5,
    configurations: ['counterflow', { kind: 'parallel' }],
    ntuMax: 4,
    points: 5,
  });

  it('names one series per configuration, in order', () => {
    expect(curve.series).toEqual(['Counterflow', 'Parallel flow']);
  });

  it('samples NTU evenly over [0, ntuMax]', () => {
    expect(curve.rows.map(row => row.ntu)).toEqual([0, 1, 2, 3, 4]);
  });

  it('starts every series at zero effectiveness', () => {
    expect(curve.rows[0]).toEqual({ ntu: 0, Counterflow: 0, 'Parallel flow': 0 });
  });

  it('fills each column from the forward correlation', () => {
    expect(curve.rows[4]?.Counterflow).toBeCloseTo(0.9274211165042462, 12);
    expect(curve.rows[1]?.['Parallel flow']).toBeCloseTo(0.5179132265677134, 12);
    expect(curve.rows[2]?.Counterflow).toBe(effectivenessFromNtu(2, 0.5, { kind: 'counterflow' }));
  });

  it('validates the grid', () => {
    expect(() =>
      buildEffectivenessCurve({ Cr: 0.5, configurations: ['counterflow'], ntuMax: 4, points: 1 }),
    ).toThrow(InvalidInputError);
    expect(() =>
      buildEffectivenessCurve({ Cr: 0.5, configurations: ['counterflow'], ntuMax: 0, points: 5 }),
    ).toThrow(InvalidInputError);
    expect(() =>
      buildEffectivenessCurve({ Cr: 1.5, configurations: ['counterflow'], ntuMax: 4, points: 5 }),
    ).toThrow(InvalidInputError);
  });

  it('rejects a configuration listed twice', () => {
    try {
      buildEffectivenessCurve({
        Cr: 0.5,
        configurations: ['counterflow', { kind: 'counterflow' }],
        ntuMax: 4,
        points: 5,
      });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(InvalidInputError);
      if (e instanceof InvalidInputError) {
        expect(e.field).toBe('configurations');
        expect(e.message).toBe('Configuration "Counterflow" is listed more than once.');
      }
    }
  });

  it('rejects unknown configuration tags', () => {
    expect(() =>
      buildEffectivenessCurve({ Cr: 0.5, configurations: ['helical'], ntuMax: 4, points: 5 }),
    ).toThrow(UnknownConfigurationError);
  });
});
