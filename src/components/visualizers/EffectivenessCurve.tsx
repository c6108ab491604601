import { useMemo } from 'react';
import {
  LineChart,
  Line,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip,
  Legend,
  ResponsiveContainer,
  ReferenceDot,
} from 'recharts';
import type { ExchangerConfiguration } from '../../engine/schema/ExchangerInputV1';
import { buildEffectivenessCurve } from '../../engine/CurveBuilder';
import { configurationTag } from '../../engine/normalizer/ConfigurationNormalizer';

interface Props {
  Cr: number;
  configuration: ExchangerConfiguration;
  operatingPoint?: { ntu: number; effectiveness: number };
}

const SERIES_COLOURS = ['#3182ce', '#ed8936', '#38a169'];

// Counterflow and parallel flow bound every other arrangement
const BOUNDS: ExchangerConfiguration[] = [{ kind: 'counterflow' }, { kind: 'parallel' }];

export default function EffectivenessCurve({ Cr, configuration, operatingPoint }: Props) {
  const ntuMax = Math.max(5, Math.ceil((operatingPoint?.ntu ?? 0) * 1.5));

  const curve = useMemo(() => {
    const seen = new Set<string>();
    const configurations = [configuration, ...BOUNDS].filter(c => {
      const tag = configurationTag(c);
      if (seen.has(tag)) return false;
      seen.add(tag);
      return true;
    });
    return buildEffectivenessCurve({ Cr, configurations, ntuMax, points: 81 });
  }, [Cr, configuration, ntuMax]);

  return (
    <ResponsiveContainer width="100%" height="100%">
      <LineChart data={curve.rows} margin={{ top: 5, right: 20, left: 0, bottom: 5 }}>
        <CartesianGrid strokeDasharray="3 3" stroke="#f0f0f0" />
        <XAxis
          dataKey="ntu"
          type="number"
          domain={[0, ntuMax]}
          tick={{ fontSize: 10 }}
          tickFormatter={(v: number) => v.toFixed(1)}
          label={{ value: 'NTU', position: 'insideBottom', offset: -2, fontSize: 11 }}
        />
        <YAxis
          domain={[0, 1]}
          tick={{ fontSize: 10 }}
          label={{ value: 'Effectiveness ε', angle: -90, position: 'insideLeft', fontSize: 11 }}
        />
        <Tooltip
          contentStyle={{ fontSize: '0.85rem', borderRadius: '8px' }}
          labelFormatter={label => (typeof label === 'number' ? `NTU ${label.toFixed(2)}` : String(label))}
          formatter={(value, name) => [typeof value === 'number' ? value.toFixed(4) : String(value), name]}
        />
        <Legend wrapperStyle={{ fontSize: '0.8rem', paddingTop: '8px' }} />
        {curve.series.map((label, i) => (
          <Line
            key={label}
            type="monotone"
            dataKey={label}
            stroke={SERIES_COLOURS[i % SERIES_COLOURS.length]}
            strokeWidth={i === 0 ? 2.5 : 1.5}
            strokeDasharray={i === 0 ? undefined : '4 4'}
            dot={false}
            isAnimationActive={false}
          />
        ))}
        {operatingPoint && (
          <ReferenceDot
            x={operatingPoint.ntu}
            y={operatingPoint.effectiveness}
            r={5}
            fill="#e53e3e"
            stroke="none"
          />
        )}
      </LineChart>
    </ResponsiveContainer>
  );
}
