import { useState, type ReactNode } from 'react';
import type {
  ConfigurationKind,
  EngineResultV1,
  ExchangerConfiguration,
  ExchangerInputV1,
  ThermalState,
} from '../engine/schema/ExchangerInputV1';
import { runEngine } from '../engine/Engine';
import { calcCr } from '../engine/modules/CapacityRateModule';
import {
  CONFIGURATION_KINDS,
  describeConfiguration,
  shellAndTube,
} from '../engine/normalizer/ConfigurationNormalizer';
import { isExchangerError } from '../contracts/ExchangerErrors';
import EffectivenessCurve from './visualizers/EffectivenessCurve';

interface Props {
  onBack: () => void;
}

type KnownMode = 'known' | 'unknown';
type OptionalField = 'Thi' | 'Tho' | 'Tci' | 'Tco' | 'UA';

const OPTIONAL_FIELDS: readonly OptionalField[] = ['Thi', 'Tho', 'Tci', 'Tco', 'UA'];

const FIELD_LABEL: Record<OptionalField, string> = {
  Thi: 'Hot inlet Thi (°C)',
  Tho: 'Hot outlet Tho (°C)',
  Tci: 'Cold inlet Tci (°C)',
  Tco: 'Cold outlet Tco (°C)',
  UA: 'UA (W/K)',
};

const defaultValues: Record<OptionalField, number> = {
  Thi: 130,
  Tho: 110,
  Tci: 15,
  Tco: 85,
  UA: 2975.5,
};

const defaultModes: Record<OptionalField, KnownMode> = {
  Thi: 'known',
  Tho: 'unknown',
  Tci: 'known',
  Tco: 'unknown',
  UA: 'known',
};

const RESULT_ROWS: Array<{ key: keyof ThermalState; label: string; unit: string; digits: number }> = [
  { key: 'Q', label: 'Heat duty Q', unit: 'W', digits: 1 },
  { key: 'UA', label: 'UA', unit: 'W/K', digits: 2 },
  { key: 'effectiveness', label: 'Effectiveness ε', unit: '', digits: 4 },
  { key: 'NTU', label: 'NTU', unit: '', digits: 4 },
  { key: 'Cr', label: 'Cr', unit: '', digits: 4 },
  { key: 'Cmin', label: 'Cmin', unit: 'W/K', digits: 1 },
  { key: 'Cmax', label: 'Cmax', unit: 'W/K', digits: 1 },
  { key: 'Thi', label: 'Thi', unit: '°C', digits: 2 },
  { key: 'Tho', label: 'Tho', unit: '°C', digits: 2 },
  { key: 'Tci', label: 'Tci', unit: '°C', digits: 2 },
  { key: 'Tco', label: 'Tco', unit: '°C', digits: 2 },
];

function toConfiguration(kind: ConfigurationKind, shells: number): ExchangerConfiguration {
  return kind === 'shell_and_tube' ? shellAndTube(shells) : { kind };
}

export default function ExchangerCalculator({ onBack }: Props) {
  const [streams, setStreams] = useState<ExchangerInputV1['streams']>({
    mh: 5.2,
    mc: 0.725,
    Cph: 1860,
    Cpc: 1900,
  });
  const [kind, setKind] = useState<ConfigurationKind>('crossflow_mixed_cmax');
  const [shells, setShells] = useState(1);
  const [values, setValues] = useState(defaultValues);
  const [modes, setModes] = useState(defaultModes);
  const [result, setResult] = useState<EngineResultV1 | null>(null);
  const [error, setError] = useState<string | null>(null);

  function solve() {
    const configuration: ExchangerConfiguration = kind === 'shell_and_tube' ? { kind, shells } : { kind };
    const input: ExchangerInputV1 = { streams, configuration };
    for (const field of OPTIONAL_FIELDS) {
      if (modes[field] === 'known') input[field] = values[field];
    }

    try {
      setResult(runEngine(input));
      setError(null);
    } catch (e) {
      if (!isExchangerError(e)) throw e;
      console.warn(`[ExchangerCalculator] ${e.code}: ${e.message}`);
      setResult(null);
      setError(e.message);
    }
  }

  const chartConfiguration = result?.configuration ?? safeConfiguration(kind, shells);

  return (
    <div className="stepper-container">
      <div className="stepper-header">
        <button className="back-btn" onClick={onBack}>← Back</button>
        <span className="step-label">ε-NTU Calculator</span>
      </div>

      <div className="input-cockpit-layout">
        <div className="step-card">
          <FormGroup title="Streams">
            <div className="form-grid">
              <InputNumber label="Hot mass flow mh (kg/s)" value={streams.mh} min={0} step={0.05}
                onChange={mh => setStreams({ ...streams, mh })} />
              <InputNumber label="Hot Cp (J/kg·K)" value={streams.Cph} min={0} step={10}
                onChange={Cph => setStreams({ ...streams, Cph })} />
              <InputNumber label="Cold mass flow mc (kg/s)" value={streams.mc} min={0} step={0.05}
                onChange={mc => setStreams({ ...streams, mc })} />
              <InputNumber label="Cold Cp (J/kg·K)" value={streams.Cpc} min={0} step={10}
                onChange={Cpc => setStreams({ ...streams, Cpc })} />
            </div>
          </FormGroup>

          <FormGroup title="Flow arrangement">
            <div className="form-grid">
              <div className="form-field">
                <label>Configuration</label>
                <select
                  value={kind}
                  onChange={e => {
                    const next = CONFIGURATION_KINDS.find(k => k === e.target.value);
                    if (next !== undefined) setKind(next);
                  }}
                >
                  {CONFIGURATION_KINDS.map(k => (
                    <option key={k} value={k}>{describeConfiguration(safeConfiguration(k, 1))}</option>
                  ))}
                </select>
              </div>
              <InputNumber label="Shells in series" value={shells} min={1} step={1}
                disabled={kind !== 'shell_and_tube'}
                onChange={setShells} />
            </div>
          </FormGroup>

          <FormGroup title="Temperatures & conductance">
            <p className="form-hint">
              With UA known the exchanger is rated from one temperature pair; without it, give both
              temperatures of one stream and one of the other to size it.
            </p>
            <div className="form-grid">
              {OPTIONAL_FIELDS.map(field => (
                <KnownNumber
                  key={field}
                  label={FIELD_LABEL[field]}
                  mode={modes[field]}
                  value={values[field]}
                  onModeChange={mode => setModes({ ...modes, [field]: mode })}
                  onChange={value => setValues({ ...values, [field]: value })}
                />
              ))}
            </div>
          </FormGroup>

          <div className="step-actions">
            <button className="next-btn" onClick={solve}>Solve</button>
          </div>
        </div>

        <div className="step-card instrument-panel">
          <h2>Result</h2>
          {error && <div className="result-error" role="alert">{error}</div>}
          {result && <ResultPanel result={result} />}
          {!result && !error && <p className="form-hint">Enter the known values and press Solve.</p>}
        </div>
      </div>

      <div className="result-section">
        <h3>Effectiveness against NTU</h3>
        <div style={{ height: 320 }}>
          <EffectivenessCurve
            Cr={result?.state.Cr ?? crFromStreams(streams)}
            configuration={chartConfiguration}
            operatingPoint={result ? { ntu: result.state.NTU, effectiveness: result.state.effectiveness } : undefined}
          />
        </div>
      </div>
    </div>
  );
}

/** Build a configuration for display only, falling back to one shell on a bad count. */
function safeConfiguration(kind: ConfigurationKind, shells: number): ExchangerConfiguration {
  return toConfiguration(kind, Number.isInteger(shells) && shells >= 1 ? shells : 1);
}

function crFromStreams(streams: ExchangerInputV1['streams']): number {
  const Cr = calcCr(streams.mh, streams.mc, streams.Cph, streams.Cpc);
  return Number.isFinite(Cr) && Cr >= 0 && Cr <= 1 ? Cr : 0;
}

function ResultPanel({ result }: { result: EngineResultV1 }) {
  return (
    <div>
      <p className="result-mode">
        <strong>{result.mode === 'rating' ? 'Rating' : 'Sizing'}</strong> · {result.configurationLabel}
      </p>
      <table className="result-table">
        <tbody>
          {RESULT_ROWS.map(row => (
            <tr key={row.key}>
              <th>{row.label}</th>
              <td>{result.state[row.key].toFixed(row.digits)} {row.unit}</td>
            </tr>
          ))}
          <tr>
            <th>Q at ε = 1</th>
            <td>{result.qMaxW.toFixed(1)} W</td>
          </tr>
        </tbody>
      </table>
      {result.notes.length > 0 && (
        <ul className="result-notes">
          {result.notes.map(note => <li key={note}>{note}</li>)}
        </ul>
      )}
    </div>
  );
}

function FormGroup({ title, children }: { title: string; children: ReactNode }) {
  return (
    <section className="cockpit-group">
      <h3>{title}</h3>
      {children}
    </section>
  );
}

function InputNumber({
  label,
  value,
  min,
  step = 1,
  disabled = false,
  onChange,
}: {
  label: string;
  value: number;
  min?: number;
  step?: number;
  disabled?: boolean;
  onChange: (value: number) => void;
}) {
  return (
    <div className="form-field">
      <label>{label}</label>
      <input
        type="number"
        min={min}
        step={step}
        value={value}
        disabled={disabled}
        onChange={e => onChange(Number(e.target.value))}
      />
    </div>
  );
}

function KnownNumber({
  label,
  mode,
  value,
  onModeChange,
  onChange,
}: {
  label: string;
  mode: KnownMode;
  value: number;
  onModeChange: (mode: KnownMode) => void;
  onChange: (value: number) => void;
}) {
  return (
    <div className="form-field">
      <label>{label}</label>
      <div className="known-number">
        <select
          value={mode}
          onChange={e => onModeChange(e.target.value === 'known' ? 'known' : 'unknown')}
        >
          <option value="known">Known</option>
          <option value="unknown">Unknown</option>
        </select>
        <input
          type="number"
          step="any"
          value={value}
          disabled={mode === 'unknown'}
          onChange={e => onChange(Number(e.target.value))}
        />
      </div>
    </div>
  );
}
