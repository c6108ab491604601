import { useMemo, useState } from 'react';
import type { BasicFlowArrangement, PntuConfiguration } from '../engine/schema/ExchangerInputV1';
import {
  TEMA_H_TUBE_PASSES,
  TEMA_J_TUBE_PASSES,
  effectivenessFromPntu,
  runTemperatureEffectivenessModule,
  stream2View,
} from '../engine/modules/TemperatureEffectivenessModule';
import { isExchangerError } from '../contracts/ExchangerErrors';

interface Props {
  onBack: () => void;
}

type Family = PntuConfiguration['family'];

const FAMILIES: ReadonlyArray<{ id: Family; label: string }> = [
  { id: 'basic', label: 'Basic arrangement' },
  { id: 'tema_j', label: 'TEMA J (divided flow)' },
  { id: 'tema_h', label: 'TEMA H (double split flow)' },
];

const ARRANGEMENTS: ReadonlyArray<{ id: BasicFlowArrangement; label: string }> = [
  { id: 'counterflow', label: 'Counterflow' },
  { id: 'parallel', label: 'Parallel flow' },
  { id: 'crossflow', label: 'Crossflow, both unmixed' },
  { id: 'crossflow_mixed_1', label: 'Crossflow, stream 1 mixed' },
  { id: 'crossflow_mixed_2', label: 'Crossflow, stream 2 mixed' },
  { id: 'crossflow_mixed_12', label: 'Crossflow, both mixed' },
];

export default function PntuExplorer({ onBack }: Props) {
  const [C1, setC1] = useState(1000);
  const [C2, setC2] = useState(3000);
  const [UA, setUA] = useState(1000);
  const [family, setFamily] = useState<Family>('tema_j');
  const [arrangement, setArrangement] = useState<BasicFlowArrangement>('counterflow');
  const [tubePasses, setTubePasses] = useState(1);
  const [optimal, setOptimal] = useState(true);

  const passOptions: readonly number[] = family === 'tema_h' ? TEMA_H_TUBE_PASSES : TEMA_J_TUBE_PASSES;

  const outcome = useMemo(() => {
    const configuration: PntuConfiguration =
      family === 'basic' ? { family, arrangement }
        : family === 'tema_h' ? { family, tubePasses, optimal }
          : { family, tubePasses };
    try {
      const state = runTemperatureEffectivenessModule({ C1, C2, UA, configuration });
      return { state, stream2: stream2View(state), frame: effectivenessFromPntu(state), error: null };
    } catch (e) {
      if (!isExchangerError(e)) throw e;
      console.warn(`[PntuExplorer] ${e.code}: ${e.message}`);
      return { state: null, stream2: null, frame: null, error: e.message };
    }
  }, [C1, C2, UA, family, arrangement, tubePasses, optimal]);

  return (
    <div className="stepper-container">
      <div className="stepper-header">
        <button className="back-btn" onClick={onBack}>← Back</button>
        <span className="step-label">P-NTU Explorer</span>
      </div>

      <div className="input-cockpit-layout">
        <div className="step-card">
          <section className="cockpit-group">
            <h3>Streams</h3>
            <div className="form-grid">
              <NumberField label="C1 (W/K)" value={C1} onChange={setC1} />
              <NumberField label="C2 (W/K)" value={C2} onChange={setC2} />
              <NumberField label="UA (W/K)" value={UA} onChange={setUA} />
            </div>
          </section>

          <section className="cockpit-group">
            <h3>Correlation</h3>
            <div className="form-grid">
              <div className="form-field">
                <label>Family</label>
                <select
                  value={family}
                  onChange={e => {
                    const next = FAMILIES.find(f => f.id === e.target.value);
                    if (next) {
                      setFamily(next.id);
                      setTubePasses(1);
                    }
                  }}
                >
                  {FAMILIES.map(f => <option key={f.id} value={f.id}>{f.label}</option>)}
                </select>
              </div>
              {family === 'basic' ? (
                <div className="form-field">
                  <label>Arrangement</label>
                  <select
                    value={arrangement}
                    onChange={e => {
                      const next = ARRANGEMENTS.find(a => a.id === e.target.value);
                      if (next) setArrangement(next.id);
                    }}
                  >
                    {ARRANGEMENTS.map(a => <option key={a.id} value={a.id}>{a.label}</option>)}
                  </select>
                </div>
              ) : (
                <div className="form-field">
                  <label>Tube passes</label>
                  <select value={tubePasses} onChange={e => setTubePasses(Number(e.target.value))}>
                    {passOptions.map(n => <option key={n} value={n}>{n}</option>)}
                  </select>
                </div>
              )}
              {family === 'tema_h' && tubePasses === 2 && (
                <div className="form-field">
                  <label>
                    <input type="checkbox" checked={optimal} onChange={e => setOptimal(e.target.checked)} />
                    {' '}Tube inlet in the optimal orientation
                  </label>
                </div>
              )}
            </div>
          </section>
        </div>

        <div className="step-card instrument-panel">
          <h2>Temperature effectiveness</h2>
          {outcome.error !== null && <div className="result-error" role="alert">{outcome.error}</div>}
          {outcome.state && outcome.stream2 && outcome.frame && (
            <table className="result-table">
              <tbody>
                <tr><th>R1 = C1/C2</th><td>{outcome.state.R1.toFixed(4)}</td></tr>
                <tr><th>NTU1 = UA/C1</th><td>{outcome.state.NTU1.toFixed(4)}</td></tr>
                <tr><th>P1</th><td>{outcome.state.P1.toFixed(4)}</td></tr>
                <tr><th>R2 / NTU2 / P2</th>
                  <td>
                    {outcome.stream2.R2.toFixed(4)} / {outcome.stream2.NTU2.toFixed(4)} / {outcome.stream2.P2.toFixed(4)}
                  </td>
                </tr>
                <tr><th>ε at Cr = {outcome.frame.Cr.toFixed(4)}</th><td>{outcome.frame.effectiveness.toFixed(4)}</td></tr>
              </tbody>
            </table>
          )}
        </div>
      </div>
    </div>
  );
}

function NumberField({ label, value, onChange }: { label: string; value: number; onChange: (value: number) => void }) {
  return (
    <div className="form-field">
      <label>{label}</label>
      <input type="number" min={0} step="any" value={value} onChange={e => onChange(Number(e.target.value))} />
    </div>
  );
}
