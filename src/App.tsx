import { useState } from 'react';
import ExchangerCalculator from './components/ExchangerCalculator';
import PntuExplorer from './components/PntuExplorer';
import './App.css';

type Journey = 'landing' | 'calculator' | 'pntu';

export default function App() {
  const [journey, setJourney] = useState<Journey>('landing');

  if (journey === 'calculator') return <ExchangerCalculator onBack={() => setJourney('landing')} />;
  if (journey === 'pntu') return <PntuExplorer onBack={() => setJourney('landing')} />;

  return (
    <div className="landing">
      <div className="hero">
        <h1>🔥 Heat Exchanger ε-NTU Engine</h1>
        <p className="subtitle">Rating &amp; sizing of two-stream exchangers</p>
        <p className="tagline">
          Closed-form effectiveness correlations for the common flow arrangements,
          with P-NTU relations for TEMA J and H shells.
        </p>
      </div>
      <div className="journey-cards">
        <div className="journey-card fast" onClick={() => setJourney('calculator')}>
          <div className="card-icon">🧮</div>
          <h2>ε-NTU Calculator</h2>
          <p className="card-time">Rating or sizing</p>
          <p>Enter stream flows and heat capacities, the temperatures you know and optionally UA.</p>
          <ul>
            <li>Counterflow, parallel, crossflow &amp; shell-and-tube</li>
            <li>Feasibility check against the maximum effectiveness</li>
            <li>ε-NTU chart with the operating point</li>
          </ul>
          <button className="cta-btn">Open Calculator →</button>
        </div>
        <div className="journey-card full" onClick={() => setJourney('pntu')}>
          <div className="card-icon">🔬</div>
          <h2>P-NTU Explorer</h2>
          <p className="card-time">Temperature effectiveness</p>
          <p>Evaluate P1 for a named stream across basic arrangements and TEMA shells.</p>
          <ul>
            <li>TEMA J with 1, 2 or 4 tube passes</li>
            <li>TEMA H with 1 or 2 tube passes</li>
            <li>Stream-2 view and ε-NTU equivalent</li>
          </ul>
          <button className="cta-btn">Open Explorer →</button>
        </div>
      </div>
    </div>
  );
}
