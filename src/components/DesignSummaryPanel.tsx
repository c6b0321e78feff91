/**
 * DesignSummaryPanel
 *
 * Headline figures for one engine result: the selected core, turns, losses,
 * temperature rise and the three verification domains.  A NoMatch result
 * renders its message, the parameter suggestions and the closest cores.
 *
 * All formatting lives in summariseDesign() so the panel itself holds no
 * engineering logic.
 */

import type {
  DesignResultV1,
  DomainStatus,
  NoMatchResultV1,
} from '../contracts/DesignResultV1';
import LossBalanceChart from './LossBalanceChart';

// ── Helpers ───────────────────────────────────────────────────────────────────

export interface SummaryRow {
  label: string;
  value: string;
}

interface Tone {
  color: string;
  background: string;
}

const TONES: Record<DomainStatus, Tone> = {
  pass: { color: '#276749', background: '#f0fff4' },
  warning: { color: '#975a16', background: '#fffff0' },
  fail: { color: '#9b2c2c', background: '#fff5f5' },
};

// eslint-disable-next-line react-refresh/only-export-components
export function statusTone(status: DomainStatus): Tone {
  return TONES[status];
}

/** Display rows, in panel order. */
// eslint-disable-next-line react-refresh/only-export-components
export function summariseDesign(result: DesignResultV1): SummaryRow[] {
  const { core, losses, thermal } = result;
  const rows: SummaryRow[] = [
    { label: 'Core', value: `${core.partNumber} (${core.geometry}, ${core.material})` },
    { label: 'Ap', value: `${core.apCm4.toFixed(3)} cm⁴ (required ${result.sizing.requiredApCm4.toFixed(3)} cm⁴)` },
    { label: 'Bmax', value: `${result.sizing.bmaxT.toFixed(3)} T` },
  ];

  if (result.kind === 'transformer') {
    const [primary, secondary] = result.winding.windings;
    rows.push({ label: 'Turns', value: `${primary.turns} : ${secondary.turns}` });
  } else {
    rows.push({ label: 'Turns', value: `${result.winding.windings[0].turns}` });
    rows.push({
      label: 'Air gap',
      value: result.gap.gapNeeded ? `${result.gap.gapMm.toFixed(2)} mm` : 'none',
    });
    rows.push({ label: 'Inductance', value: `${result.calculatedInductanceUH.toFixed(1)} µH` });
  }

  rows.push(
    { label: 'Window fill', value: `Ku = ${result.winding.windowUtilization.toFixed(2)}` },
    { label: 'Total loss', value: `${losses.totalLossW.toFixed(2)} W` },
  );
  if (losses.efficiencyPercent !== null) {
    rows.push({ label: 'Efficiency', value: `${losses.efficiencyPercent.toFixed(1)}%` });
  }
  rows.push({ label: 'Temperature rise', value: `${thermal.temperatureRiseC.toFixed(1)}°C` });
  return rows;
}

// ── Sub-views ─────────────────────────────────────────────────────────────────

function StatusChip({ label, status }: { label: string; status: DomainStatus }) {
  const tone = statusTone(status);
  return (
    <span style={{
      fontSize: '0.72rem', fontWeight: 600,
      color: tone.color, background: tone.background,
      padding: '2px 8px', borderRadius: 4, marginRight: 6,
    }}>
      {label}: {status}
    </span>
  );
}

function NoMatchView({ result }: { result: NoMatchResultV1 }) {
  return (
    <div>
      <p style={{ fontSize: '0.85rem', fontWeight: 700, color: '#9b2c2c' }}>{result.message}</p>
      <ul style={{ fontSize: '0.78rem', color: '#4a5568' }}>
        {result.suggestions.map(s => (
          <li key={s.parameter}>
            {s.parameter}: {s.currentValue} → {s.suggestedValue} {s.unit} ({s.impact})
          </li>
        ))}
      </ul>
      <ul style={{ fontSize: '0.78rem', color: '#4a5568' }}>
        {result.closestCores.map(c => (
          <li key={c.partNumber}>{c.partNumber}: {c.notes}</li>
        ))}
      </ul>
    </div>
  );
}

// ── Component ─────────────────────────────────────────────────────────────────

interface Props {
  result: DesignResultV1 | NoMatchResultV1;
}

export default function DesignSummaryPanel({ result }: Props) {
  if (result.kind === 'no_match') return <NoMatchView result={result} />;

  const { verification } = result;
  return (
    <div>
      <div style={{ marginBottom: 8 }}>
        <StatusChip label="Electrical" status={verification.electrical} />
        <StatusChip label="Mechanical" status={verification.mechanical} />
        <StatusChip label="Thermal" status={verification.thermal} />
      </div>
      <table style={{ fontSize: '0.8rem', color: '#2d3748' }}>
        <tbody>
          {summariseDesign(result).map(row => (
            <tr key={row.label}>
              <td style={{ fontWeight: 600, paddingRight: 12 }}>{row.label}</td>
              <td>{row.value}</td>
            </tr>
          ))}
        </tbody>
      </table>
      {[...verification.errors, ...verification.warnings].map(message => (
        <p key={message} style={{ fontSize: '0.75rem', color: '#744210', margin: '4px 0' }}>{message}</p>
      ))}
      <div style={{ height: 220 }}>
        <LossBalanceChart losses={result.losses} />
      </div>
    </div>
  );
}
