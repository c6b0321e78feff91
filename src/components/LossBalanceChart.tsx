/**
 * LossBalanceChart
 *
 * Stacked bar of core loss against per-winding copper loss for one design.
 * The dashed reference line marks the core loss that would sit at the
 * Pfe = Pcu balance point.
 */
import {
  BarChart,
  Bar,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip,
  Legend,
  ResponsiveContainer,
  ReferenceLine,
} from 'recharts';
import type { LossBreakdownV1, WindingName } from '../contracts/DesignResultV1';

export interface LossChartRow {
  label: string;
  'Core (W)': number;
  'Copper (W)': number;
}

const WINDING_LABELS: Record<WindingName, string> = {
  primary: 'Primary',
  secondary: 'Secondary',
  main: 'Winding',
};

function roundMw(watts: number): number {
  return Math.round(watts * 1000) / 1000;
}

/** One row for the core, one per winding, then the total. Values rounded to mW. */
// eslint-disable-next-line react-refresh/only-export-components
export function buildLossChartData(losses: LossBreakdownV1): LossChartRow[] {
  return [
    { label: 'Core', 'Core (W)': roundMw(losses.coreLossW), 'Copper (W)': 0 },
    ...losses.copperLossW.map(w => ({
      label: WINDING_LABELS[w.winding],
      'Core (W)': 0,
      'Copper (W)': roundMw(w.lossW),
    })),
    {
      label: 'Total',
      'Core (W)': roundMw(losses.coreLossW),
      'Copper (W)': roundMw(losses.totalCopperLossW),
    },
  ];
}

const BALANCE_COLOURS: Record<LossBreakdownV1['balance'], string> = {
  optimal: '#38a169',
  core_dominated: '#dd6b20',
  copper_dominated: '#3182ce',
};

interface Props {
  losses: LossBreakdownV1;
}

export default function LossBalanceChart({ losses }: Props) {
  const data = buildLossChartData(losses);

  return (
    <ResponsiveContainer width="100%" height="100%">
      <BarChart data={data} margin={{ top: 5, right: 20, left: 0, bottom: 5 }}>
        <CartesianGrid strokeDasharray="3 3" stroke="#f0f0f0" />
        <XAxis dataKey="label" tick={{ fontSize: 10 }} />
        <YAxis
          tick={{ fontSize: 10 }}
          label={{ value: 'Loss (W)', angle: -90, position: 'insideLeft', fontSize: 11 }}
        />
        <Tooltip<number, string>
          contentStyle={{ fontSize: '0.85rem', borderRadius: '8px' }}
          formatter={(value: number | undefined, name: string | undefined) => [value !== undefined ? `${value} W` : '', name ?? '']}
        />
        <Legend wrapperStyle={{ fontSize: '0.8rem', paddingTop: '8px' }} />
        <ReferenceLine
          y={roundMw(losses.totalCopperLossW)}
          stroke={BALANCE_COLOURS[losses.balance]}
          strokeDasharray="4 4"
          label={{ value: 'Pfe = Pcu', fontSize: 10, fill: BALANCE_COLOURS[losses.balance] }}
        />
        <Bar dataKey="Core (W)" stackId="loss" fill="#ed8936" />
        <Bar dataKey="Copper (W)" stackId="loss" fill="#3182ce" />
      </BarChart>
    </ResponsiveContainer>
  );
}
