import { describe, it, expect } from 'vitest';
import { buildLossChartData } from '../../components/LossBalanceChart';
import { statusTone, summariseDesign } from '../../components/DesignSummaryPanel';
import { runInductorDesign, runTransformerDesign } from '../Engine';
import type { LossBreakdownV1 } from '../../contracts/DesignResultV1';

const LOSSES: LossBreakdownV1 = {
  coreLossW: 0.0788574,
  coreLossDensityMWcm3: 18.29639,
  copperLossW: [
    { winding: 'primary', lossW: 0.076594 },
    { winding: 'secondary', lossW: 0.103222 },
  ],
  totalCopperLossW: 0.179816,
  totalLossW: 0.258673,
  efficiencyPercent: 99.742,
  coreToCopperRatio: 0.4385,
  balance: 'copper_dominated',
};

describe('buildLossChartData', () => {
  it('core, each winding, then the total, rounded to mW', () => {
    expect(buildLossChartData(LOSSES)).toEqual([
      { label: 'Core', 'Core (W)': 0.079, 'Copper (W)': 0 },
      { label: 'Primary', 'Core (W)': 0, 'Copper (W)': 0.077 },
      { label: 'Secondary', 'Core (W)': 0, 'Copper (W)': 0.103 },
      { label: 'Total', 'Core (W)': 0.079, 'Copper (W)': 0.18 },
    ]);
  });

  it('a single inductor winding is labelled Winding', () => {
    const rows = buildLossChartData({ ...LOSSES, copperLossW: [{ winding: 'main', lossW: 0.1629 }] });
    expect(rows.map(r => r.label)).toEqual(['Core', 'Winding', 'Total']);
    expect(rows[1]['Copper (W)']).toBe(0.163);
  });
});

describe('statusTone', () => {
  it('maps each domain status to its colours', () => {
    expect(statusTone('pass')).toEqual({ color: '#276749', background: '#f0fff4' });
    expect(statusTone('warning')).toEqual({ color: '#975a16', background: '#fffff0' });
    expect(statusTone('fail')).toEqual({ color: '#9b2c2c', background: '#fff5f5' });
  });
});

describe('summariseDesign', () => {
  it('transformer rows', () => {
    const design = runTransformerDesign({
      outputPowerW: 100,
      primaryVoltageV: 48,
      secondaryVoltageV: 12,
      frequencyHz: 100_000,
      waveform: 'square',
    });
    if (design.kind !== 'transformer') throw new Error(design.message);

    expect(summariseDesign(design)).toEqual([
      { label: 'Core', value: 'RM10/I-3C90 (RM, 3C90)' },
      { label: 'Ap', value: '0.412 cm⁴ (required 0.377 cm⁴)' },
      { label: 'Bmax', value: '0.100 T' },
      { label: 'Turns', value: '13 : 3' },
      { label: 'Window fill', value: 'Ku = 0.55' },
      { label: 'Total loss', value: '0.26 W' },
      { label: 'Efficiency', value: '99.7%' },
      { label: 'Temperature rise', value: '11.5°C' },
    ]);
  });

  it('inductor rows carry gap and inductance but no efficiency', () => {
    const design = runInductorDesign({
      inductanceUH: 100,
      dcCurrentA: 1.8,
      rippleCurrentA: 0.4,
      frequencyHz: 100_000,
    });
    if (design.kind !== 'inductor') throw new Error(design.message);

    const rows = summariseDesign(design);
    expect(rows.map(r => r.label)).toEqual([
      'Core',
      'Ap',
      'Bmax',
      'Turns',
      'Air gap',
      'Inductance',
      'Window fill',
      'Total loss',
      'Temperature rise',
    ]);
    const value = (label: string) => rows.find(r => r.label === label)?.value;
    expect(value('Ap')).toBe('0.412 cm⁴ (required 0.357 cm⁴)');
    expect(value('Turns')).toBe('25');
    expect(value('Air gap')).toBe('0.75 mm');
    expect(value('Inductance')).toBe('100.0 µH');
    expect(value('Window fill')).toBe('Ku = 0.41');
    expect(value('Temperature rise')).toBe('7.9°C');
  });
});
