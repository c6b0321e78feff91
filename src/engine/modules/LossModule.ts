/**
 * LossModule — core loss, copper loss, totals and efficiency.
 *
 * Core loss uses the material table's Steinmetz fit (f in kHz, B in mT):
 *   Pv = k × f^α × B^β  [mW/cm³],   P = Pv × Ve / 1000  [W]
 * Ferrite fits are anchored at 100 °C and corrected by ×(1 + 0.001 |T − 100|).
 *
 * Balance:  Pfe/Pcu ∈ [0.5, 2.0] → optimal; above → core_dominated;
 *           below → copper_dominated.
 */

import type {
  CoreCandidateV1,
  LossBalance,
  LossBreakdownV1,
  WindingPlanV1,
} from '../../contracts/DesignResultV1';
import { lookupMaterial } from '../catalog/materials';
import { MU_0 } from '../config/designDefaults';

export const FERRITE_REFERENCE_TEMP_C = 100;
export const FERRITE_TEMP_COEFFICIENT = 0.001;

// ── Core loss ─────────────────────────────────────────────────────────────────

export interface CoreLossResult {
  coreLossW: number;
  lossDensityMWcm3: number;
}

export function ferriteTemperatureFactor(temperatureC: number): number {
  return 1 + FERRITE_TEMP_COEFFICIENT * Math.abs(temperatureC - FERRITE_REFERENCE_TEMP_C);
}

export function calculateCoreLoss(
  volumeCm3: number,
  frequencyHz: number,
  bacT: number,
  material: string,
  temperatureC = FERRITE_REFERENCE_TEMP_C,
): CoreLossResult {
  const props = lookupMaterial(material);
  let density = props.k * (frequencyHz / 1000) ** props.alpha * (bacT * 1000) ** props.beta;
  if (props.family === 'ferrite') density *= ferriteTemperatureFactor(temperatureC);
  return {
    coreLossW: (density * volumeCm3) / 1000,
    lossDensityMWcm3: density,
  };
}

// ── Copper loss ───────────────────────────────────────────────────────────────

/** Pcu = I² × Rdc × Fr, with Rdc already at the operating temperature. */
export function calculateCopperLoss(rdcOhm: number, currentRmsA: number, acDcRatio = 1.0): number {
  return currentRmsA ** 2 * rdcOhm * acDcRatio;
}

// ── Totals ────────────────────────────────────────────────────────────────────

export function classifyLossBalance(ratio: number | null): LossBalance {
  // no copper loss: all of it is core loss
  if (ratio === null || ratio > 2.0) return 'core_dominated';
  if (ratio < 0.5) return 'copper_dominated';
  return 'optimal';
}

export function calculateEfficiency(outputPowerW: number, totalLossW: number): number {
  const input = outputPowerW + totalLossW;
  return input > 0 ? (outputPowerW / input) * 100 : 0;
}

export function calculateTotalLosses(params: {
  core: CoreCandidateV1;
  winding: WindingPlanV1;
  frequencyHz: number;
  bacT: number;
  material: string;
  /** Null for inductors. */
  outputPowerW: number | null;
}): LossBreakdownV1 {
  const { core, winding } = params;
  const coreLoss = calculateCoreLoss(core.veCm3, params.frequencyHz, params.bacT, params.material, winding.operatingTempC);

  const copperLossW = winding.windings.map(w => ({
    winding: w.name,
    lossW: calculateCopperLoss(w.rdcOhm, w.currentRmsA, w.acDcRatio),
  }));
  const totalCopperLossW = copperLossW.reduce((sum, w) => sum + w.lossW, 0);
  const totalLossW = coreLoss.coreLossW + totalCopperLossW;
  const ratio = totalCopperLossW > 0 ? coreLoss.coreLossW / totalCopperLossW : null;

  return {
    coreLossW: coreLoss.coreLossW,
    coreLossDensityMWcm3: coreLoss.lossDensityMWcm3,
    copperLossW,
    totalCopperLossW,
    totalLossW,
    efficiencyPercent: params.outputPowerW === null ? null : calculateEfficiency(params.outputPowerW, totalLossW),
    coreToCopperRatio: ratio,
    balance: classifyLossBalance(ratio),
  };
}

// ── Magnetizing inductance ────────────────────────────────────────────────────

/** Lm = μ0 μi N² Ae / lm for an ungapped core, in µH. */
export function estimateMagnetizingInductance(
  turns: number,
  core: Pick<CoreCandidateV1, 'aeCm2' | 'lmCm' | 'muI'>,
): number {
  return ((MU_0 * core.muI * turns ** 2 * core.aeCm2 * 1e-4) / (core.lmCm * 1e-2)) * 1e6;
}
