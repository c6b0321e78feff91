/**
 * AreaProductModule — transformer electromagnetic sizing.
 *
 * Area Product (Ap) method:
 *   Ap = Pt × 10⁴ / (Kf × Ku × Bmax × J × f)                [cm⁴]
 *
 * Core Geometry (Kg) method, for regulation-critical line-frequency designs:
 *   Ke = 0.145 × Kf² × f² × Bmax² × 10⁻⁴
 *   Kg = Pt × 10⁴ / (2 × Ke × α)                             [cm⁵], α in %
 *   Ap ≈ Kp × Kg^0.8                                         (Kp by core family)
 *
 * Loss-optimized (Kgfe) method: Ap at the flux swing that puts the core/copper
 * loss split at its minimum-total-loss point, Pfe/Pcu = β/2.
 */

import type { TransformerRequirementsV1 } from '../../contracts/DesignRequirementsV1';
import type { SizingResultV1 } from '../../contracts/DesignResultV1';
import { lookupMaterial } from '../catalog/materials';
import { InvalidInputError, requirePositive } from '../errors';
import type { NormalizedTransformerV1 } from '../normalizer/Normalizer';

export const KU_MIN = 0.1;
export const KU_MAX = 0.8;

export function assertWindowUtilization(ku: number): void {
  if (!(ku >= KU_MIN && ku <= KU_MAX)) {
    throw new InvalidInputError(`windowUtilizationKu must be within [${KU_MIN}, ${KU_MAX}] (got ${ku})`);
  }
}

// ── Area Product ──────────────────────────────────────────────────────────────

export function calculateAreaProduct(
  apparentPowerVA: number,
  frequencyHz: number,
  bmaxT: number,
  currentDensityAcm2: number,
  ku: number,
  kf = 4.44,
): number {
  requirePositive({ apparentPowerVA, frequencyHz, bmaxT, currentDensityAcm2, kf });
  assertWindowUtilization(ku);
  return (apparentPowerVA * 1e4) / (kf * ku * bmaxT * currentDensityAcm2 * frequencyHz);
}

// ── Core Geometry ─────────────────────────────────────────────────────────────

export function calculateElectricalCoefficient(frequencyHz: number, bmaxT: number, kf = 4.44): number {
  requirePositive({ frequencyHz, bmaxT, kf });
  return 0.145 * kf ** 2 * frequencyHz ** 2 * bmaxT ** 2 * 1e-4;
}

export function calculateCoreGeometry(
  apparentPowerVA: number,
  regulationPercent: number,
  ke: number,
): number {
  requirePositive({ apparentPowerVA, regulationPercent, ke });
  return (apparentPowerVA * 1e4) / (2 * ke * regulationPercent);
}

/** Empirical Kg→Ap conversion constant by core family (keys upper-case). */
export const KP_BY_GEOMETRY: Record<string, number> = {
  EE: 48,
  ETD: 48,
  PQ: 45,
  RM: 40,
  POT: 25,
  TOROID: 30,
  EI: 50,
  UI: 55,
};

export const DEFAULT_KP = 48;

export function kgToAp(kgCm5: number, geometry = 'EE'): number {
  const kp = KP_BY_GEOMETRY[geometry.toUpperCase()] ?? DEFAULT_KP;
  return kp * kgCm5 ** 0.8;
}

// ── Loss-optimized (Kgfe) ─────────────────────────────────────────────────────

/**
 * Starting flux swing for minimum total loss: 0.3 / √(f_kHz / 10), clamped to
 * [0.05, 0.20] T (≈ 0.095 T at 100 kHz).
 */
export function estimateOptimalFluxSwing(frequencyHz: number): number {
  requirePositive({ frequencyHz });
  const estimate = 0.3 / Math.sqrt(frequencyHz / 1000 / 10);
  return Math.min(0.2, Math.max(0.05, estimate));
}

export interface LossOptimizedSizing {
  bacT: number;
  requiredApCm4: number;
  /** β / 2 */
  optimalLossRatio: number;
  maxLossW: number;
  coreLossBudgetW: number;
  copperLossBudgetW: number;
}

/**
 * At the optimum the total loss budget Pout(1−η)/η splits
 * β/(β+2) to the core and 2/(β+2) to the copper.
 */
export function calculateLossOptimizedSizing(params: {
  apparentPowerVA: number;
  outputPowerW: number;
  efficiencyPercent: number;
  frequencyHz: number;
  currentDensityAcm2: number;
  ku: number;
  kf: number;
  steinmetzBeta: number;
  /** Flux ceiling from the material/frequency table. */
  bmaxCeilingT: number;
}): LossOptimizedSizing {
  const eta = params.efficiencyPercent / 100;
  const beta = params.steinmetzBeta;
  const bacT = Math.min(estimateOptimalFluxSwing(params.frequencyHz), params.bmaxCeilingT);
  const maxLossW = (params.outputPowerW * (1 - eta)) / eta;
  return {
    bacT,
    requiredApCm4: calculateAreaProduct(
      params.apparentPowerVA,
      params.frequencyHz,
      bacT,
      params.currentDensityAcm2,
      params.ku,
      params.kf,
    ),
    optimalLossRatio: beta / 2,
    maxLossW,
    coreLossBudgetW: (maxLossW * beta) / (beta + 2),
    copperLossBudgetW: (maxLossW * 2) / (beta + 2),
  };
}

// ── Regulation estimate ───────────────────────────────────────────────────────

/**
 * Full-load regulation (%) from winding resistances, with the primary drop
 * referred to the secondary by the turns ratio.
 */
export function estimateRegulation(params: {
  primaryRdcOhm: number;
  secondaryRdcOhm: number;
  primaryCurrentA: number;
  secondaryCurrentA: number;
  primaryVoltageV: number;
  secondaryVoltageV: number;
}): number {
  const ratio = params.secondaryVoltageV / params.primaryVoltageV;
  const referredPrimaryDrop = params.primaryCurrentA * params.primaryRdcOhm * ratio;
  const secondaryDrop = params.secondaryCurrentA * params.secondaryRdcOhm;
  return ((referredPrimaryDrop + secondaryDrop) / params.secondaryVoltageV) * 100;
}

// ── Orchestration ─────────────────────────────────────────────────────────────

export function sizeTransformer(
  req: TransformerRequirementsV1,
  normalized: NormalizedTransformerV1,
): SizingResultV1 {
  const { apparentPowerVA, kf, flux, method } = normalized;
  const base = {
    requiredKgCm5: null,
    bmaxLimitation: flux.limitation,
    apparentPowerVA,
    energyUJ: null,
    optimalLossRatio: null,
  };

  switch (method) {
    case 'core_geometry': {
      const ke = calculateElectricalCoefficient(req.frequencyHz, flux.bmaxT, kf);
      const kg = calculateCoreGeometry(apparentPowerVA, req.regulationPercent, ke);
      const geometry = req.preferredGeometry ?? 'EE';
      return {
        ...base,
        method,
        requiredKgCm5: kg,
        requiredApCm4: kgToAp(kg, geometry),
        bmaxT: flux.bmaxT,
        notes: [
          ...flux.notes,
          `Kg = ${kg.toPrecision(3)} cm⁵ for ${req.regulationPercent}% regulation, converted with Kp for ${geometry}`,
        ],
      };
    }
    case 'loss_optimized': {
      const sizing = calculateLossOptimizedSizing({
        apparentPowerVA,
        outputPowerW: req.outputPowerW,
        efficiencyPercent: req.efficiencyPercent,
        frequencyHz: req.frequencyHz,
        currentDensityAcm2: req.maxCurrentDensityAcm2,
        ku: req.windowUtilizationKu,
        kf,
        steinmetzBeta: lookupMaterial(normalized.materialGrade).beta,
        bmaxCeilingT: flux.bmaxT,
      });
      return {
        ...base,
        method,
        requiredApCm4: sizing.requiredApCm4,
        bmaxT: sizing.bacT,
        bmaxLimitation: 'loss_limited',
        optimalLossRatio: sizing.optimalLossRatio,
        notes: [
          ...flux.notes,
          `Minimum total loss at Pfe/Pcu = ${sizing.optimalLossRatio.toFixed(2)}`,
          `Loss budget ${sizing.maxLossW.toFixed(2)} W: core ${sizing.coreLossBudgetW.toFixed(2)} W, ` +
            `copper ${sizing.copperLossBudgetW.toFixed(2)} W`,
        ],
      };
    }
    case 'area_product':
      return {
        ...base,
        method,
        requiredApCm4: calculateAreaProduct(
          apparentPowerVA,
          req.frequencyHz,
          flux.bmaxT,
          req.maxCurrentDensityAcm2,
          req.windowUtilizationKu,
          kf,
        ),
        bmaxT: flux.bmaxT,
        notes: [...flux.notes],
      };
  }
}
