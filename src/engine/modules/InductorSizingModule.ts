/**
 * InductorSizingModule — energy-storage sizing and the gapped-core
 * turns / gap / flux solution.
 *
 * Energy method:
 *   E  = ½ × L × Ipk²
 *   Ap = 2E × 10⁴ / (Bmax × J × Ku)                                [cm⁴]
 *
 * Turns / gap (SI units inside, cm/mm at the boundary):
 *   N₀   = max(5, ⌊L × Ipk / (Bmax × Ae)⌋)
 *   lg   = μ0 × Ae × (N²/L − lm/(μ0 μi Ae))       no gap when ≤ 0
 *   F    = 1 + (lg/G) × ln(2G/lg),  G = √(100 × Ae[cm²]) mm,  F ∈ [1, 2]
 *   μeff = lm / (lm/μi + lg)
 *   Bdc  = μ0 μeff N Idc / lm,   Bac = L (ΔI/2) / (N Ae),   Bpeak = Bdc + Bac
 *
 * If the saturation margin (Bsat − Bpeak)/Bsat is below 10 %, N is raised by
 * ×1.2 and everything is recomputed exactly once.
 */

import type { InductorRequirementsV1 } from '../../contracts/DesignRequirementsV1';
import type {
  CoreCandidateV1,
  FluxResultV1,
  GapResultV1,
  SizingResultV1,
} from '../../contracts/DesignResultV1';
import { MU_0 } from '../config/designDefaults';
import { requirePositive } from '../errors';
import type { NormalizedInductorV1 } from '../normalizer/Normalizer';
import { assertWindowUtilization } from './AreaProductModule';

export const MIN_TURNS = 5;
export const SATURATION_RETRY_MARGIN_PCT = 10;
export const TURNS_RETRY_FACTOR = 1.2;
export const MAX_FRINGING_FACTOR = 2.0;
/** Gaps at or below this length (mm) are treated as having no fringing. */
export const MIN_FRINGING_GAP_MM = 0.01;

// ── Energy method ─────────────────────────────────────────────────────────────

/** Stored energy in joules. */
export function calculateStoredEnergy(inductanceH: number, peakCurrentA: number): number {
  return 0.5 * inductanceH * peakCurrentA ** 2;
}

export function calculateAreaProductInductor(
  inductanceH: number,
  peakCurrentA: number,
  bmaxT: number,
  currentDensityAcm2: number,
  ku: number,
): number {
  requirePositive({ inductanceH, peakCurrentA, bmaxT, currentDensityAcm2 });
  assertWindowUtilization(ku);
  const energyJ = calculateStoredEnergy(inductanceH, peakCurrentA);
  return (2 * energyJ * 1e4) / (bmaxT * currentDensityAcm2 * ku);
}

export function sizeInductor(req: InductorRequirementsV1, normalized: NormalizedInductorV1): SizingResultV1 {
  const { inductanceH, peakCurrentA, flux } = normalized;
  const energyJ = calculateStoredEnergy(inductanceH, peakCurrentA);
  return {
    method: 'energy',
    requiredApCm4: calculateAreaProductInductor(
      inductanceH,
      peakCurrentA,
      flux.bmaxT,
      req.maxCurrentDensityAcm2,
      req.windowUtilizationKu,
    ),
    requiredKgCm5: null,
    bmaxT: flux.bmaxT,
    bmaxLimitation: flux.limitation,
    apparentPowerVA: null,
    energyUJ: energyJ * 1e6,
    optimalLossRatio: null,
    notes: [...flux.notes, `Stored energy ${(energyJ * 1e6).toFixed(1)} µJ at Ipk = ${peakCurrentA} A`],
  };
}

// ── Turns, gap and flux ───────────────────────────────────────────────────────

export function estimateInitialTurns(
  inductanceH: number,
  peakCurrentA: number,
  bmaxT: number,
  aeCm2: number,
): number {
  return Math.max(MIN_TURNS, Math.floor((inductanceH * peakCurrentA) / (bmaxT * aeCm2 * 1e-4)));
}

export function fringingFactor(gapMm: number, aeCm2: number): number {
  if (gapMm <= MIN_FRINGING_GAP_MM) return 1.0;
  const g = Math.sqrt(aeCm2 * 100);
  const f = 1 + (gapMm / g) * Math.log((2 * g) / gapMm);
  return Math.min(MAX_FRINGING_FACTOR, Math.max(1.0, f));
}

/** Gap length that brings an N-turn winding on this core to the target inductance. */
export function calculateAirGap(
  inductanceH: number,
  turns: number,
  aeCm2: number,
  lmCm: number,
  muI: number,
): GapResultV1 {
  const aeM2 = aeCm2 * 1e-4;
  const lmM = lmCm * 1e-2;
  const totalReluctance = turns ** 2 / inductanceH;
  const coreReluctance = lmM / (MU_0 * muI * aeM2);
  const gapReluctance = totalReluctance - coreReluctance;

  if (gapReluctance <= 0) {
    return { gapNeeded: false, gapMm: 0, fringingFactor: 1.0 };
  }
  const gapMm = gapReluctance * MU_0 * aeM2 * 1000;
  return { gapNeeded: true, gapMm, fringingFactor: fringingFactor(gapMm, aeCm2) };
}

export function effectivePermeability(muI: number, lmCm: number, gapMm: number): number {
  if (gapMm <= 0) return muI;
  const lmM = lmCm * 1e-2;
  return lmM / (lmM / muI + gapMm * 1e-3);
}

export function calculateInductorFlux(params: {
  inductanceH: number;
  dcCurrentA: number;
  rippleCurrentA: number;
  turns: number;
  core: Pick<CoreCandidateV1, 'aeCm2' | 'lmCm' | 'muI' | 'bsatT'>;
  gapMm: number;
}): FluxResultV1 {
  const { inductanceH, dcCurrentA, rippleCurrentA, turns, core, gapMm } = params;
  const aeM2 = core.aeCm2 * 1e-4;
  const lmM = core.lmCm * 1e-2;
  const muEff = effectivePermeability(core.muI, core.lmCm, gapMm);

  const bdcT = (MU_0 * muEff * turns * dcCurrentA) / lmM;
  const bacT = (inductanceH * (rippleCurrentA / 2)) / (turns * aeM2);
  const bpeakT = bdcT + bacT;
  return {
    bdcT,
    bacT,
    bpeakT,
    muEff,
    saturationMarginPercent: ((core.bsatT - bpeakT) / core.bsatT) * 100,
  };
}

/** L = μ0 μeff N² Ae / lm, in µH. */
export function calculateInductance(turns: number, muEff: number, aeCm2: number, lmCm: number): number {
  return ((MU_0 * muEff * turns ** 2 * aeCm2 * 1e-4) / (lmCm * 1e-2)) * 1e6;
}

export interface GappedInductorSolution {
  initialTurns: number;
  turns: number;
  retried: boolean;
  gap: GapResultV1;
  flux: FluxResultV1;
  calculatedInductanceUH: number;
  inductanceTolerancePercent: number;
}

export function solveGappedInductor(
  core: CoreCandidateV1,
  req: InductorRequirementsV1,
  normalized: NormalizedInductorV1,
): GappedInductorSolution {
  const { inductanceH, peakCurrentA, flux: target } = normalized;

  const evaluate = (turns: number) => {
    const gap = calculateAirGap(inductanceH, turns, core.aeCm2, core.lmCm, core.muI);
    const flux = calculateInductorFlux({
      inductanceH,
      dcCurrentA: req.dcCurrentA,
      rippleCurrentA: req.rippleCurrentA,
      turns,
      core,
      gapMm: gap.gapMm,
    });
    return { turns, gap, flux };
  };

  const initialTurns = estimateInitialTurns(inductanceH, peakCurrentA, target.bmaxT, core.aeCm2);
  let state = evaluate(initialTurns);
  let retried = false;

  if (state.flux.saturationMarginPercent < SATURATION_RETRY_MARGIN_PCT) {
    const raised = Math.max(initialTurns + 1, Math.ceil(initialTurns * TURNS_RETRY_FACTOR));
    state = evaluate(raised);
    retried = true;
  }

  const calculatedInductanceUH = calculateInductance(state.turns, state.flux.muEff, core.aeCm2, core.lmCm);
  return {
    initialTurns,
    turns: state.turns,
    retried,
    gap: state.gap,
    flux: state.flux,
    calculatedInductanceUH,
    inductanceTolerancePercent:
      (Math.abs(calculatedInductanceUH - req.inductanceUH) / req.inductanceUH) * 100,
  };
}
