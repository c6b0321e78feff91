/**
 * PulseTransformerModule — volt-second sizing and pulse-fidelity estimates.
 *
 * Sizing:
 *   Vt  = V × t_pulse [V·µs], × max(D, 1 − D) / 0.5 when D ≠ 50 % (reset time)
 *   Ae  = Vt × 1.2 / (N × Bmax)   from N = 10, clamped to 0.05–5 cm² by
 *         moving N; unidirectional swing (ΔB = Bmax)
 *   Ap  ≈ Ae × 2Ae  for the catalog search
 *   Np  = ⌈Vt / (Ae_core × Bmax)⌉,  Ns = round(Np × Vs / Vp)
 *
 * Parasitics (two layers, polyimide εr 3.5, 50 µm enamel):
 *   Lm   = µ0 µr N² Ae / lm
 *   Llk  = µ0 N² MLT (h/2/3 + s) / w,  h = √Wa,  w = 0.8 √Wa,  s = solid insulation
 *   C    = Ctt × n/3 + Cll / 2,  n = turns per layer
 *
 * Response into a resistive load R:
 *   tr   = max(2.2 Llk / R, π √(Llk C)),  tf = 1.1 tr,  BW = 0.35 / tr
 *   droop = t/τ (t < τ/10) else 1 − e^(−t/τ), τ = Lm / R
 *   backswing = (V t / Lm) × √(Lm / C) / V,  ring at 1 / (2π √(Lm C))
 *   overshoot = exp(−πQ / √(1 − Q²)) for Q = √(Llk / C) / R ≥ 0.5
 */

import type { CoreAlternativeV1, CoreCandidateV1, NoMatchResultV1 } from '../../contracts/DesignResultV1';
import type {
  InsulationResultV1,
  PulseConductor,
  PulseCoreMaterial,
  PulseResponseV1,
  PulseTransformerDesignResultV1,
  PulseTransformerRequirementsV1,
  PulseWindingV1,
  VoltSecondResultV1,
} from '../../contracts/PulseTransformerV1';
import { CONTRACT_VERSION, ENGINE_VERSION } from '../../contracts/versions';
import type { MaterialFamily } from '../catalog/materials';
import { HIGH_FREQUENCY_THRESHOLD_HZ, MU_0, PULSE_DEFAULTS } from '../config/designDefaults';
import { requirePositive } from '../errors';
import { largestCores } from './CoreCandidateModule';
import { calculateTemperatureRise } from './ThermalModule';
import { calculateDcResistance } from './WindingModule';
import { awgToWire } from './WireSelectionModule';

// ── Constants ─────────────────────────────────────────────────────────────────

export const VOLT_SECOND_MARGIN = 1.2;
export const INITIAL_TURNS = 10;
export const MIN_PRACTICAL_AE_CM2 = 0.05;
export const MAX_PRACTICAL_AE_CM2 = 5.0;
export const PULSE_CANDIDATE_COUNT = 5;

export const PULSE_BMAX_BY_MATERIAL: Record<PulseCoreMaterial, number> = {
  ferrite: 0.2,
  silicon_steel: 1.2,
  amorphous: 1.0,
  nanocrystalline: 0.8,
};

/** Catalog family searched for each pulse core material; tape-wound nanocrystalline sits with amorphous. */
const SEARCH_FAMILY: Record<PulseCoreMaterial, MaterialFamily> = {
  ferrite: 'ferrite',
  silicon_steel: 'silicon_steel',
  amorphous: 'amorphous',
  nanocrystalline: 'amorphous',
};

/** A/mm²; short power pulses tolerate twice the density. */
export const PULSE_CURRENT_DENSITY_AMM2 = 5;
export const SHORT_POWER_PULSE_CURRENT_DENSITY_AMM2 = 10;
export const SHORT_POWER_PULSE_US = 10_000;

/** Above this the winding is foil or cable rather than round wire. */
export const ROUND_WIRE_MAX_CURRENT_A = 100;
export const FOIL_MIN_AREA_MM2 = 50;
export const PULSE_AWG_RANGE = { coarsest: 10, finest: 39 } as const;

export const EPSILON_0 = 8.854e-12;
export const INSULATION_PERMITTIVITY = 3.5;
export const ENAMEL_THICKNESS_M = 50e-6;
export const WINDING_LAYERS = 2;

/** Rough core loss of a pulse core: 10 mW per cm² of Ae at 100 % duty. */
export const PULSE_CORE_LOSS_MW_PER_CM2 = 10;

// ── Operating point ───────────────────────────────────────────────────────────

function isPowerPulse(req: Pick<PulseTransformerRequirementsV1, 'application'>): boolean {
  return req.application === 'hv_power_pulse';
}

/** Low-frequency and power pulses run on steel; everything else on ferrite. */
export function resolvePulseMaterial(
  req: Pick<PulseTransformerRequirementsV1, 'application' | 'coreMaterialType' | 'frequencyHz'>,
): PulseCoreMaterial {
  if (req.coreMaterialType) return req.coreMaterialType;
  if (isPowerPulse(req) || req.frequencyHz < HIGH_FREQUENCY_THRESHOLD_HZ) return 'silicon_steel';
  return 'ferrite';
}

export function pulseBmax(material: PulseCoreMaterial): number {
  return PULSE_BMAX_BY_MATERIAL[material];
}

export function pulseSearchFamily(material: PulseCoreMaterial): MaterialFamily {
  return SEARCH_FAMILY[material];
}

// ── Volt-second sizing ────────────────────────────────────────────────────────

export function calculateVoltSecond(voltageV: number, pulseWidthUs: number, dutyCyclePercent = 50): number {
  requirePositive({ voltageV, pulseWidthUs, dutyCyclePercent });
  const vt = voltageV * pulseWidthUs;
  if (dutyCyclePercent === 50) return vt;
  const duty = dutyCyclePercent / 100;
  return vt * (Math.max(duty, 1 - duty) / 0.5);
}

export function coreAreaForVoltSecond(
  voltSecondUVs: number,
  bmaxT: number,
  turns = INITIAL_TURNS,
): { aeCm2: number; turns: number } {
  requirePositive({ voltSecondUVs, bmaxT, turns });
  const areaFor = (n: number) => ((voltSecondUVs * 1e-6 * VOLT_SECOND_MARGIN) / (n * bmaxT)) * 1e4;
  const aeCm2 = areaFor(turns);

  if (aeCm2 < MIN_PRACTICAL_AE_CM2) {
    return { aeCm2: MIN_PRACTICAL_AE_CM2, turns: Math.max(1, Math.floor((turns * aeCm2) / MIN_PRACTICAL_AE_CM2)) };
  }
  if (aeCm2 > MAX_PRACTICAL_AE_CM2) {
    const adjusted = Math.floor((turns * aeCm2) / MAX_PRACTICAL_AE_CM2) + 1;
    return { aeCm2: areaFor(adjusted), turns: adjusted };
  }
  return { aeCm2, turns };
}

export function designForVoltSecond(params: {
  voltageV: number;
  pulseWidthUs: number;
  dutyCyclePercent: number;
  bmaxT: number;
  initialTurns?: number;
}): VoltSecondResultV1 {
  const voltSecondUVs = calculateVoltSecond(params.voltageV, params.pulseWidthUs, params.dutyCyclePercent);
  const sized = coreAreaForVoltSecond(voltSecondUVs, params.bmaxT, params.initialTurns ?? INITIAL_TURNS);
  return {
    voltSecondUVs,
    requiredAeCm2: sized.aeCm2,
    bmaxT: params.bmaxT,
    estimateTurns: sized.turns,
  };
}

/** Window assumed twice the core area. */
export function estimatePulseAreaProduct(requiredAeCm2: number): number {
  return requiredAeCm2 * requiredAeCm2 * 2;
}

/** First of the candidates with Ae ≥ 0.9 × required, else the first. */
export function selectPulseCore(
  candidates: readonly CoreCandidateV1[],
  requiredAeCm2: number,
): CoreCandidateV1 | undefined {
  const shortlist = candidates.slice(0, PULSE_CANDIDATE_COUNT);
  return shortlist.find(c => c.aeCm2 >= requiredAeCm2 * 0.9) ?? shortlist[0];
}

export function calculatePulseTurns(
  req: Pick<PulseTransformerRequirementsV1, 'primaryVoltageV' | 'secondaryVoltageV' | 'primaryTurns' | 'secondaryTurns'>,
  voltSecondUVs: number,
  aeCm2: number,
  bmaxT: number,
): { primary: number; secondary: number } {
  if (req.primaryTurns !== undefined && req.secondaryTurns !== undefined) {
    return { primary: req.primaryTurns, secondary: req.secondaryTurns };
  }
  requirePositive({ aeCm2, bmaxT });
  const primary = Math.max(1, Math.ceil((voltSecondUVs * 1e-6) / (aeCm2 * 1e-4 * bmaxT)));
  const ratio = req.secondaryVoltageV / req.primaryVoltageV;
  return { primary, secondary: Math.max(1, Math.round(primary * ratio)) };
}

// ── Currents and conductors ───────────────────────────────────────────────────

/**
 * Primary and secondary peak currents with n = Vs / Vp.
 *  - hv_power_pulse: peakCurrentA is the primary current
 *  - otherwise peakCurrentA, or Vs / R, is the load current reflected by n
 *  - 1 A on the primary when neither is known
 */
export function pulseCurrents(
  req: Pick<PulseTransformerRequirementsV1, 'application' | 'peakCurrentA' | 'loadResistanceOhm' | 'secondaryVoltageV'>,
  ratio: number,
): { primaryA: number; secondaryA: number } {
  let primaryA = 1;
  if (req.peakCurrentA !== undefined) {
    primaryA = isPowerPulse(req) ? req.peakCurrentA : req.peakCurrentA * ratio;
  } else if (req.loadResistanceOhm !== undefined) {
    primaryA = (req.secondaryVoltageV / req.loadResistanceOhm) * ratio;
  }
  return { primaryA, secondaryA: primaryA / ratio };
}

export function pulseCurrentDensity(
  req: Pick<PulseTransformerRequirementsV1, 'application' | 'pulseWidthUs'>,
): number {
  return isPowerPulse(req) && req.pulseWidthUs < SHORT_POWER_PULSE_US
    ? SHORT_POWER_PULSE_CURRENT_DENSITY_AMM2
    : PULSE_CURRENT_DENSITY_AMM2;
}

export interface PulseConductorChoice {
  conductor: PulseConductor;
  awg: number | null;
  diameterMm: number;
  areaMm2: number;
}

/** Round wire nearest in diameter within AWG 10–39; foil or cable above 100 A. */
export function selectPulseConductor(peakCurrentA: number, densityAmm2: number): PulseConductorChoice {
  requirePositive({ peakCurrentA, densityAmm2 });
  const areaMm2 = peakCurrentA / densityAmm2;
  const diameterMm = Math.sqrt((4 * areaMm2) / Math.PI);

  if (peakCurrentA > ROUND_WIRE_MAX_CURRENT_A) {
    return { conductor: areaMm2 > FOIL_MIN_AREA_MM2 ? 'foil' : 'cable', awg: null, diameterMm, areaMm2 };
  }

  let best = awgToWire(PULSE_AWG_RANGE.coarsest);
  for (let awg = PULSE_AWG_RANGE.coarsest + 1; awg <= PULSE_AWG_RANGE.finest; awg++) {
    const wire = awgToWire(awg);
    if (Math.abs(wire.diameterMm - diameterMm) < Math.abs(best.diameterMm - diameterMm)) best = wire;
  }
  return { conductor: 'solid', awg: best.awg, diameterMm: best.diameterMm, areaMm2: best.areaMm2 };
}

// ── Parasitics ────────────────────────────────────────────────────────────────

export function calculateMagnetizingInductance(
  turns: number,
  aeM2: number,
  lmM: number,
  muR: number,
  airGapM = 0,
): number {
  requirePositive({ aeM2, lmM, muR });
  if (airGapM > 0) {
    const reluctance = lmM / (MU_0 * muR * aeM2) + airGapM / (MU_0 * aeM2);
    return (turns * turns) / reluctance;
  }
  return (MU_0 * muR * turns * turns * aeM2) / lmM;
}

export function calculateLeakageInductance(params: {
  turns: number;
  mltM: number;
  windingHeightM: number;
  windingWidthM: number;
  layerSpacingM: number;
  layers?: number;
}): number {
  const layers = params.layers ?? WINDING_LAYERS;
  const copperHeight = layers > 0 ? params.windingHeightM / layers : params.windingHeightM;
  const path = copperHeight / 3 + params.layerSpacingM * (layers - 1);
  return (MU_0 * params.turns * params.turns * params.mltM * path) / params.windingWidthM;
}

export function calculateWindingCapacitance(params: {
  turns: number;
  mltM: number;
  wireDiameterM: number;
  layerSpacingM: number;
  insulationThicknessM?: number;
  epsilonR?: number;
  layers?: number;
}): number {
  const layers = params.layers ?? WINDING_LAYERS;
  const permittivity = EPSILON_0 * (params.epsilonR ?? INSULATION_PERMITTIVITY);
  const turnsPerLayer = layers > 0 ? params.turns / layers : params.turns;

  const turnToTurn =
    (permittivity * params.mltM * params.wireDiameterM) / (params.insulationThicknessM ?? ENAMEL_THICKNESS_M);
  const layerToLayer =
    layers > 1
      ? ((permittivity * params.mltM * turnsPerLayer * params.wireDiameterM) / params.layerSpacingM) * (layers - 1)
      : 0;
  return (turnToTurn * turnsPerLayer) / 3 + layerToLayer / 2;
}

// ── Pulse response ────────────────────────────────────────────────────────────

export function calculateRiseTime(leakageH: number, loadOhm: number, capacitanceF: number): number {
  const rl = (2.2 * leakageH) / loadOhm;
  const lc = capacitanceF > 0 ? Math.PI * Math.sqrt(leakageH * capacitanceF) : 0;
  return Math.max(rl, lc);
}

export function calculateDroop(magnetizingH: number, loadOhm: number, pulseWidthS: number): number {
  if (magnetizingH <= 0) return 100;
  const tau = magnetizingH / loadOhm;
  const droop = pulseWidthS < tau / 10 ? (pulseWidthS / tau) * 100 : (1 - Math.exp(-pulseWidthS / tau)) * 100;
  return Math.min(droop, 100);
}

export function calculateBackswing(
  magnetizingH: number,
  capacitanceF: number,
  voltageV: number,
  pulseWidthS: number,
): { voltageV: number; ringingHz: number } {
  if (capacitanceF <= 0 || magnetizingH <= 0) return { voltageV: 0, ringingHz: 0 };
  const magnetizingCurrentA = (voltageV * pulseWidthS) / magnetizingH;
  return {
    voltageV: magnetizingCurrentA * Math.sqrt(magnetizingH / capacitanceF),
    ringingHz: 1 / (2 * Math.PI * Math.sqrt(magnetizingH * capacitanceF)),
  };
}

export function calculateOvershoot(leakageH: number, capacitanceF: number, loadOhm: number): number {
  if (leakageH <= 0 || capacitanceF <= 0) return 0;
  const q = (1 / loadOhm) * Math.sqrt(leakageH / capacitanceF);
  // Q ≥ 1 has no real damped term; clamp to zero overshoot.
  if (q < 0.5 || q >= 1) return 0;
  return Math.exp((-Math.PI * q) / Math.sqrt(1 - q * q)) * 100;
}

export function analyzePulseResponse(params: {
  magnetizingH: number;
  leakageH: number;
  capacitanceF: number;
  loadOhm: number;
  voltageV: number;
  pulseWidthUs: number;
}): PulseResponseV1 {
  requirePositive({ loadOhm: params.loadOhm, voltageV: params.voltageV, pulseWidthUs: params.pulseWidthUs });
  const pulseWidthS = params.pulseWidthUs * 1e-6;
  const riseS = calculateRiseTime(params.leakageH, params.loadOhm, params.capacitanceF);
  const backswing = calculateBackswing(params.magnetizingH, params.capacitanceF, params.voltageV, pulseWidthS);
  const bandwidthHz = riseS > 0 ? 0.35 / riseS : 1e9;

  return {
    riseTimeNs: riseS * 1e9,
    fallTimeNs: riseS * 1.1 * 1e9,
    droopPercent: calculateDroop(params.magnetizingH, params.loadOhm, pulseWidthS),
    backswingPercent: (backswing.voltageV / params.voltageV) * 100,
    bandwidthMHz: bandwidthHz / 1e6,
    ringingFrequencyMHz: backswing.ringingHz > 0 ? backswing.ringingHz / 1e6 : null,
    overshootPercent: calculateOvershoot(params.leakageH, params.capacitanceF, params.loadOhm),
  };
}

// ── Full design ───────────────────────────────────────────────────────────────

function winding(
  turns: number,
  peakCurrentA: number,
  conductor: PulseConductorChoice,
  mltCm: number,
  temperatureC: number,
): PulseWindingV1 {
  return {
    turns,
    ...conductor,
    peakCurrentA,
    rdcMOhm: calculateDcResistance(turns, mltCm, conductor.areaMm2 / 100, temperatureC) * 1000,
  };
}

export function designPulseTransformer(params: {
  req: PulseTransformerRequirementsV1;
  voltSecond: VoltSecondResultV1;
  core: CoreCandidateV1;
  insulation: InsulationResultV1;
}): PulseTransformerDesignResultV1 {
  const { req, voltSecond, core, insulation } = params;
  const ratio = req.secondaryVoltageV / req.primaryVoltageV;
  const bmaxT = voltSecond.bmaxT;
  const turns = calculatePulseTurns(req, voltSecond.voltSecondUVs, core.aeCm2, bmaxT);

  const currents = pulseCurrents(req, ratio);
  const density = pulseCurrentDensity(req);
  const primary = winding(
    turns.primary,
    currents.primaryA,
    selectPulseConductor(currents.primaryA, density),
    core.mltCm,
    req.ambientTempC,
  );
  const secondary = winding(
    turns.secondary,
    currents.secondaryA,
    selectPulseConductor(currents.secondaryA, density),
    core.mltCm,
    req.ambientTempC,
  );

  const aeM2 = core.aeCm2 * 1e-4;
  const mltM = core.mltCm * 1e-2;
  const windowSideM = Math.sqrt(core.waCm2) * 1e-2;
  const layerSpacingM = insulation.solidInsulationMm * 1e-3;

  const magnetizingH = calculateMagnetizingInductance(turns.primary, aeM2, core.lmCm * 1e-2, core.muI);
  const leakageH = calculateLeakageInductance({
    turns: turns.primary,
    mltM,
    windingHeightM: windowSideM,
    windingWidthM: windowSideM * 0.8,
    layerSpacingM,
  });
  const capacitanceF = calculateWindingCapacitance({
    turns: turns.primary + turns.secondary,
    mltM,
    wireDiameterM: primary.diameterMm * 1e-3,
    layerSpacingM,
  });

  const response = analyzePulseResponse({
    magnetizingH,
    leakageH,
    capacitanceF,
    loadOhm: req.loadResistanceOhm ?? PULSE_DEFAULTS.loadResistanceOhm,
    voltageV: req.primaryVoltageV,
    pulseWidthUs: req.pulseWidthUs,
  });

  const peakFluxDensityT = (voltSecond.voltSecondUVs * 1e-6) / (turns.primary * aeM2);

  const warnings: string[] = [];
  const recommendations: string[] = [];
  let meetsSpecifications = true;

  if (core.aeCm2 < voltSecond.requiredAeCm2 * 0.9) {
    warnings.push(
      `Core Ae ${core.aeCm2.toFixed(3)} cm² is below the required ${voltSecond.requiredAeCm2.toFixed(3)} cm²`,
    );
  }
  if (peakFluxDensityT > core.bsatT) {
    warnings.push(`Peak flux ${peakFluxDensityT.toFixed(3)} T exceeds Bsat ${core.bsatT.toFixed(3)} T`);
    recommendations.push('Increase primary turns or use a core with larger Ae');
    meetsSpecifications = false;
  }
  if (req.riseTimeNs !== undefined && response.riseTimeNs > req.riseTimeNs) {
    warnings.push(`Rise time ${response.riseTimeNs.toFixed(1)}ns exceeds requirement ${req.riseTimeNs}ns`);
    recommendations.push('Reduce leakage inductance by interleaving windings');
    meetsSpecifications = false;
  }
  if (response.droopPercent > req.maxDroopPercent) {
    warnings.push(`Droop ${response.droopPercent.toFixed(1)}% exceeds maximum ${req.maxDroopPercent}%`);
    recommendations.push('Increase magnetizing inductance (more turns or higher µ core)');
    meetsSpecifications = false;
  }
  if (response.backswingPercent > req.maxBackswingPercent) {
    warnings.push(
      `Backswing ${response.backswingPercent.toFixed(1)}% exceeds maximum ${req.maxBackswingPercent}%`,
    );
    recommendations.push('Add snubber circuit or increase winding capacitance');
  }

  const duty = req.dutyCyclePercent / 100;
  const coreLossMW = PULSE_CORE_LOSS_MW_PER_CM2 * core.aeCm2 * duty;
  const copperLossMW =
    (currents.primaryA ** 2 * primary.rdcMOhm + currents.secondaryA ** 2 * secondary.rdcMOhm) * duty;
  const totalLossMW = coreLossMW + copperLossMW;

  return {
    kind: 'pulse_transformer',
    meta: { engineVersion: ENGINE_VERSION, contractVersion: CONTRACT_VERSION },
    application: req.application,
    voltSecond,
    turnsRatio: ratio,
    core,
    primary,
    secondary,
    peakFluxDensityT,
    magnetizingInductanceUH: magnetizingH * 1e6,
    leakageInductanceNH: leakageH * 1e9,
    windingCapacitancePF: capacitanceF * 1e12,
    response,
    insulation,
    losses: { coreLossMW, copperLossMW, totalLossMW },
    temperatureRiseC: calculateTemperatureRise(totalLossMW / 1000 / core.atCm2),
    meetsSpecifications,
    warnings,
    recommendations,
  };
}

// ── No match ──────────────────────────────────────────────────────────────────

export function buildPulseNoMatch(
  voltSecond: VoltSecondResultV1,
  available: readonly CoreCandidateV1[],
): NoMatchResultV1 {
  const requiredApCm4 = estimatePulseAreaProduct(voltSecond.requiredAeCm2);
  const closest = largestCores(available);
  return {
    kind: 'no_match',
    designKind: 'pulse_transformer',
    message:
      `No suitable core for Ae ≥ ${voltSecond.requiredAeCm2.toFixed(3)} cm² ` +
      `(Bmax = ${voltSecond.bmaxT} T, estimated Ap ${requiredApCm4.toFixed(2)} cm⁴)`,
    requiredApCm4,
    availableMaxApCm4: closest[0]?.apCm4 ?? 0,
    suggestions: [],
    closestCores: closest.map((core): CoreAlternativeV1 => ({
      partNumber: core.partNumber,
      manufacturer: core.manufacturer,
      geometry: core.geometry,
      apCm4: core.apCm4,
      maxPowerW: null,
      maxEnergyUJ: null,
      notes: `Ae ${core.aeCm2} cm²`,
    })),
    alternativeApproaches: [
      'Fix primaryTurns and secondaryTurns to size the winding on a chosen core',
      'Use a higher-Bsat core material (silicon steel or amorphous) to shrink Ae',
      'Connect an external core database for a wider core selection',
    ],
  };
}
