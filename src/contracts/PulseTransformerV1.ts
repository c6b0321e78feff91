/**
 * PulseTransformerV1 – requirements and result of a pulse-transformer design.
 *
 * Pulse transformers are sized on the volt-second product of one pulse rather
 * than on continuous power, and are judged on how faithfully they pass the
 * pulse (rise time, droop, backswing) and on the isolation barrier.
 *
 * Times: pulse width in µs, edges in ns.  Voltages in V (isolation in Vrms),
 * distances in mm.
 */

import type { CoreCandidateV1, DesignMetaV1 } from './DesignResultV1';

export type PulseApplication =
  | 'gate_drive'
  | 'signal_isolation'
  | 'trigger'
  | 'hv_pulse'
  | 'hv_power_pulse'
  | 'ethernet'
  | 'telecom'
  | 'custom';

/** Insulation grade of the primary–secondary barrier. */
export type InsulationType = 'functional' | 'basic' | 'supplementary' | 'double' | 'reinforced';

export type OvervoltageCategory = 'I' | 'II' | 'III' | 'IV';

export type PollutionDegree = 1 | 2 | 3;

/** Comparative tracking index group of the barrier material. */
export type MaterialGroup = 'I' | 'II' | 'IIIa' | 'IIIb';

export type PulseCoreMaterial = 'ferrite' | 'silicon_steel' | 'amorphous' | 'nanocrystalline';

// ─── Requirements ─────────────────────────────────────────────────────────────

export interface InsulationRequirementsV1 {
  readonly workingVoltageVrms: number;
  readonly insulationType: InsulationType;
  readonly overvoltageCategory: OvervoltageCategory;
  readonly pollutionDegree: PollutionDegree;
  /** Installation altitude; clearances grow above 2000 m. */
  readonly altitudeM: number;
  readonly materialGroup: MaterialGroup;
}

export interface PulseTransformerRequirementsV1 {
  readonly application: PulseApplication;
  readonly primaryVoltageV: number;
  readonly secondaryVoltageV: number;
  readonly pulseWidthUs: number;
  /** Required 10–90 % rise time; unchecked when absent. */
  readonly riseTimeNs?: number;
  readonly dutyCyclePercent: number;
  readonly frequencyHz: number;
  readonly loadResistanceOhm?: number;
  /** Peak load current.  For hv_power_pulse this is the primary current. */
  readonly peakCurrentA?: number;
  readonly maxDroopPercent: number;
  readonly maxBackswingPercent: number;
  readonly isolationVoltageVrms: number;
  readonly insulationType: InsulationType;
  readonly overvoltageCategory: OvervoltageCategory;
  readonly pollutionDegree: PollutionDegree;
  readonly altitudeM: number;
  readonly materialGroup: MaterialGroup;
  readonly ambientTempC: number;
  readonly coreMaterialType?: PulseCoreMaterial;
  readonly preferredGeometry?: string;
  readonly preferredMaterial?: string;
  /** Fixed turns; both must be given to bypass the volt-second turns count. */
  readonly primaryTurns?: number;
  readonly secondaryTurns?: number;
}

// ─── Results ──────────────────────────────────────────────────────────────────

export interface VoltSecondResultV1 {
  voltSecondUVs: number;
  requiredAeCm2: number;
  bmaxT: number;
  /** Turns the Ae estimate assumes, after clamping Ae to the practical range. */
  estimateTurns: number;
}

export interface InsulationResultV1 {
  clearanceMm: number;
  creepageMm: number;
  solidInsulationMm: number;
  impulseWithstandKV: number;
  acWithstandVrms: number;
  recommendedMaterials: string[];
  constructionNotes: string[];
}

export interface PulseResponseV1 {
  riseTimeNs: number;
  fallTimeNs: number;
  droopPercent: number;
  backswingPercent: number;
  bandwidthMHz: number;
  /** Magnetizing-inductance / winding-capacitance ring; null without capacitance. */
  ringingFrequencyMHz: number | null;
  overshootPercent: number;
}

export type PulseConductor = 'solid' | 'foil' | 'cable';

export interface PulseWindingV1 {
  turns: number;
  conductor: PulseConductor;
  /** null for foil and cable. */
  awg: number | null;
  diameterMm: number;
  areaMm2: number;
  peakCurrentA: number;
  rdcMOhm: number;
}

export interface PulseLossesV1 {
  coreLossMW: number;
  copperLossMW: number;
  totalLossMW: number;
}

export interface PulseTransformerDesignResultV1 {
  kind: 'pulse_transformer';
  meta: DesignMetaV1;
  application: PulseApplication;
  voltSecond: VoltSecondResultV1;
  /** Requested Vs / Vp. */
  turnsRatio: number;
  core: CoreCandidateV1;
  primary: PulseWindingV1;
  secondary: PulseWindingV1;
  /** Vt / (Np × Ae) at the end of one pulse. */
  peakFluxDensityT: number;
  magnetizingInductanceUH: number;
  leakageInductanceNH: number;
  windingCapacitancePF: number;
  response: PulseResponseV1;
  insulation: InsulationResultV1;
  losses: PulseLossesV1;
  temperatureRiseC: number;
  meetsSpecifications: boolean;
  warnings: string[];
  recommendations: string[];
}
