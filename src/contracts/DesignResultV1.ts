import type { ENGINE_VERSION, CONTRACT_VERSION } from './versions';
import type { CoolingMode, DesignMethod } from './DesignRequirementsV1';

// ─── Core candidates ──────────────────────────────────────────────────────────

export type CoreSource = 'local' | 'external';

/**
 * Read-only reference record for one core.  Geometry figures are cm-based:
 * Ae (cm²), Wa (cm²), Ap (cm⁴), MLT (cm), lm (cm), Ve (cm³), At (cm²).
 */
export interface CoreCandidateV1 {
  readonly manufacturer: string;
  readonly partNumber: string;
  /** Shape family, e.g. 'EE', 'ETD', 'PQ', 'toroid'. */
  readonly geometry: string;
  /** Material grade, e.g. 'N87', '3C95', 'M6'. */
  readonly material: string;
  readonly aeCm2: number;
  readonly waCm2: number;
  readonly apCm4: number;
  readonly mltCm: number;
  readonly lmCm: number;
  readonly veCm3: number;
  readonly atCm2: number;
  readonly weightG: number;
  readonly bsatT: number;
  readonly muI: number;
  readonly source: CoreSource;
  readonly datasheetUrl?: string;
}

// ─── Sizing ───────────────────────────────────────────────────────────────────

export type BmaxLimitation =
  | 'saturation_limited'
  | 'loss_limited'
  | 'mixed'
  | 'dc_bias_limited';

export interface SizingResultV1 {
  /** 'energy' is the inductor stored-energy method. */
  method: DesignMethod | 'energy';
  requiredApCm4: number;
  /** Only set by the core-geometry method. */
  requiredKgCm5: number | null;
  bmaxT: number;
  bmaxLimitation: BmaxLimitation;
  apparentPowerVA: number | null;
  energyUJ: number | null;
  /** Optimal Pfe/Pcu ratio (β/2); only set by the loss-optimized method. */
  optimalLossRatio: number | null;
  notes: string[];
}

// ─── Winding ──────────────────────────────────────────────────────────────────

export interface WireSpecV1 {
  type: 'solid' | 'litz';
  /** Gauge of a single conductor (or strand, for parallel/Litz wire). */
  awg: number;
  /** Diameter of a single conductor or strand. */
  diameterMm: number;
  strandCount: number;
  /** Total copper cross-section across all strands. */
  areaCm2: number;
  /** Diameter used for layer build-up. */
  outerDiameterMm: number;
  skinEffectLimited: boolean;
  /** Litz only: e.g. '37×7'. */
  bundleArrangement: string | null;
  /** Litz only: estimated Rac/Rdc of the bundle. */
  acFactor: number | null;
  /** Litz only: whether the strands are fine enough for the frequency. */
  effective: boolean | null;
}

export type WindingName = 'primary' | 'secondary' | 'main';

export interface WindingV1 {
  name: WindingName;
  turns: number;
  currentRmsA: number;
  wire: WireSpecV1;
  /** DC resistance at the winding operating temperature. */
  rdcOhm: number;
  acDcRatio: number;
  layers: number;
  turnsPerLayer: number;
}

export type WindowStatus = 'ok' | 'warning' | 'error';

export interface WindingPlanV1 {
  windings: WindingV1[];
  windowUtilization: number;
  windowStatus: WindowStatus;
  skinDepthMm: number;
  operatingTempC: number;
}

// ─── Losses & thermal ─────────────────────────────────────────────────────────

export type LossBalance = 'optimal' | 'core_dominated' | 'copper_dominated';

export interface WindingLossV1 {
  winding: WindingName;
  lossW: number;
}

export interface LossBreakdownV1 {
  coreLossW: number;
  coreLossDensityMWcm3: number;
  copperLossW: WindingLossV1[];
  totalCopperLossW: number;
  totalLossW: number;
  /** Null for inductors, which have no through-power. */
  efficiencyPercent: number | null;
  /** Null when there is no copper loss. */
  coreToCopperRatio: number | null;
  balance: LossBalance;
}

export type DomainStatus = 'pass' | 'warning' | 'fail';

export interface ThermalResultV1 {
  dissipationDensityWcm2: number;
  temperatureRiseC: number;
  hotspotTempC: number;
  marginToTargetC: number;
  marginToMaterialC: number;
  materialMaxTempC: number;
  cooling: CoolingMode;
  status: DomainStatus;
  coolingRecommendation: string;
  recommendations: string[];
}

export interface VerificationStatusV1 {
  electrical: DomainStatus;
  mechanical: DomainStatus;
  thermal: DomainStatus;
  warnings: string[];
  errors: string[];
  recommendations: string[];
}

// ─── Design results ───────────────────────────────────────────────────────────

export interface DesignMetaV1 {
  engineVersion: typeof ENGINE_VERSION;
  contractVersion: typeof CONTRACT_VERSION;
}

interface DesignResultBaseV1 {
  meta: DesignMetaV1;
  sizing: SizingResultV1;
  materialGrade: string;
  core: CoreCandidateV1;
  /** Up to three further candidates that also satisfy the required Ap. */
  alternatives: CoreCandidateV1[];
  winding: WindingPlanV1;
  losses: LossBreakdownV1;
  thermal: ThermalResultV1;
  verification: VerificationStatusV1;
  viable: boolean;
  confidenceScore: number;
}

export interface TransformerDesignResultV1 extends DesignResultBaseV1 {
  kind: 'transformer';
  turnsRatio: number;
  magnetizingInductanceUH: number;
  estimatedRegulationPercent: number;
}

export interface GapResultV1 {
  gapNeeded: boolean;
  gapMm: number;
  fringingFactor: number;
}

export interface FluxResultV1 {
  bdcT: number;
  bacT: number;
  bpeakT: number;
  muEff: number;
  saturationMarginPercent: number;
}

export interface InductorDesignResultV1 extends DesignResultBaseV1 {
  kind: 'inductor';
  peakCurrentA: number;
  rmsCurrentA: number;
  gap: GapResultV1;
  flux: FluxResultV1;
  /** Turns before any saturation retry. */
  initialTurns: number;
  saturationRetried: boolean;
  calculatedInductanceUH: number;
  inductanceTolerancePercent: number;
}

export type DesignResultV1 = TransformerDesignResultV1 | InductorDesignResultV1;

// ─── No-match recovery ────────────────────────────────────────────────────────

export type SuggestionParameter =
  | 'outputPowerW'
  | 'inductanceUH'
  | 'frequencyHz'
  | 'maxCurrentDensityAcm2'
  | 'windowUtilizationKu';

export interface DesignSuggestionV1 {
  parameter: SuggestionParameter;
  currentValue: number;
  suggestedValue: number;
  unit: string;
  impact: string;
  feasible: boolean;
}

export interface CoreAlternativeV1 {
  partNumber: string;
  manufacturer: string;
  geometry: string;
  apCm4: number;
  /** Transformer rating at the requested operating point. */
  maxPowerW: number | null;
  /** Inductor rating at the requested operating point. */
  maxEnergyUJ: number | null;
  notes: string;
}

export interface NoMatchResultV1 {
  kind: 'no_match';
  designKind: 'transformer' | 'inductor' | 'pulse_transformer';
  message: string;
  requiredApCm4: number;
  availableMaxApCm4: number;
  suggestions: DesignSuggestionV1[];
  closestCores: CoreAlternativeV1[];
  alternativeApproaches: string[];
}
