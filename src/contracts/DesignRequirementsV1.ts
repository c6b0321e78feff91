/**
 * DesignRequirementsV1 – electrical and thermal requirements for one design
 * request.  Created once per request by the schema layer and never mutated by
 * the engine.
 *
 * Units follow the magnetics convention used throughout the engine:
 * frequencies in Hz, flux densities in T, current densities in A/cm²,
 * temperatures in °C.
 */

export type Waveform = 'sinusoidal' | 'square' | 'triangular';

export type CoolingMode = 'natural' | 'forced';

/**
 * Requested sizing method.  'auto' resolves through the method selector; any
 * other value bypasses it.
 */
export type DesignMethodRequest = 'auto' | 'area_product' | 'core_geometry' | 'loss_optimized';

export type DesignMethod = Exclude<DesignMethodRequest, 'auto'>;

// ─── Transformer ──────────────────────────────────────────────────────────────

export interface TransformerRequirementsV1 {
  readonly outputPowerW: number;
  /** Target efficiency in percentage points, (0, 100]. */
  readonly efficiencyPercent: number;
  /** Target voltage regulation in percentage points. */
  readonly regulationPercent: number;
  readonly primaryVoltageV: number;
  readonly secondaryVoltageV: number;
  readonly frequencyHz: number;
  readonly waveform: Waveform;
  readonly ambientTempC: number;
  readonly maxTempRiseC: number;
  readonly cooling: CoolingMode;
  /** Core shape family, e.g. 'EE', 'ETD', 'PQ'. */
  readonly preferredGeometry?: string;
  /** Material grade or family, e.g. 'N87', '3C95', 'M6'. */
  readonly preferredMaterial?: string;
  readonly designMethod: DesignMethodRequest;
  readonly maxCurrentDensityAcm2: number;
  /** Window utilization factor Ku used for sizing, [0.1, 0.8]. */
  readonly windowUtilizationKu: number;
  /** Use Litz wire regardless of frequency. */
  readonly forceLitz: boolean;
}

// ─── Inductor ─────────────────────────────────────────────────────────────────

export interface InductorRequirementsV1 {
  readonly inductanceUH: number;
  readonly dcCurrentA: number;
  /** Peak-to-peak ripple current. */
  readonly rippleCurrentA: number;
  /** Defaults to dcCurrentA + rippleCurrentA / 2 when absent. */
  readonly peakCurrentA?: number;
  readonly frequencyHz: number;
  readonly ambientTempC: number;
  readonly maxTempRiseC: number;
  readonly cooling: CoolingMode;
  readonly preferredGeometry?: string;
  readonly preferredMaterial?: string;
  readonly allowPowderCores: boolean;
  readonly maxCurrentDensityAcm2: number;
  /** Derating applied to the table Bmax, in percent. */
  readonly bmaxMarginPercent: number;
  readonly windowUtilizationKu: number;
  readonly forceLitz: boolean;
}
