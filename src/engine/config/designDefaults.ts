/**
 * Engine-wide defaults.  This is the single definition of every value a caller
 * may omit from a request; the schema layer applies them, and modules that
 * need a default import it from here rather than repeating the literal.
 */

export const DESIGN_DEFAULTS = {
  efficiencyPercent: 90,
  regulationPercent: 5,
  ambientTempC: 40,
  maxTempRiseC: 50,
  maxCurrentDensityAcm2: 400,
  transformerKu: 0.35,
  inductorKu: 0.35,
  bmaxMarginPercent: 20,
} as const;

/** Frequency at or above which Litz wire is preferred over solid wire (Hz). */
export const LITZ_THRESHOLD_HZ = 50_000;

/** Above this frequency designs are treated as switch-mode (ferrite, Ap method). */
export const HIGH_FREQUENCY_THRESHOLD_HZ = 1000;

/** Multiplier on Σ(N·A) for wire insulation and bobbin clearances. */
export const WINDOW_INSULATION_FACTOR = 1.3;

/** Copper resistivity at 20 °C (Ω·cm) and its temperature coefficient (1/°C). */
export const COPPER_RESISTIVITY_20C = 1.724e-6;
export const COPPER_TEMP_COEFFICIENT = 0.00393;

/** Permeability of free space (H/m). */
export const MU_0 = 4 * Math.PI * 1e-7;

/** Defaults for pulse-transformer requests. */
export const PULSE_DEFAULTS = {
  dutyCyclePercent: 50,
  maxDroopPercent: 10,
  maxBackswingPercent: 20,
  isolationVoltageVrms: 1500,
  altitudeM: 2000,
  ambientTempC: 25,
  /** Load assumed for the pulse-response estimate when none is given (Ω). */
  loadResistanceOhm: 10,
} as const;
