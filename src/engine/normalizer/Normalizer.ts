import type {
  DesignMethod,
  InductorRequirementsV1,
  TransformerRequirementsV1,
  Waveform,
} from '../../contracts/DesignRequirementsV1';
import type { BmaxLimitation } from '../../contracts/DesignResultV1';
import {
  defaultMaterialGrade,
  resolveMaterialFamily,
  type MaterialFamily,
} from '../catalog/materials';
import { InvalidInputError } from '../errors';
import { selectDesignMethod } from '../modules/MethodSelectorModule';

// ─── Waveform coefficient ─────────────────────────────────────────────────────

/** Faraday waveform coefficient Kf (4.44 = 4 × form factor 1.11 of a sine). */
export const WAVEFORM_COEFFICIENT: Record<Waveform, number> = {
  sinusoidal: 4.44,
  square: 4.0,
  triangular: 4.0,
};

export function waveformCoefficient(waveform: Waveform | undefined): number {
  return WAVEFORM_COEFFICIENT[waveform ?? 'sinusoidal'];
}

// ─── Apparent power ───────────────────────────────────────────────────────────

/**
 * Apparent power handled by both windings: Pt = Pout × (1 + 100/η).
 * Throws InvalidInputError if η ∉ (0, 100] or Pout ≤ 0.
 */
export function calculateApparentPower(outputPowerW: number, efficiencyPercent: number): number {
  if (!(efficiencyPercent > 0 && efficiencyPercent <= 100)) {
    throw new InvalidInputError(`efficiencyPercent must be within (0, 100] (got ${efficiencyPercent})`);
  }
  if (!(outputPowerW > 0)) {
    throw new InvalidInputError(`outputPowerW must be > 0 (got ${outputPowerW})`);
  }
  return outputPowerW * (1 + 100 / efficiencyPercent);
}

// ─── Flux density table ───────────────────────────────────────────────────────

interface FluxBand {
  /** Inclusive upper frequency bound of the band. */
  maxFrequencyHz: number;
  bmaxT: number;
  limitation: BmaxLimitation;
}

/**
 * Operating Bmax by (material family, frequency band).  At high frequency the
 * limit is core loss, not saturation.
 */
export const FLUX_DENSITY_TABLE: Record<MaterialFamily, readonly FluxBand[]> = {
  ferrite: [
    { maxFrequencyHz: 20_000,   bmaxT: 0.30, limitation: 'saturation_limited' },
    { maxFrequencyHz: 100_000,  bmaxT: 0.10, limitation: 'loss_limited' },
    { maxFrequencyHz: 500_000,  bmaxT: 0.05, limitation: 'loss_limited' },
    { maxFrequencyHz: Infinity, bmaxT: 0.03, limitation: 'loss_limited' },
  ],
  silicon_steel: [
    { maxFrequencyHz: 60,       bmaxT: 1.5, limitation: 'saturation_limited' },
    { maxFrequencyHz: 400,      bmaxT: 1.2, limitation: 'mixed' },
    { maxFrequencyHz: Infinity, bmaxT: 0.8, limitation: 'loss_limited' },
  ],
  amorphous: [
    { maxFrequencyHz: 1000,     bmaxT: 1.3, limitation: 'saturation_limited' },
    { maxFrequencyHz: 20_000,   bmaxT: 0.8, limitation: 'loss_limited' },
    { maxFrequencyHz: Infinity, bmaxT: 0.4, limitation: 'loss_limited' },
  ],
  powder: [
    { maxFrequencyHz: Infinity, bmaxT: 0.6, limitation: 'dc_bias_limited' },
  ],
};

const FAMILY_NOTES: Record<MaterialFamily, string> = {
  ferrite: 'Ferrite: loss increases rapidly with B²·f²',
  silicon_steel: 'Silicon steel: not recommended above 1 kHz',
  amorphous: 'Amorphous: best suited to 400 Hz – 20 kHz',
  powder: 'Powder cores: permeability drops with DC bias',
};

export interface FluxDensitySelection {
  bmaxT: number;
  limitation: BmaxLimitation;
  family: MaterialFamily;
  notes: string[];
}

export function selectFluxDensity(frequencyHz: number, family: MaterialFamily): FluxDensitySelection {
  const bands = FLUX_DENSITY_TABLE[family];
  const band = bands.find(b => frequencyHz <= b.maxFrequencyHz) ?? bands[bands.length - 1];
  return {
    bmaxT: band.bmaxT,
    limitation: band.limitation,
    family,
    notes: [FAMILY_NOTES[family]],
  };
}

// ─── Normalized requests ──────────────────────────────────────────────────────

export interface NormalizedTransformerV1 {
  apparentPowerVA: number;
  kf: number;
  materialGrade: string;
  family: MaterialFamily;
  flux: FluxDensitySelection;
  method: DesignMethod;
  /** Winding and core temperature used for resistance and loss: ambient + rise/2. */
  operatingTempC: number;
}

export function normalizeTransformerRequirements(req: TransformerRequirementsV1): NormalizedTransformerV1 {
  const materialGrade = req.preferredMaterial ?? defaultMaterialGrade('transformer', req.frequencyHz);
  const family = resolveMaterialFamily(materialGrade);
  return {
    apparentPowerVA: calculateApparentPower(req.outputPowerW, req.efficiencyPercent),
    kf: waveformCoefficient(req.waveform),
    materialGrade,
    family,
    flux: selectFluxDensity(req.frequencyHz, family),
    method: selectDesignMethod(req.frequencyHz, req.regulationPercent, req.designMethod),
    operatingTempC: req.ambientTempC + req.maxTempRiseC / 2,
  };
}

export interface NormalizedInductorV1 {
  inductanceH: number;
  peakCurrentA: number;
  rmsCurrentA: number;
  materialGrade: string;
  family: MaterialFamily;
  /** Table Bmax derated by the requested margin. */
  flux: FluxDensitySelection;
  operatingTempC: number;
}

/** Irms of DC plus triangular ripple: √(Idc² + (ΔI / 2√3)²). */
export function inductorRmsCurrent(dcCurrentA: number, rippleCurrentA: number): number {
  return Math.sqrt(dcCurrentA ** 2 + (rippleCurrentA / (2 * Math.sqrt(3))) ** 2);
}

export function normalizeInductorRequirements(req: InductorRequirementsV1): NormalizedInductorV1 {
  const materialGrade =
    req.preferredMaterial ?? defaultMaterialGrade('inductor', req.frequencyHz, req.allowPowderCores);
  const family = resolveMaterialFamily(materialGrade);
  const table = selectFluxDensity(req.frequencyHz, family);
  const derate = 1 - req.bmaxMarginPercent / 100;
  return {
    inductanceH: req.inductanceUH * 1e-6,
    peakCurrentA: req.peakCurrentA ?? req.dcCurrentA + req.rippleCurrentA / 2,
    rmsCurrentA: inductorRmsCurrent(req.dcCurrentA, req.rippleCurrentA),
    materialGrade,
    family,
    flux: {
      ...table,
      bmaxT: table.bmaxT * derate,
      notes: [...table.notes, `Bmax derated ${req.bmaxMarginPercent}% below the ${table.bmaxT} T table value`],
    },
    operatingTempC: req.ambientTempC + req.maxTempRiseC / 2,
  };
}
