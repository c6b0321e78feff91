/**
 * Material table and MaterialFamily resolver.
 *
 * This is the one canonical source of Steinmetz coefficients in the engine.
 * Each grade is calibrated from a single 100 °C datasheet anchor point:
 *
 *   Pv [mW/cm³] = k × f_kHz^α × B_mT^β,   k = Pv_anchor / (f_anchor^α × B_anchor^β)
 *
 * Lookup is case-insensitive: exact grade, then longest grade prefix, then the
 * generic entry of the family the name classifies into, then generic ferrite.
 */

import { z } from 'zod';
import steinmetzTable from '../data/steinmetzCoefficients.json';
import { HIGH_FREQUENCY_THRESHOLD_HZ } from '../config/designDefaults';

export const MaterialFamilySchema = z.enum(['ferrite', 'silicon_steel', 'amorphous', 'powder']);

export type MaterialFamily = z.infer<typeof MaterialFamilySchema>;

const MaterialEntrySchema = z.object({
  name: z.string(),
  family: MaterialFamilySchema,
  alpha: z.number().positive(),
  beta: z.number().positive(),
  anchor: z.object({
    frequencyKHz: z.number().positive(),
    fluxDensityMT: z.number().positive(),
    lossDensityMWcm3: z.number().positive(),
  }),
  saturationT: z.number().positive(),
  permeability: z.number().positive(),
});

export interface MaterialPropertiesV1 {
  name: string;
  family: MaterialFamily;
  /** Steinmetz k for f in kHz, B in mT, Pv in mW/cm³. */
  k: number;
  alpha: number;
  beta: number;
  permeability: number;
  saturationT: number;
  maxTempC: number;
}

/** Curie-limited ferrites are held lower than metal-alloy cores. */
export const MATERIAL_MAX_TEMP_C: Record<MaterialFamily, number> = {
  ferrite: 120,
  silicon_steel: 150,
  amorphous: 150,
  powder: 150,
};

/** Grade prefixes recognised as MnZn / NiZn power ferrite. */
export const FERRITE_PREFIXES = ['3C', '3F', '3E', 'N', 'PC', 'P', 'R', 'T'] as const;

const MATERIALS: readonly MaterialPropertiesV1[] = Object.freeze(
  z.array(MaterialEntrySchema).parse(steinmetzTable).map(entry => {
    const { frequencyKHz, fluxDensityMT, lossDensityMWcm3 } = entry.anchor;
    return Object.freeze({
      name: entry.name,
      family: entry.family,
      k: lossDensityMWcm3 / (frequencyKHz ** entry.alpha * fluxDensityMT ** entry.beta),
      alpha: entry.alpha,
      beta: entry.beta,
      permeability: entry.permeability,
      saturationT: entry.saturationT,
      maxTempC: MATERIAL_MAX_TEMP_C[entry.family],
    });
  }),
);

export function listMaterials(): readonly MaterialPropertiesV1[] {
  return MATERIALS;
}

/** Family implied by a grade name alone, or null when it is unrecognisable. */
export function classifyMaterialName(name: string): MaterialFamily | null {
  const upper = name.trim().toUpperCase();
  if (upper.length === 0) return null;
  if (upper.includes('KOOL') || upper.startsWith('MPP') || upper.includes('POWDER') ||
      upper.includes('HIGH_FLUX') || upper.includes('XFLUX')) {
    return 'powder';
  }
  if (upper.includes('AMORPH') || upper.startsWith('26')) return 'amorphous';
  if (upper.includes('SILICON') || upper.includes('STEEL') || /^M\d/.test(upper)) return 'silicon_steel';
  if (upper.includes('FERRITE') || FERRITE_PREFIXES.some(p => upper.startsWith(p))) return 'ferrite';
  return null;
}

function genericEntry(family: MaterialFamily): MaterialPropertiesV1 {
  const entry = MATERIALS.find(m => m.name === family);
  if (!entry) throw new Error(`Material table has no generic '${family}' entry`);
  return entry;
}

/** Resolve any grade name to its table entry (never fails; generic ferrite last). */
export function lookupMaterial(name: string): MaterialPropertiesV1 {
  const upper = name.trim().toUpperCase();

  const exact = MATERIALS.find(m => m.name.toUpperCase() === upper);
  if (exact) return exact;

  const byPrefix = MATERIALS
    .filter(m => upper.startsWith(m.name.toUpperCase()))
    .sort((a, b) => b.name.length - a.name.length)[0];
  if (byPrefix) return byPrefix;

  return genericEntry(classifyMaterialName(name) ?? 'ferrite');
}

export function resolveMaterialFamily(name: string): MaterialFamily {
  return lookupMaterial(name).family;
}

/**
 * Default grade when the request names none.
 *  - transformers: N87 above 1 kHz, M6 silicon steel at line frequency
 *  - inductors:    3C95 above 1 kHz, Kool Mµ powder at low frequency when allowed
 */
export function defaultMaterialGrade(
  kind: 'transformer' | 'inductor',
  frequencyHz: number,
  allowPowderCores = true,
): string {
  const highFrequency = frequencyHz > HIGH_FREQUENCY_THRESHOLD_HZ;
  if (kind === 'transformer') return highFrequency ? 'N87' : 'M6';
  if (highFrequency || !allowPowderCores) return '3C95';
  return 'Kool_Mu';
}
