/**
 * WireSelectionModule — solid and Litz conductor selection.
 *
 * Skin depth in copper:   δ = 66.2 / √f × √(1 + 0.00393 (T − 20))   [mm]
 *
 * Solid wire:  smallest gauge that meets the copper area.  If its diameter
 *              exceeds 2δ, the area is made up from parallel strands of the
 *              coarsest gauge that is still within 2δ.
 *
 * Litz wire:   strand gauge from frequency bands, refined until d ≤ 1.5δ
 *              (1.0δ above 500 kHz); strand count rounded up to a standard
 *              bundle; OD = √(N·4/π) × 0.866 × d × 1.25.
 */

import { z } from 'zod';
import awgTable from '../data/awgTable.json';
import type { WireSpecV1 } from '../../contracts/DesignResultV1';
import { COPPER_TEMP_COEFFICIENT, LITZ_THRESHOLD_HZ } from '../config/designDefaults';
import { InvalidInputError } from '../errors';

const AwgEntrySchema = z.object({
  awg: z.number().int().min(0),
  diameterMm: z.number().positive(),
  areaMm2: z.number().positive(),
  areaCm2: z.number().positive(),
});

export type AwgEntry = z.infer<typeof AwgEntrySchema>;

/** Coarsest (AWG 0) first. */
const AWG_TABLE: readonly AwgEntry[] = Object.freeze(
  z.array(AwgEntrySchema).parse(awgTable).sort((a, b) => a.awg - b.awg),
);

export const FINEST_AWG = 46;
/** Finest gauge used for solid-wire paralleling. */
export const MAX_SOLID_AWG = 40;

export function awgToWire(awg: number): AwgEntry {
  const entry = AWG_TABLE.find(e => e.awg === awg);
  if (!entry) throw new InvalidInputError(`AWG ${awg} is outside the wire table (0–${FINEST_AWG})`);
  return entry;
}

// ── Skin effect ───────────────────────────────────────────────────────────────

/** Infinity at DC. */
export function skinDepthMm(frequencyHz: number, temperatureC = 20): number {
  if (frequencyHz <= 0) return Infinity;
  const rhoFactor = 1 + COPPER_TEMP_COEFFICIENT * (temperatureC - 20);
  return (66.2 / Math.sqrt(frequencyHz)) * Math.sqrt(rhoFactor);
}

export function calculateWireArea(currentRmsA: number, currentDensityAcm2: number): number {
  if (currentRmsA < 0 || !(currentDensityAcm2 > 0)) {
    throw new InvalidInputError(
      `wire sizing needs current ≥ 0 and density > 0 (got ${currentRmsA} A, ${currentDensityAcm2} A/cm²)`,
    );
  }
  return currentRmsA / currentDensityAcm2;
}

// ── Solid wire ────────────────────────────────────────────────────────────────

function solidSpec(entry: AwgEntry, strands: number, skinEffectLimited: boolean): WireSpecV1 {
  return {
    type: 'solid',
    awg: entry.awg,
    diameterMm: entry.diameterMm,
    strandCount: strands,
    areaCm2: entry.areaCm2 * strands,
    outerDiameterMm: entry.diameterMm * Math.sqrt(strands),
    skinEffectLimited,
    bundleArrangement: null,
    acFactor: null,
    effective: null,
  };
}

export function selectWireGauge(requiredAreaCm2: number, frequencyHz = 0): WireSpecV1 {
  const maxDiameterMm = 2 * skinDepthMm(frequencyHz);
  const usable = AWG_TABLE.filter(e => e.awg <= MAX_SOLID_AWG);

  // finest → coarsest: the first that meets the area is the smallest that does
  const single = [...usable].reverse().find(e => e.areaCm2 >= requiredAreaCm2);
  if (single) {
    if (single.diameterMm <= maxDiameterMm) return solidSpec(single, 1, false);
    const strand = usable.find(e => e.awg > single.awg && e.diameterMm <= maxDiameterMm);
    if (strand) return solidSpec(strand, Math.ceil(requiredAreaCm2 / strand.areaCm2), true);
  }

  const finest = awgToWire(MAX_SOLID_AWG);
  return solidSpec(finest, Math.ceil(requiredAreaCm2 / finest.areaCm2), frequencyHz > 0);
}

// ── Litz wire ─────────────────────────────────────────────────────────────────

export const LITZ_BUNDLE_SIZES = [7, 19, 37, 65, 127, 259, 427, 741, 1050, 2100] as const;

interface LitzBand {
  /** Exclusive upper bound. */
  maxFrequencyHz: number;
  strandAwg: number;
}

export const LITZ_STRAND_BANDS: readonly LitzBand[] = [
  { maxFrequencyHz: 50_000,   strandAwg: 40 },
  { maxFrequencyHz: 100_000,  strandAwg: 42 },
  { maxFrequencyHz: 500_000,  strandAwg: 44 },
  { maxFrequencyHz: Infinity, strandAwg: 46 },
];

const BUNDLE_ARRANGEMENTS: Record<number, string> = {
  7: '7×1',
  19: '19×1',
  37: '37×1',
  65: '65×1',
  127: '127×1',
  259: '37×7',
  427: '61×7',
  741: '19×39',
  1050: '7×150',
  2100: '7×300',
};

export function describeBundleArrangement(strands: number): string {
  return BUNDLE_ARRANGEMENTS[strands] ?? `${strands}×1`;
}

export function maxLitzStrandDiameterMm(frequencyHz: number): number {
  const delta = skinDepthMm(frequencyHz);
  return frequencyHz > 500_000 ? delta : 1.5 * delta;
}

export function selectLitzStrandAwg(frequencyHz: number): number {
  const band = LITZ_STRAND_BANDS.find(b => frequencyHz < b.maxFrequencyHz);
  const recommended = band?.strandAwg ?? FINEST_AWG;
  const limit = maxLitzStrandDiameterMm(frequencyHz);
  for (let awg = recommended; awg <= FINEST_AWG; awg++) {
    if (awgToWire(awg).diameterMm <= limit) return awg;
  }
  return FINEST_AWG;
}

/** First standard bundle holding at least `needed` strands, else `needed` itself. */
export function selectBundleSize(needed: number): number {
  return LITZ_BUNDLE_SIZES.find(size => size >= needed) ?? needed;
}

/**
 * Rac/Rdc of a Litz bundle: per-strand skin term × inter-strand proximity
 * term, both in d/δ.
 */
export function estimateLitzAcFactor(strandDiameterMm: number, frequencyHz: number, strands: number): number {
  const dd = strandDiameterMm / skinDepthMm(frequencyHz);

  let skin: number;
  if (dd < 0.5) skin = 1.0;
  else if (dd < 1.0) skin = 1 + 0.1 * dd ** 2;
  else if (dd < 2.0) skin = 1 + 0.3 * dd ** 2;
  else skin = dd;

  let proximity: number;
  if (strands <= 19) proximity = 1.0;
  else if (strands <= 65) proximity = 1 + 0.02 * dd ** 2;
  else if (strands <= 259) proximity = 1 + 0.05 * dd ** 2;
  else proximity = 1 + 0.1 * dd ** 2;

  return skin * proximity;
}

export function recommendLitzWire(requiredAreaCm2: number, frequencyHz: number): WireSpecV1 {
  const strand = awgToWire(selectLitzStrandAwg(frequencyHz));
  const needed = Math.max(1, Math.ceil(requiredAreaCm2 / strand.areaCm2));
  const strands = selectBundleSize(needed);
  const acFactor = estimateLitzAcFactor(strand.diameterMm, frequencyHz, strands);
  const outerDiameterMm = Math.sqrt((strands * 4) / Math.PI) * 0.866 * strand.diameterMm * 1.25;

  return {
    type: 'litz',
    awg: strand.awg,
    diameterMm: strand.diameterMm,
    strandCount: strands,
    areaCm2: strand.areaCm2 * strands,
    outerDiameterMm,
    skinEffectLimited: false,
    bundleArrangement: describeBundleArrangement(strands),
    acFactor,
    effective: strand.diameterMm <= 2 * skinDepthMm(frequencyHz) && acFactor < 1.5,
  };
}

export interface WireSelectionOptions {
  litzThresholdHz?: number;
  forceLitz?: boolean;
}

/** Litz at or above the threshold (or when forced) if the bundle is effective; solid otherwise. */
export function selectWireForFrequency(
  requiredAreaCm2: number,
  frequencyHz: number,
  options: WireSelectionOptions = {},
): WireSpecV1 {
  const threshold = options.litzThresholdHz ?? LITZ_THRESHOLD_HZ;
  if (frequencyHz >= threshold || options.forceLitz) {
    const litz = recommendLitzWire(requiredAreaCm2, frequencyHz);
    if (litz.effective) return litz;
  }
  return selectWireGauge(requiredAreaCm2, frequencyHz);
}
