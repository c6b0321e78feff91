/**
 * CoreCandidateModule — candidate search, ranking and "no match" recovery.
 *
 * A core is suitable when 0.9 × Ap_req ≤ Ap ≤ 5.0 × Ap_req.  Above 1 kHz only
 * ferrite grades are kept; at line frequency only grades of the requested
 * material family.  If that family filter empties the list, the unfiltered
 * Ap band is used instead.
 *
 * When nothing fits, the caller gets a NoMatchResultV1 rather than an error:
 * required vs largest Ap, up to four parameter suggestions, the three largest
 * cores with their ratings, and free-text alternatives.
 */

import type {
  InductorRequirementsV1,
  TransformerRequirementsV1,
} from '../../contracts/DesignRequirementsV1';
import type {
  CoreAlternativeV1,
  CoreCandidateV1,
  DesignSuggestionV1,
  NoMatchResultV1,
  SizingResultV1,
} from '../../contracts/DesignResultV1';
import {
  sortByAreaProduct,
  type CoreCandidateProvider,
  type CoreSearchFilters,
} from '../catalog/CoreCandidateProvider';
import { classifyMaterialName, type MaterialFamily } from '../catalog/materials';
import { HIGH_FREQUENCY_THRESHOLD_HZ } from '../config/designDefaults';
import { makeEngineEvent, silentLogger, type EngineLogger } from '../logging/engineLogger';

export const AP_BAND_MIN = 0.9;
export const AP_BAND_MAX = 5.0;
export const DEFAULT_CANDIDATE_COUNT = 10;

/** Output power ≈ 0.45 × Pt capacity at ~90 % efficiency. */
export const RATED_POWER_FACTOR = 0.45;
export const MAX_SUGGESTED_FREQUENCY_HZ = 500_000;
export const MAX_SUGGESTED_CURRENT_DENSITY = 800;
export const FEASIBLE_CURRENT_DENSITY = 600;
export const SUGGESTED_KU = 0.45;
export const PLANAR_HINT_FREQUENCY_HZ = 100_000;

// ── Search ────────────────────────────────────────────────────────────────────

export function searchCores(
  provider: CoreCandidateProvider,
  filters: CoreSearchFilters,
): CoreCandidateV1[] {
  return sortByAreaProduct(provider.search(filters));
}

/** Whether a grade belongs with the frequency / family being designed for. */
export function suitsFrequency(material: string, frequencyHz: number, family: MaterialFamily): boolean {
  const classified = classifyMaterialName(material);
  if (frequencyHz > HIGH_FREQUENCY_THRESHOLD_HZ) {
    return classified === null || classified === 'ferrite';
  }
  return classified === family;
}

function filterByFamily(
  cores: CoreCandidateV1[],
  frequencyHz: number,
  family: MaterialFamily,
): CoreCandidateV1[] {
  const filtered = cores.filter(c => suitsFrequency(c.material, frequencyHz, family));
  return filtered.length > 0 ? filtered : cores;
}

export interface CandidateQuery {
  requiredApCm4: number;
  frequencyHz: number;
  family: MaterialFamily;
  geometry?: string;
  material?: string;
  count?: number;
}

export function findSuitableCores(provider: CoreCandidateProvider, query: CandidateQuery): CoreCandidateV1[] {
  const band = searchCores(provider, {
    minApCm4: query.requiredApCm4 * AP_BAND_MIN,
    maxApCm4: query.requiredApCm4 * AP_BAND_MAX,
    geometry: query.geometry,
    material: query.material,
  });
  return filterByFamily(band, query.frequencyHz, query.family).slice(
    0,
    query.count ?? DEFAULT_CANDIDATE_COUNT,
  );
}

function coreKey(core: CoreCandidateV1): string {
  return `${core.manufacturer.toUpperCase()}|${core.partNumber.toUpperCase()}`;
}

/** Local cores first on key collisions, then everything re-sorted by Ap. */
export function mergeCandidates(...lists: CoreCandidateV1[][]): CoreCandidateV1[] {
  const seen = new Map<string, CoreCandidateV1>();
  for (const list of lists) {
    for (const core of list) {
      const key = coreKey(core);
      if (!seen.has(key)) seen.set(key, core);
    }
  }
  return sortByAreaProduct([...seen.values()]);
}

/**
 * Runs a query against a provider that is allowed to fail.  An unavailable
 * or throwing source contributes nothing and is logged at warn.
 */
export function queryOptionalProvider(
  provider: CoreCandidateProvider,
  run: (p: CoreCandidateProvider) => CoreCandidateV1[],
  logger: EngineLogger,
): CoreCandidateV1[] {
  try {
    if (!provider.isAvailable()) {
      logger.warn(makeEngineEvent('candidates', 'external_source_unavailable', {
        provider: provider.name,
        reason: 'provider reported unavailable',
      }));
      return [];
    }
    return run(provider);
  } catch (err) {
    logger.warn(makeEngineEvent('candidates', 'external_source_unavailable', {
      provider: provider.name,
      reason: err instanceof Error ? err.message : String(err),
    }));
    return [];
  }
}

export function findCandidatesHybrid(
  local: CoreCandidateProvider,
  external: CoreCandidateProvider | undefined,
  query: CandidateQuery,
  logger: EngineLogger = silentLogger,
): CoreCandidateV1[] {
  const fromLocal = findSuitableCores(local, query);
  const fromExternal = external
    ? queryOptionalProvider(external, p => findSuitableCores(p, query), logger)
    : [];
  return mergeCandidates(fromLocal, fromExternal).slice(0, query.count ?? DEFAULT_CANDIDATE_COUNT);
}

/** Every core the sources hold for this frequency / family, ascending by Ap. */
export function listAvailableCores(
  local: CoreCandidateProvider,
  external: CoreCandidateProvider | undefined,
  frequencyHz: number,
  family: MaterialFamily,
  logger: EngineLogger = silentLogger,
): CoreCandidateV1[] {
  const fromLocal = searchCores(local, {});
  const fromExternal = external ? queryOptionalProvider(external, p => searchCores(p, {}), logger) : [];
  return filterByFamily(mergeCandidates(fromLocal, fromExternal), frequencyHz, family);
}

/**
 * Cores above the 5× band, for requirements smaller than anything stocked.
 * Smallest first; only consulted when the band itself is empty.
 */
export function findOversizedCores(
  available: readonly CoreCandidateV1[],
  requiredApCm4: number,
  count = DEFAULT_CANDIDATE_COUNT,
): CoreCandidateV1[] {
  return sortByAreaProduct(available.filter(c => c.apCm4 >= requiredApCm4 * AP_BAND_MIN)).slice(0, count);
}

// ── Ratings ───────────────────────────────────────────────────────────────────

/** Output power a core can carry at this operating point (inverse Ap equation × 0.45). */
export function ratedMaxPowerW(
  core: Pick<CoreCandidateV1, 'apCm4'>,
  frequencyHz: number,
  bmaxT: number,
  currentDensityAcm2: number,
  ku: number,
  kf: number,
): number {
  const pt = (core.apCm4 * kf * ku * bmaxT * currentDensityAcm2 * frequencyHz) / 1e4;
  return pt * RATED_POWER_FACTOR;
}

/** Energy (µJ) a core can store: E = Ap × Bmax × J × Ku / (2 × 10⁴). */
export function ratedMaxEnergyUJ(
  core: Pick<CoreCandidateV1, 'apCm4'>,
  bmaxT: number,
  currentDensityAcm2: number,
  ku: number,
): number {
  return ((core.apCm4 * bmaxT * currentDensityAcm2 * ku) / (2 * 1e4)) * 1e6;
}

// ── No-match recovery ─────────────────────────────────────────────────────────

export function largestCores(cores: readonly CoreCandidateV1[], count = 3): CoreCandidateV1[] {
  return [...cores].sort((a, b) => b.apCm4 - a.apCm4).slice(0, count);
}

function commonSuggestions(
  frequencyHz: number,
  currentDensityAcm2: number,
  ku: number,
  requiredApCm4: number,
  maxApCm4: number,
): DesignSuggestionV1[] {
  const suggestions: DesignSuggestionV1[] = [];
  const ratio = requiredApCm4 / maxApCm4;

  // Raising f or J only helps when the requirement is above what is on offer.
  if (ratio > 1) {
    if (frequencyHz < MAX_SUGGESTED_FREQUENCY_HZ) {
      const suggested = frequencyHz * ratio * 1.1;
      if (suggested <= MAX_SUGGESTED_FREQUENCY_HZ) {
        suggestions.push({
          parameter: 'frequencyHz',
          currentValue: frequencyHz,
          suggestedValue: Math.round(suggested / 1000) * 1000,
          unit: 'Hz',
          impact: `Higher frequency reduces required Ap from ${requiredApCm4.toFixed(1)} to ~${maxApCm4.toFixed(1)} cm⁴`,
          feasible: true,
        });
      }
    }

    if (currentDensityAcm2 < FEASIBLE_CURRENT_DENSITY) {
      const suggested = currentDensityAcm2 * ratio;
      if (suggested <= MAX_SUGGESTED_CURRENT_DENSITY) {
        suggestions.push({
          parameter: 'maxCurrentDensityAcm2',
          currentValue: currentDensityAcm2,
          suggestedValue: Math.round(suggested / 50) * 50,
          unit: 'A/cm²',
          impact: 'Higher current density reduces wire size, allowing a smaller core (increases losses)',
          feasible: suggested <= FEASIBLE_CURRENT_DENSITY,
        });
      }
    }
  }

  if (ku < 0.5) {
    suggestions.push({
      parameter: 'windowUtilizationKu',
      currentValue: ku,
      suggestedValue: SUGGESTED_KU,
      unit: '',
      impact: 'Higher fill factor allows a smaller core (requires careful winding)',
      feasible: true,
    });
  }
  return suggestions;
}

function alternativeApproaches(frequencyHz: number, designKind: 'transformer' | 'inductor'): string[] {
  const alternatives = [
    designKind === 'transformer'
      ? 'Consider using multiple smaller transformers in parallel'
      : 'Consider splitting the inductance across several inductors in series or parallel',
    'Consider silicon steel cores for higher power at lower frequency (50-400Hz)',
    'Connect an external core database for a wider core selection',
    'Custom core design may be required for this rating',
  ];
  if (frequencyHz > PLANAR_HINT_FREQUENCY_HZ) {
    alternatives.unshift('Consider planar magnetics for this power/frequency combination');
  }
  return alternatives;
}

function noMatchMessage(requiredApCm4: number, maxApCm4: number): string {
  if (maxApCm4 <= 0) {
    return `No available core suits the frequency and preferences (required Ap ${requiredApCm4.toFixed(1)} cm⁴)`;
  }
  if (maxApCm4 >= requiredApCm4) {
    return `No available core fits the Ap band for ${requiredApCm4.toFixed(1)} cm⁴ (largest ${maxApCm4.toFixed(1)} cm⁴)`;
  }
  return `Required Ap (${requiredApCm4.toFixed(1)} cm⁴) exceeds largest available core (${maxApCm4.toFixed(1)} cm⁴)`;
}

export function buildTransformerNoMatch(
  req: TransformerRequirementsV1,
  sizing: SizingResultV1,
  kf: number,
  available: readonly CoreCandidateV1[],
): NoMatchResultV1 {
  const closest = largestCores(available);
  const largest = closest[0];
  const maxApCm4 = largest?.apCm4 ?? 0;
  const rate = (core: CoreCandidateV1) =>
    ratedMaxPowerW(core, req.frequencyHz, sizing.bmaxT, req.maxCurrentDensityAcm2, req.windowUtilizationKu, kf);

  const suggestions: DesignSuggestionV1[] = [];
  if (largest) {
    const maxPowerW = rate(largest);
    if (req.outputPowerW > maxPowerW) {
      suggestions.push({
        parameter: 'outputPowerW',
        currentValue: req.outputPowerW,
        suggestedValue: Math.round(maxPowerW * 0.9),
        unit: 'W',
        impact: `Largest available core (${largest.partNumber}) can handle up to ~${maxPowerW.toFixed(0)}W`,
        feasible: true,
      });
    }
    suggestions.push(
      ...commonSuggestions(
        req.frequencyHz,
        req.maxCurrentDensityAcm2,
        req.windowUtilizationKu,
        sizing.requiredApCm4,
        maxApCm4,
      ),
    );
  }

  return {
    kind: 'no_match',
    designKind: 'transformer',
    message: noMatchMessage(sizing.requiredApCm4, maxApCm4),
    requiredApCm4: sizing.requiredApCm4,
    availableMaxApCm4: maxApCm4,
    suggestions,
    closestCores: closest.map((core): CoreAlternativeV1 => ({
      partNumber: core.partNumber,
      manufacturer: core.manufacturer,
      geometry: core.geometry,
      apCm4: core.apCm4,
      maxPowerW: rate(core),
      maxEnergyUJ: null,
      notes: `Largest ${core.geometry} core available`,
    })),
    alternativeApproaches: alternativeApproaches(req.frequencyHz, 'transformer'),
  };
}

export function buildInductorNoMatch(
  req: InductorRequirementsV1,
  sizing: SizingResultV1,
  available: readonly CoreCandidateV1[],
): NoMatchResultV1 {
  const closest = largestCores(available);
  const largest = closest[0];
  const maxApCm4 = largest?.apCm4 ?? 0;
  const rate = (core: CoreCandidateV1) =>
    ratedMaxEnergyUJ(core, sizing.bmaxT, req.maxCurrentDensityAcm2, req.windowUtilizationKu);

  const suggestions: DesignSuggestionV1[] = [];
  if (largest) {
    const energyUJ = sizing.energyUJ ?? 0;
    const maxEnergyUJ = rate(largest);
    if (energyUJ > maxEnergyUJ) {
      // E ∝ L at fixed peak current
      const suggestedUH = req.inductanceUH * (maxEnergyUJ / energyUJ) * 0.9;
      suggestions.push({
        parameter: 'inductanceUH',
        currentValue: req.inductanceUH,
        suggestedValue: Math.round(suggestedUH * 10) / 10,
        unit: 'µH',
        impact: `Largest available core (${largest.partNumber}) can store up to ~${maxEnergyUJ.toFixed(0)} µJ`,
        feasible: true,
      });
    }
    suggestions.push(
      ...commonSuggestions(
        req.frequencyHz,
        req.maxCurrentDensityAcm2,
        req.windowUtilizationKu,
        sizing.requiredApCm4,
        maxApCm4,
      ),
    );
  }

  return {
    kind: 'no_match',
    designKind: 'inductor',
    message: noMatchMessage(sizing.requiredApCm4, maxApCm4),
    requiredApCm4: sizing.requiredApCm4,
    availableMaxApCm4: maxApCm4,
    suggestions,
    closestCores: closest.map((core): CoreAlternativeV1 => ({
      partNumber: core.partNumber,
      manufacturer: core.manufacturer,
      geometry: core.geometry,
      apCm4: core.apCm4,
      maxPowerW: null,
      maxEnergyUJ: rate(core),
      notes: `Largest ${core.geometry} core available`,
    })),
    alternativeApproaches: alternativeApproaches(req.frequencyHz, 'inductor'),
  };
}
