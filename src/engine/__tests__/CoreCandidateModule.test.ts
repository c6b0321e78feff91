import { describe, it, expect } from 'vitest';
import {
  buildInductorNoMatch,
  buildTransformerNoMatch,
  findCandidatesHybrid,
  findOversizedCores,
  findSuitableCores,
  largestCores,
  listAvailableCores,
  mergeCandidates,
  ratedMaxEnergyUJ,
  ratedMaxPowerW,
  suitsFrequency,
} from '../modules/CoreCandidateModule';
import { LocalCoreCatalog, type CatalogEntry } from '../catalog/LocalCoreCatalog';
import { sortByAreaProduct, type CoreCandidateProvider } from '../catalog/CoreCandidateProvider';
import { lookupMaterial } from '../catalog/materials';
import { parseInductorRequirements, parseTransformerRequirements } from '../schema/DesignRequirementsSchema';
import type { EngineEvent, EngineLogger } from '../logging/engineLogger';
import type { CoreCandidateV1, SizingResultV1 } from '../../contracts/DesignResultV1';

function entry(partNumber: string, apCm4: number, material = 'N87', geometry = 'EE'): CatalogEntry {
  return {
    manufacturer: 'TDK',
    partNumber,
    geometry,
    material,
    aeCm2: apCm4,
    waCm2: 1,
    apCm4,
    mltCm: 5,
    lmCm: 5,
    veCm3: 5,
    atCm2: 20,
    weightG: 20,
    bsatT: 0.39,
    muI: 2200,
  };
}

class ExternalStub implements CoreCandidateProvider {
  readonly name = 'vendor-api';

  constructor(
    private readonly cores: CoreCandidateV1[],
    private readonly behaviour: 'ok' | 'unavailable' | 'throws' = 'ok',
  ) {}

  isAvailable(): boolean {
    return this.behaviour !== 'unavailable';
  }

  search(): readonly CoreCandidateV1[] {
    if (this.behaviour === 'throws') throw new Error('boom');
    return sortByAreaProduct(this.cores);
  }

  materialProperties(name: string) {
    return lookupMaterial(name);
  }
}

function recordingLogger(): EngineLogger & { warnings: EngineEvent[] } {
  const warnings: EngineEvent[] = [];
  return {
    warnings,
    debug: () => undefined,
    info: () => undefined,
    warn: event => {
      warnings.push(event);
    },
  };
}

function sizing(requiredApCm4: number, bmaxT: number, energyUJ: number | null = null): SizingResultV1 {
  return {
    method: energyUJ === null ? 'area_product' : 'energy',
    requiredApCm4,
    requiredKgCm5: null,
    bmaxT,
    bmaxLimitation: 'loss_limited',
    apparentPowerVA: null,
    energyUJ,
    optimalLossRatio: null,
    notes: [],
  };
}

const catalog = new LocalCoreCatalog([
  entry('E-1', 1),
  entry('E-2', 2),
  entry('E-5', 5),
  entry('E-9', 9),
  entry('E-12', 12),
  entry('M-4', 4, 'M6', 'EI'),
]);

describe('CoreCandidateModule', () => {
  // ── Family filter ─────────────────────────────────────────────────────────

  describe('suitsFrequency', () => {
    it('above 1 kHz only ferrite grades qualify', () => {
      expect(suitsFrequency('N87', 100_000, 'ferrite')).toBe(true);
      expect(suitsFrequency('M6', 100_000, 'ferrite')).toBe(false);
    });

    it('at line frequency the grade must match the requested family', () => {
      expect(suitsFrequency('M6', 50, 'silicon_steel')).toBe(true);
      expect(suitsFrequency('N87', 50, 'silicon_steel')).toBe(false);
    });
  });

  // ── Search ────────────────────────────────────────────────────────────────

  describe('findSuitableCores', () => {
    it('keeps 0.9× to 5× the required Ap, ferrite only, ascending', () => {
      const cores = findSuitableCores(catalog, { requiredApCm4: 2, frequencyHz: 100_000, family: 'ferrite' });
      expect(cores.map(c => c.partNumber)).toEqual(['E-2', 'E-5', 'E-9']);
    });

    it('band edges are inclusive', () => {
      const cores = findSuitableCores(catalog, { requiredApCm4: 2.4, frequencyHz: 100_000, family: 'ferrite' });
      expect(cores.map(c => c.partNumber)).toEqual(['E-5', 'E-9', 'E-12']);
    });

    it('falls back to the unfiltered band when the family filter empties it', () => {
      const cores = findSuitableCores(catalog, { requiredApCm4: 4, frequencyHz: 50, family: 'amorphous' });
      expect(cores.map(c => c.partNumber)).toEqual(['M-4', 'E-5', 'E-9', 'E-12']);
    });

    it('honours geometry and count', () => {
      expect(
        findSuitableCores(catalog, { requiredApCm4: 4, frequencyHz: 50, family: 'silicon_steel', geometry: 'ei' })
          .map(c => c.partNumber),
      ).toEqual(['M-4']);
      expect(
        findSuitableCores(catalog, { requiredApCm4: 2, frequencyHz: 100_000, family: 'ferrite', count: 1 })
          .map(c => c.partNumber),
      ).toEqual(['E-2']);
    });
  });

  describe('mergeCandidates', () => {
    it('the first list wins on a manufacturer/part collision', () => {
      const local = catalog.search({ minApCm4: 5, maxApCm4: 5 });
      const external: CoreCandidateV1 = { ...local[0], partNumber: 'e-5', apCm4: 5.5, source: 'external' };
      const merged = mergeCandidates([...local], [external]);
      expect(merged).toHaveLength(1);
      expect(merged[0].source).toBe('local');
    });
  });

  describe('findCandidatesHybrid', () => {
    const query = { requiredApCm4: 2, frequencyHz: 100_000, family: 'ferrite' as const };
    const externalCore: CoreCandidateV1 = { ...catalog.search({ minApCm4: 5, maxApCm4: 5 })[0], partNumber: 'X-3', apCm4: 3, source: 'external' };

    it('merges external cores into the local band', () => {
      const cores = findCandidatesHybrid(catalog, new ExternalStub([externalCore]), query);
      expect(cores.map(c => c.partNumber)).toEqual(['E-2', 'X-3', 'E-5', 'E-9']);
    });

    it('a throwing external source is logged and ignored', () => {
      const logger = recordingLogger();
      const cores = findCandidatesHybrid(catalog, new ExternalStub([externalCore], 'throws'), query, logger);
      expect(cores.map(c => c.partNumber)).toEqual(['E-2', 'E-5', 'E-9']);
      expect(logger.warnings).toHaveLength(1);
      expect(logger.warnings[0].event_type).toBe('external_source_unavailable');
      expect(logger.warnings[0].stage).toBe('candidates');
      expect(logger.warnings[0].payload).toEqual({ provider: 'vendor-api', reason: 'boom' });
    });

    it('an unavailable external source is skipped', () => {
      const logger = recordingLogger();
      findCandidatesHybrid(catalog, new ExternalStub([externalCore], 'unavailable'), query, logger);
      expect(logger.warnings[0].payload).toEqual({
        provider: 'vendor-api',
        reason: 'provider reported unavailable',
      });
    });
  });

  describe('oversized fallback', () => {
    it('picks the smallest cores at or above 0.9 × Ap', () => {
      const available = listAvailableCores(catalog, undefined, 100_000, 'ferrite');
      expect(available.map(c => c.partNumber)).toEqual(['E-1', 'E-2', 'E-5', 'E-9', 'E-12']);
      expect(findOversizedCores(available, 0.1, 2).map(c => c.partNumber)).toEqual(['E-1', 'E-2']);
      expect(findOversizedCores(available, 20)).toEqual([]);
    });
  });

  // ── Ratings ───────────────────────────────────────────────────────────────

  describe('ratings', () => {
    it('rated power is the inverse Ap equation × 0.45', () => {
      expect(ratedMaxPowerW({ apCm4: 10 }, 100_000, 0.1, 400, 0.35, 4.0)).toBeCloseTo(2520, 6);
    });

    it('rated energy is Ap·B·J·Ku / 2×10⁴ in µJ', () => {
      expect(ratedMaxEnergyUJ({ apCm4: 1 }, 0.08, 400, 0.35)).toBeCloseTo(560, 6);
    });

    it('largestCores sorts by Ap descending', () => {
      expect(largestCores(catalog.search({})).map(c => c.partNumber)).toEqual(['E-12', 'E-9', 'E-5']);
    });
  });

  // ── No match ──────────────────────────────────────────────────────────────

  describe('buildTransformerNoMatch', () => {
    const small = new LocalCoreCatalog([entry('E-2', 2), entry('E-5', 5), entry('E-10', 10)]).search({});

    it('over-rated power: suggests the largest core’s rating, then Ku', () => {
      const req = parseTransformerRequirements({
        outputPowerW: 5000,
        primaryVoltageV: 48,
        secondaryVoltageV: 12,
        frequencyHz: 100_000,
        waveform: 'square',
      });
      const result = buildTransformerNoMatch(req, sizing(50, 0.1), 4.0, small);
      expect(result.kind).toBe('no_match');
      expect(result.designKind).toBe('transformer');
      expect(result.message).toBe('Required Ap (50.0 cm⁴) exceeds largest available core (10.0 cm⁴)');
      expect(result.availableMaxApCm4).toBe(10);
      expect(result.suggestions.map(s => [s.parameter, s.suggestedValue])).toEqual([
        ['outputPowerW', 2268],
        ['windowUtilizationKu', 0.45],
      ]);
      expect(result.suggestions[0].impact).toBe('Largest available core (E-10) can handle up to ~2520W');
      expect(result.closestCores.map(c => c.partNumber)).toEqual(['E-10', 'E-5', 'E-2']);
      expect(result.closestCores[0].maxPowerW).toBeCloseTo(2520, 6);
      expect(result.closestCores[0].maxEnergyUJ).toBeNull();
      expect(result.alternativeApproaches[0]).toBe('Consider using multiple smaller transformers in parallel');
    });

    it('modest shortfall: frequency, current density and Ku', () => {
      const req = parseTransformerRequirements({
        outputPowerW: 100,
        primaryVoltageV: 48,
        secondaryVoltageV: 12,
        frequencyHz: 50_000,
        waveform: 'square',
      });
      const result = buildTransformerNoMatch(req, sizing(12, 0.1), 4.0, small);
      expect(result.suggestions).toEqual([
        {
          parameter: 'frequencyHz',
          currentValue: 50_000,
          suggestedValue: 66_000,
          unit: 'Hz',
          impact: 'Higher frequency reduces required Ap from 12.0 to ~10.0 cm⁴',
          feasible: true,
        },
        {
          parameter: 'maxCurrentDensityAcm2',
          currentValue: 400,
          suggestedValue: 500,
          unit: 'A/cm²',
          impact: 'Higher current density reduces wire size, allowing a smaller core (increases losses)',
          feasible: true,
        },
        {
          parameter: 'windowUtilizationKu',
          currentValue: 0.35,
          suggestedValue: 0.45,
          unit: '',
          impact: 'Higher fill factor allows a smaller core (requires careful winding)',
          feasible: true,
        },
      ]);
    });

    it('a largest core above the requirement never asks for higher f or J', () => {
      const req = parseTransformerRequirements({
        outputPowerW: 100,
        primaryVoltageV: 48,
        secondaryVoltageV: 12,
        frequencyHz: 50_000,
        waveform: 'square',
      });
      const result = buildTransformerNoMatch(req, sizing(8, 0.1), 4.0, small);
      expect(result.message).toBe('No available core fits the Ap band for 8.0 cm⁴ (largest 10.0 cm⁴)');
      expect(result.suggestions.map(s => s.parameter)).toEqual(['windowUtilizationKu']);
    });

    it('planar magnetics are suggested only above 100 kHz', () => {
      const req = parseTransformerRequirements({
        outputPowerW: 100,
        primaryVoltageV: 48,
        secondaryVoltageV: 12,
        frequencyHz: 150_000,
      });
      const result = buildTransformerNoMatch(req, sizing(12, 0.05), 4.44, small);
      expect(result.alternativeApproaches[0]).toBe('Consider planar magnetics for this power/frequency combination');
      expect(result.alternativeApproaches).toHaveLength(5);
    });

    it('an empty catalog yields no suggestions and zero max Ap', () => {
      const req = parseTransformerRequirements({
        outputPowerW: 100,
        primaryVoltageV: 48,
        secondaryVoltageV: 12,
        frequencyHz: 50_000,
      });
      const result = buildTransformerNoMatch(req, sizing(12, 0.1), 4.44, []);
      expect(result.message).toBe('No available core suits the frequency and preferences (required Ap 12.0 cm⁴)');
      expect(result.availableMaxApCm4).toBe(0);
      expect(result.suggestions).toEqual([]);
      expect(result.closestCores).toEqual([]);
    });
  });

  describe('buildInductorNoMatch', () => {
    it('suggests a smaller inductance scaled by storable energy', () => {
      const req = parseInductorRequirements({
        inductanceUH: 1000,
        dcCurrentA: 1.8,
        rippleCurrentA: 0.4,
        frequencyHz: 100_000,
      });
      const cores = new LocalCoreCatalog([entry('E-1', 1)]).search({});
      const result = buildInductorNoMatch(req, sizing(4, 0.08, 2000), cores);
      expect(result.designKind).toBe('inductor');
      expect(result.suggestions.map(s => [s.parameter, s.suggestedValue])).toEqual([
        ['inductanceUH', 252],
        ['frequencyHz', 440_000],
        ['windowUtilizationKu', 0.45],
      ]);
      expect(result.suggestions[0].impact).toBe('Largest available core (E-1) can store up to ~560 µJ');
      expect(result.closestCores[0].maxEnergyUJ).toBeCloseTo(560, 6);
      expect(result.closestCores[0].maxPowerW).toBeNull();
      expect(result.alternativeApproaches[0]).toBe(
        'Consider splitting the inductance across several inductors in series or parallel',
      );
    });
  });
});
