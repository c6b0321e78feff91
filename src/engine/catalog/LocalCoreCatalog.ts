/**
 * LocalCoreCatalog — the bundled core database.
 *
 * Records are validated once at construction and frozen, so a single catalog
 * instance can be shared by any number of concurrent design requests.
 */

import { z } from 'zod';
import coreCatalog from '../data/coreCatalog.json';
import type { CoreCandidateV1 } from '../../contracts/DesignResultV1';
import {
  matchesFilters,
  sortByAreaProduct,
  type CoreCandidateProvider,
  type CoreSearchFilters,
} from './CoreCandidateProvider';
import { lookupMaterial, type MaterialPropertiesV1 } from './materials';

const CatalogEntrySchema = z.object({
  manufacturer: z.string().min(1),
  partNumber: z.string().min(1),
  geometry: z.string().min(1),
  material: z.string().min(1),
  aeCm2: z.number().positive(),
  waCm2: z.number().positive(),
  apCm4: z.number().positive(),
  mltCm: z.number().positive(),
  lmCm: z.number().positive(),
  veCm3: z.number().positive(),
  atCm2: z.number().positive(),
  weightG: z.number().positive(),
  bsatT: z.number().positive(),
  muI: z.number().positive(),
  datasheetUrl: z.string().url().optional(),
});

export type CatalogEntry = z.infer<typeof CatalogEntrySchema>;

export class LocalCoreCatalog implements CoreCandidateProvider {
  readonly name = 'local';
  private readonly cores: readonly CoreCandidateV1[];

  constructor(entries: readonly CatalogEntry[]) {
    const parsed = z.array(CatalogEntrySchema).parse(entries);
    this.cores = Object.freeze(
      sortByAreaProduct(parsed.map(entry => Object.freeze({ ...entry, source: 'local' as const }))),
    );
  }

  isAvailable(): boolean {
    return true;
  }

  search(filters: CoreSearchFilters): readonly CoreCandidateV1[] {
    const matches = this.cores.filter(core => matchesFilters(core, filters));
    return filters.limit !== undefined ? matches.slice(0, filters.limit) : matches;
  }

  materialProperties(name: string): MaterialPropertiesV1 | null {
    return lookupMaterial(name);
  }

  get size(): number {
    return this.cores.length;
  }
}

let bundled: LocalCoreCatalog | null = null;

/** The catalog shipped in data/coreCatalog.json, built on first use. */
export function getBundledCatalog(): LocalCoreCatalog {
  bundled ??= new LocalCoreCatalog(coreCatalog);
  return bundled;
}
