import type { CoreCandidateV1 } from '../../contracts/DesignResultV1';
import { classifyMaterialName, MaterialFamilySchema, type MaterialPropertiesV1 } from './materials';

export interface CoreSearchFilters {
  minApCm4?: number;
  maxApCm4?: number;
  /** Shape family, compared case-insensitively. */
  geometry?: string;
  manufacturer?: string;
  /**
   * A family name ('ferrite', 'powder', ...) matches every grade of that
   * family; anything else is a case-insensitive substring of the grade.
   */
  material?: string;
  limit?: number;
}

/**
 * A queryable source of core records.  Implementations must be safe for
 * concurrent reads and must never mutate the records they return.
 */
export interface CoreCandidateProvider {
  readonly name: string;
  isAvailable(): boolean;
  /** Matching cores, ascending by Ap. */
  search(filters: CoreSearchFilters): readonly CoreCandidateV1[];
  /** Null when the provider does not know the material. */
  materialProperties(name: string): MaterialPropertiesV1 | null;
}

/** True when the core satisfies every filter that is set. */
export function matchesFilters(core: CoreCandidateV1, filters: CoreSearchFilters): boolean {
  if (filters.minApCm4 !== undefined && core.apCm4 < filters.minApCm4) return false;
  if (filters.maxApCm4 !== undefined && core.apCm4 > filters.maxApCm4) return false;
  if (filters.geometry && core.geometry.toUpperCase() !== filters.geometry.toUpperCase()) return false;
  if (filters.manufacturer &&
      core.manufacturer.toUpperCase() !== filters.manufacturer.toUpperCase()) return false;
  if (filters.material && !matchesMaterial(core.material, filters.material)) return false;
  return true;
}

export function matchesMaterial(grade: string, filter: string): boolean {
  const family = MaterialFamilySchema.safeParse(filter.trim().toLowerCase());
  if (family.success) return classifyMaterialName(grade) === family.data;
  return grade.toUpperCase().includes(filter.trim().toUpperCase());
}

export function sortByAreaProduct(cores: readonly CoreCandidateV1[]): CoreCandidateV1[] {
  return [...cores].sort((a, b) => a.apCm4 - b.apCm4 || a.partNumber.localeCompare(b.partNumber));
}
