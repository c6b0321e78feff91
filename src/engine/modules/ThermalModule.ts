/**
 * ThermalModule — surface dissipation model.
 *
 *   ψ  = Ptotal / At                    [W/cm²]
 *   ΔT = 450 × ψ^0.826                  natural convection
 *        × 0.5                          forced air
 *
 * Status:
 *   fail     ΔT > target rise, or hotspot > material limit
 *   warning  either margin < 10 °C
 *   pass     otherwise
 */

import type { CoolingMode } from '../../contracts/DesignRequirementsV1';
import type { DomainStatus, ThermalResultV1 } from '../../contracts/DesignResultV1';
import { InvalidInputError } from '../errors';

export const THERMAL_COEFFICIENT = 450;
export const THERMAL_EXPONENT = 0.826;
export const FORCED_AIR_FACTOR = 0.5;
export const THERMAL_WARNING_MARGIN_C = 10;

/** Surface-area constant Ks for At = Ks × √Ap (keys upper-case). */
export const KS_BY_GEOMETRY: Record<string, number> = {
  EE: 39,
  ETD: 41,
  PQ: 35,
  RM: 33,
  POT: 32,
  TOROID: 48,
  EI: 42,
  UI: 45,
};

export const DEFAULT_KS = 39;

/** At estimate for cores whose record carries no surface area. */
export function estimateSurfaceArea(apCm4: number, geometry = 'EE'): number {
  const ks = KS_BY_GEOMETRY[geometry.toUpperCase()] ?? DEFAULT_KS;
  return ks * Math.sqrt(apCm4);
}

export function calculateDissipationDensity(totalLossW: number, surfaceAreaCm2: number): number {
  if (!(surfaceAreaCm2 > 0)) {
    throw new InvalidInputError(`surface area must be > 0 (got ${surfaceAreaCm2})`);
  }
  return totalLossW / surfaceAreaCm2;
}

export function calculateTemperatureRise(psiWcm2: number, cooling: CoolingMode = 'natural'): number {
  if (psiWcm2 < 0) throw new InvalidInputError(`dissipation density cannot be negative (got ${psiWcm2})`);
  if (psiWcm2 === 0) return 0;
  const rise = THERMAL_COEFFICIENT * psiWcm2 ** THERMAL_EXPONENT;
  return cooling === 'forced' ? rise * FORCED_AIR_FACTOR : rise;
}

/** Largest loss (W) the surface can shed within the target rise. */
export function maxDissipationForTempRise(
  surfaceAreaCm2: number,
  targetRiseC: number,
  cooling: CoolingMode = 'natural',
): number {
  const naturalRise = cooling === 'forced' ? targetRiseC / FORCED_AIR_FACTOR : targetRiseC;
  const psi = (naturalRise / THERMAL_COEFFICIENT) ** (1 / THERMAL_EXPONENT);
  return psi * surfaceAreaCm2;
}

export function classifyThermal(marginToTargetC: number, marginToMaterialC: number): DomainStatus {
  if (marginToTargetC < 0 || marginToMaterialC < 0) return 'fail';
  if (marginToTargetC < THERMAL_WARNING_MARGIN_C || marginToMaterialC < THERMAL_WARNING_MARGIN_C) {
    return 'warning';
  }
  return 'pass';
}

function coolingRecommendation(status: DomainStatus, cooling: CoolingMode): string {
  if (status === 'pass') return 'adequate';
  return cooling === 'natural' ? 'forced air recommended' : 'heatsink or liquid cooling required';
}

function thermalRecommendations(status: DomainStatus, cooling: CoolingMode): string[] {
  switch (status) {
    case 'fail':
      return [
        ...(cooling === 'natural' ? ['Consider forced air cooling'] : []),
        'Increase core size to reduce losses',
        'Reduce current density to lower copper loss',
        'Reduce Bmax to lower core loss',
      ];
    case 'warning':
      return ['Design is marginal - consider adding thermal margin'];
    case 'pass':
      return [];
  }
}

export interface ThermalInput {
  totalLossW: number;
  surfaceAreaCm2: number;
  ambientTempC: number;
  maxTempRiseC: number;
  cooling: CoolingMode;
  materialMaxTempC: number;
}

export function runThermalAnalysis(input: ThermalInput): ThermalResultV1 {
  const psi = calculateDissipationDensity(input.totalLossW, input.surfaceAreaCm2);
  const rise = calculateTemperatureRise(psi, input.cooling);
  const hotspot = input.ambientTempC + rise;
  const marginToTargetC = input.maxTempRiseC - rise;
  const marginToMaterialC = input.materialMaxTempC - hotspot;
  const status = classifyThermal(marginToTargetC, marginToMaterialC);

  return {
    dissipationDensityWcm2: psi,
    temperatureRiseC: rise,
    hotspotTempC: hotspot,
    marginToTargetC,
    marginToMaterialC,
    materialMaxTempC: input.materialMaxTempC,
    cooling: input.cooling,
    status,
    coolingRecommendation: coolingRecommendation(status, input.cooling),
    recommendations: thermalRecommendations(status, input.cooling),
  };
}
