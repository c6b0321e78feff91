/**
 * InsulationModule — IEC 60664-1 barrier dimensions for a working voltage.
 *
 *   impulse    row = smallest mains level ≥ 0.9 × Vwork, column = overvoltage
 *              category; functional × 0.5, double/reinforced × 1.6
 *   clearance  smallest tabulated impulse ≥ the impulse above; × altitude
 *              factor 1 + 0.07 per km above 2000 m; × type factor
 *   creepage   smallest tabulated voltage ≥ Vwork (group II, PD2); × material
 *              group and pollution factors; × type factor
 *   solid      max(0.1, 0.4 mm/kV × impulse × type factor)
 *   AC test    2 × Vwork + 1000, × 1.5 for double/reinforced
 *
 * type factor is 2 for double and reinforced insulation, 1 otherwise.
 * Working voltages past the last table row take that row and say so in the
 * construction notes.
 */

import { z } from 'zod';
import iecTables from '../data/iec60664.json';
import type {
  InsulationRequirementsV1,
  InsulationResultV1,
  InsulationType,
  MaterialGroup,
  OvervoltageCategory,
  PollutionDegree,
} from '../../contracts/PulseTransformerV1';
import { requirePositive } from '../errors';

const TablesSchema = z.object({
  impulseWithstand: z
    .array(
      z.object({
        mainsVoltageV: z.number().positive(),
        impulseKV: z.object({ I: z.number(), II: z.number(), III: z.number(), IV: z.number() }),
      }),
    )
    .min(1),
  clearance: z.array(z.object({ impulseKV: z.number().positive(), clearanceMm: z.number().positive() })).min(1),
  creepage: z
    .array(z.object({ workingVoltageVrms: z.number().positive(), creepageMm: z.number().positive() }))
    .min(1),
});

const TABLES = Object.freeze(TablesSchema.parse(iecTables));

export const ALTITUDE_REFERENCE_M = 2000;
export const SOLID_MM_PER_KV = 0.4;
export const MIN_SOLID_INSULATION_MM = 0.1;

const IMPULSE_FACTOR: Record<InsulationType, number> = {
  functional: 0.5,
  basic: 1.0,
  supplementary: 1.0,
  double: 1.6,
  reinforced: 1.6,
};

const MATERIAL_GROUP_FACTOR: Record<MaterialGroup, number> = {
  I: 0.8,
  II: 1.0,
  IIIa: 1.25,
  IIIb: 1.6,
};

const POLLUTION_FACTOR: Record<PollutionDegree, number> = {
  1: 0.8,
  2: 1.0,
  3: 1.6,
};

export function isDoubleGrade(type: InsulationType): boolean {
  return type === 'double' || type === 'reinforced';
}

export function insulationTypeFactor(type: InsulationType): number {
  return isDoubleGrade(type) ? 2 : 1;
}

/** First row whose key is ≥ value; the last row when none is. */
function lookupAtLeast<T>(rows: readonly T[], key: (row: T) => number, value: number): { row: T; beyond: boolean } {
  const hit = rows.find(r => key(r) >= value);
  if (hit !== undefined) return { row: hit, beyond: false };
  const last = rows[rows.length - 1];
  return { row: last, beyond: true };
}

function impulseRow(workingVoltageVrms: number) {
  return lookupAtLeast(TABLES.impulseWithstand, r => r.mainsVoltageV, workingVoltageVrms * 0.9);
}

export function mainsVoltageLevel(workingVoltageVrms: number): number {
  return impulseRow(workingVoltageVrms).row.mainsVoltageV;
}

/** Rated impulse withstand (kV) before the insulation-type factor. */
export function ratedImpulseKV(workingVoltageVrms: number, category: OvervoltageCategory): number {
  return impulseRow(workingVoltageVrms).row.impulseKV[category];
}

export function clearanceForImpulse(impulseKV: number): number {
  return lookupAtLeast(TABLES.clearance, r => r.impulseKV, impulseKV).row.clearanceMm;
}

export function impulseBeyondClearanceTable(impulseKV: number): boolean {
  return lookupAtLeast(TABLES.clearance, r => r.impulseKV, impulseKV).beyond;
}

export function creepageForVoltage(workingVoltageVrms: number): number {
  return lookupAtLeast(TABLES.creepage, r => r.workingVoltageVrms, workingVoltageVrms).row.creepageMm;
}

export function altitudeFactor(altitudeM: number): number {
  if (altitudeM <= ALTITUDE_REFERENCE_M) return 1;
  return 1 + 0.07 * ((altitudeM - ALTITUDE_REFERENCE_M) / 1000);
}

function recommendedMaterials(type: InsulationType): string[] {
  if (type === 'functional' || type === 'basic') {
    return ['Polyimide (Kapton)', 'Polyester (Mylar)', 'Nomex'];
  }
  return ['Triple-insulated wire', 'Polyimide tape (3 layers)', 'Silicone-coated fiberglass'];
}

export function calculateInsulation(req: InsulationRequirementsV1): InsulationResultV1 {
  requirePositive({ workingVoltageVrms: req.workingVoltageVrms });
  const notes: string[] = [];
  const typeFactor = insulationTypeFactor(req.insulationType);

  const level = impulseRow(req.workingVoltageVrms);
  if (level.beyond) {
    notes.push(`Working voltage beyond the ${level.row.mainsVoltageV} V impulse table; its last row is used`);
  }
  const impulseKV = ratedImpulseKV(req.workingVoltageVrms, req.overvoltageCategory) *
    IMPULSE_FACTOR[req.insulationType];

  let clearanceMm = clearanceForImpulse(impulseKV);
  if (impulseBeyondClearanceTable(impulseKV)) {
    notes.push(`Impulse ${impulseKV.toFixed(1)} kV beyond the clearance table; its last row is used`);
  }
  const altitude = altitudeFactor(req.altitudeM);
  if (altitude > 1) {
    clearanceMm *= altitude;
    notes.push(`Altitude correction: ${altitude.toFixed(2)}x for ${req.altitudeM}m`);
  }
  clearanceMm *= typeFactor;

  let creepageMm = creepageForVoltage(req.workingVoltageVrms) *
    MATERIAL_GROUP_FACTOR[req.materialGroup] *
    POLLUTION_FACTOR[req.pollutionDegree];
  if (req.pollutionDegree === 3) notes.push('PD3: Consider conformal coating');
  creepageMm *= typeFactor;

  const solidInsulationMm = Math.max(MIN_SOLID_INSULATION_MM, impulseKV * SOLID_MM_PER_KV * typeFactor);
  const acWithstandVrms = (req.workingVoltageVrms * 2 + 1000) * (isDoubleGrade(req.insulationType) ? 1.5 : 1);

  if (req.insulationType === 'reinforced') {
    notes.push('Use triple-insulated wire OR 3 layers of insulation tape');
    notes.push('Each layer must meet basic insulation requirements');
  }
  notes.push(`Minimum creepage path: ${creepageMm.toFixed(2)}mm`);
  notes.push(`Minimum clearance: ${clearanceMm.toFixed(2)}mm`);

  return {
    clearanceMm,
    creepageMm,
    solidInsulationMm,
    impulseWithstandKV: impulseKV,
    acWithstandVrms,
    recommendedMaterials: recommendedMaterials(req.insulationType),
    constructionNotes: notes,
  };
}
