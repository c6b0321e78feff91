/**
 * Boundary validation for design requests.
 *
 * Raw requests are parsed once here; everything downstream consumes the
 * frozen, fully-defaulted contract types.  Any schema issue is reported as an
 * InvalidInputError listing every offending field.
 */

import { z } from 'zod';
import type {
  InductorRequirementsV1,
  TransformerRequirementsV1,
} from '../../contracts/DesignRequirementsV1';
import type {
  InsulationRequirementsV1,
  PulseTransformerRequirementsV1,
} from '../../contracts/PulseTransformerV1';
import { DESIGN_DEFAULTS, PULSE_DEFAULTS } from '../config/designDefaults';
import { InvalidInputError } from '../errors';

// ─── Shared fields ────────────────────────────────────────────────────────────

export const WaveformSchema = z.enum(['sinusoidal', 'square', 'triangular']);
export const CoolingSchema = z.enum(['natural', 'forced']);
export const DesignMethodSchema = z.enum(['auto', 'area_product', 'core_geometry', 'loss_optimized']);

const positive = (label: string) =>
  z.number({ invalid_type_error: `${label} must be a number` }).finite().positive(`${label} must be > 0`);

const KuSchema = z
  .number()
  .min(0.1, 'windowUtilizationKu must be within [0.1, 0.8]')
  .max(0.8, 'windowUtilizationKu must be within [0.1, 0.8]');

const thermalFields = {
  ambientTempC: z.number().min(-55).max(125).default(DESIGN_DEFAULTS.ambientTempC),
  maxTempRiseC: positive('maxTempRiseC').max(150).default(DESIGN_DEFAULTS.maxTempRiseC),
  cooling: CoolingSchema.default('natural'),
};

const preferenceFields = {
  preferredGeometry: z.string().trim().min(1).optional(),
  preferredMaterial: z.string().trim().min(1).optional(),
  maxCurrentDensityAcm2: positive('maxCurrentDensityAcm2').default(DESIGN_DEFAULTS.maxCurrentDensityAcm2),
  forceLitz: z.boolean().default(false),
};

// ─── Transformer ──────────────────────────────────────────────────────────────

export const TransformerRequirementsSchema = z.object({
  outputPowerW: positive('outputPowerW'),
  efficiencyPercent: z
    .number()
    .gt(0, 'efficiencyPercent must be within (0, 100]')
    .max(100, 'efficiencyPercent must be within (0, 100]')
    .default(DESIGN_DEFAULTS.efficiencyPercent),
  regulationPercent: positive('regulationPercent').default(DESIGN_DEFAULTS.regulationPercent),
  primaryVoltageV: positive('primaryVoltageV'),
  secondaryVoltageV: positive('secondaryVoltageV'),
  frequencyHz: positive('frequencyHz'),
  waveform: WaveformSchema.default('sinusoidal'),
  designMethod: DesignMethodSchema.default('auto'),
  windowUtilizationKu: KuSchema.default(DESIGN_DEFAULTS.transformerKu),
  ...thermalFields,
  ...preferenceFields,
});

// ─── Inductor ─────────────────────────────────────────────────────────────────

export const InductorRequirementsSchema = z.object({
  inductanceUH: positive('inductanceUH'),
  dcCurrentA: z.number().min(0, 'dcCurrentA must be ≥ 0'),
  rippleCurrentA: positive('rippleCurrentA'),
  peakCurrentA: positive('peakCurrentA').optional(),
  frequencyHz: positive('frequencyHz'),
  allowPowderCores: z.boolean().default(true),
  bmaxMarginPercent: z.number().min(0).lt(100).default(DESIGN_DEFAULTS.bmaxMarginPercent),
  windowUtilizationKu: KuSchema.default(DESIGN_DEFAULTS.inductorKu),
  ...thermalFields,
  ...preferenceFields,
});

// ─── Pulse transformer ────────────────────────────────────────────────────────

export const PulseApplicationSchema = z.enum([
  'gate_drive',
  'signal_isolation',
  'trigger',
  'hv_pulse',
  'hv_power_pulse',
  'ethernet',
  'telecom',
  'custom',
]);
export const InsulationTypeSchema = z.enum(['functional', 'basic', 'supplementary', 'double', 'reinforced']);
export const OvervoltageCategorySchema = z.enum(['I', 'II', 'III', 'IV']);
export const PollutionDegreeSchema = z.union([z.literal(1), z.literal(2), z.literal(3)]);
export const MaterialGroupSchema = z.enum(['I', 'II', 'IIIa', 'IIIb']);
export const PulseCoreMaterialSchema = z.enum(['ferrite', 'silicon_steel', 'amorphous', 'nanocrystalline']);

const turnsCount = (label: string) => z.number().int(`${label} must be a whole number`).min(1).max(10_000);

export const InsulationRequirementsSchema = z.object({
  workingVoltageVrms: positive('workingVoltageVrms'),
  insulationType: InsulationTypeSchema.default('basic'),
  overvoltageCategory: OvervoltageCategorySchema.default('II'),
  pollutionDegree: PollutionDegreeSchema.default(2),
  altitudeM: z.number().min(0).max(10_000).default(PULSE_DEFAULTS.altitudeM),
  materialGroup: MaterialGroupSchema.default('II'),
});

export const PulseTransformerRequirementsSchema = z.object({
  application: PulseApplicationSchema.default('gate_drive'),
  primaryVoltageV: positive('primaryVoltageV'),
  secondaryVoltageV: positive('secondaryVoltageV'),
  pulseWidthUs: positive('pulseWidthUs'),
  riseTimeNs: positive('riseTimeNs').optional(),
  dutyCyclePercent: z
    .number()
    .min(0.1, 'dutyCyclePercent must be within [0.1, 99]')
    .max(99, 'dutyCyclePercent must be within [0.1, 99]')
    .default(PULSE_DEFAULTS.dutyCyclePercent),
  frequencyHz: positive('frequencyHz'),
  loadResistanceOhm: positive('loadResistanceOhm').optional(),
  peakCurrentA: positive('peakCurrentA').optional(),
  maxDroopPercent: positive('maxDroopPercent').max(50).default(PULSE_DEFAULTS.maxDroopPercent),
  maxBackswingPercent: positive('maxBackswingPercent').max(100).default(PULSE_DEFAULTS.maxBackswingPercent),
  isolationVoltageVrms: positive('isolationVoltageVrms').default(PULSE_DEFAULTS.isolationVoltageVrms),
  insulationType: InsulationTypeSchema.default('basic'),
  overvoltageCategory: OvervoltageCategorySchema.default('II'),
  pollutionDegree: PollutionDegreeSchema.default(2),
  altitudeM: z.number().min(0).max(10_000).default(PULSE_DEFAULTS.altitudeM),
  materialGroup: MaterialGroupSchema.default('II'),
  ambientTempC: z.number().min(-55).max(125).default(PULSE_DEFAULTS.ambientTempC),
  coreMaterialType: PulseCoreMaterialSchema.optional(),
  preferredGeometry: z.string().trim().min(1).optional(),
  preferredMaterial: z.string().trim().min(1).optional(),
  primaryTurns: turnsCount('primaryTurns').optional(),
  secondaryTurns: turnsCount('secondaryTurns').optional(),
});

// ─── Parsing ──────────────────────────────────────────────────────────────────

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

export function parseTransformerRequirements(raw: unknown): TransformerRequirementsV1 {
  const parsed = TransformerRequirementsSchema.safeParse(raw);
  if (!parsed.success) throw new InvalidInputError(formatIssues(parsed.error));
  return Object.freeze(parsed.data);
}

export function parseInductorRequirements(raw: unknown): InductorRequirementsV1 {
  const parsed = InductorRequirementsSchema.safeParse(raw);
  if (!parsed.success) throw new InvalidInputError(formatIssues(parsed.error));
  return Object.freeze(parsed.data);
}

export function parsePulseTransformerRequirements(raw: unknown): PulseTransformerRequirementsV1 {
  const parsed = PulseTransformerRequirementsSchema.safeParse(raw);
  if (!parsed.success) throw new InvalidInputError(formatIssues(parsed.error));
  return Object.freeze(parsed.data);
}

export function parseInsulationRequirements(raw: unknown): InsulationRequirementsV1 {
  const parsed = InsulationRequirementsSchema.safeParse(raw);
  if (!parsed.success) throw new InvalidInputError(formatIssues(parsed.error));
  return Object.freeze(parsed.data);
}
