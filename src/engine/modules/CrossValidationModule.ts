/**
 * CrossValidationModule — audits a finished design against reference models.
 *
 * The pass reads the design and its requirements and never mutates either.
 * Each check either produces a ValidationCheckV1 or reports itself skipped
 * with a reason; skipped checks carry no weight.
 *
 * Checks and thresholds (pass / warning, % difference):
 *   primary_turns          Faraday's law                     5 / 15   high
 *   core_loss_W            datasheet anchors, f^1.46 B^2.75   10 / 30  by anchor distance
 *   flux_density_T         B vs Bsat: > 0.9 fail, > 0.8 warn           high
 *   temperature_rise_C     450 ψ^0.826                       10 / 25  medium
 *   efficiency_percent     target: < 0.95 × target fail, < target warn medium
 *   window_utilization_Ku  reference 0.4: > 0.6 fail, > 0.5 or < 0.2 warn  high
 *   core_loss_vs_provider  provider's Steinmetz fit          15 / 30  medium
 *
 * Overall: fail if any check fails, warning if more than half warn, else
 * pass; 'unknown' when nothing ran.  Confidence = Σ(score × weight) / Σweight
 * with score pass 1.0 / warning 0.7 / fail 0.3 and weight high 1.0 /
 * medium 0.7 / low 0.4.
 */

import { z } from 'zod';
import referenceTable from '../data/coreLossReference.json';
import type {
  CheckStatus,
  CrossValidationReportV1,
  SkippedCheckV1,
  ValidationCheckV1,
  ValidationConfidence,
  ValidationStatus,
} from '../../contracts/CrossValidationV1';
import type {
  InductorRequirementsV1,
  TransformerRequirementsV1,
} from '../../contracts/DesignRequirementsV1';
import type {
  InductorDesignResultV1,
  TransformerDesignResultV1,
} from '../../contracts/DesignResultV1';
import type { CoreCandidateProvider } from '../catalog/CoreCandidateProvider';
import { classifyMaterialName, type MaterialPropertiesV1 } from '../catalog/materials';
import { makeEngineEvent, silentLogger, type EngineLogger } from '../logging/engineLogger';
import { waveformCoefficient } from '../normalizer/Normalizer';

export type ValidationSubject =
  | { kind: 'transformer'; design: TransformerDesignResultV1; requirements: TransformerRequirementsV1 }
  | { kind: 'inductor'; design: InductorDesignResultV1; requirements: InductorRequirementsV1 };

export type CheckOutcome =
  | { available: true; check: ValidationCheckV1 }
  | { available: false; skipped: SkippedCheckV1 };

function available(check: ValidationCheckV1): CheckOutcome {
  return { available: true, check };
}

function unavailable(parameter: string, reason: string): CheckOutcome {
  return { available: false, skipped: { parameter, reason } };
}

export const STATUS_SCORE: Record<CheckStatus, number> = {
  pass: 1.0,
  warning: 0.7,
  fail: 0.3,
};

export const CONFIDENCE_WEIGHT: Record<ValidationConfidence, number> = {
  high: 1.0,
  medium: 0.7,
  low: 0.4,
};

export function statusFromDiff(diffPercent: number, passThreshold = 5, warnThreshold = 15): CheckStatus {
  if (diffPercent <= passThreshold) return 'pass';
  if (diffPercent <= warnThreshold) return 'warning';
  return 'fail';
}

function percentDiff(ours: number, reference: number): number {
  return (Math.abs(ours - reference) / reference) * 100;
}

// ── Reference core-loss anchors ───────────────────────────────────────────────

const AnchorSchema = z.object({
  frequencyKHz: z.number().positive(),
  fluxDensityMT: z.number().positive(),
  lossDensityMWcm3: z.number().positive(),
});

export type LossAnchor = z.infer<typeof AnchorSchema>;

const REFERENCE_ANCHORS: Readonly<Record<string, readonly LossAnchor[]>> = Object.freeze(
  z.record(z.array(AnchorSchema).min(1)).parse(referenceTable),
);

export const REFERENCE_FREQUENCY_EXPONENT = 1.46;
export const REFERENCE_FLUX_EXPONENT = 2.75;

/** Reference table key for a grade: exact, then by ferrite sub-family, then generic. */
export function referenceMaterialKey(material: string): string {
  const key = material.trim().toLowerCase();
  if (key in REFERENCE_ANCHORS) return key;
  if (key.startsWith('n')) return 'n87';
  if (key.startsWith('3c9')) return '3c94';
  if (key.startsWith('3c')) return '3c90';
  return 'ferrite';
}

export interface ReferenceLoss {
  lossDensityMWcm3: number;
  anchor: LossAnchor;
  /** Euclidean distance to the anchor in (ln f, ln B). */
  logDistance: number;
}

export function referenceLossDensity(material: string, frequencyKHz: number, fluxDensityMT: number): ReferenceLoss {
  const anchors = REFERENCE_ANCHORS[referenceMaterialKey(material)] ?? REFERENCE_ANCHORS.ferrite;
  const distance = (a: LossAnchor) =>
    Math.hypot(Math.log(frequencyKHz / a.frequencyKHz), Math.log(fluxDensityMT / a.fluxDensityMT));

  const anchor = anchors.reduce((best, a) => (distance(a) < distance(best) ? a : best));
  return {
    lossDensityMWcm3:
      anchor.lossDensityMWcm3 *
      (frequencyKHz / anchor.frequencyKHz) ** REFERENCE_FREQUENCY_EXPONENT *
      (fluxDensityMT / anchor.fluxDensityMT) ** REFERENCE_FLUX_EXPONENT,
    anchor,
    logDistance: distance(anchor),
  };
}

export function confidenceFromLogDistance(distance: number): ValidationConfidence {
  if (distance < 0.2) return 'high';
  if (distance < 0.5) return 'medium';
  return 'low';
}

// ── Checks ────────────────────────────────────────────────────────────────────

function acFluxDensityT(subject: ValidationSubject): number {
  return subject.kind === 'transformer' ? subject.design.sizing.bmaxT / 2 : subject.design.flux.bacT;
}

export function checkPrimaryTurns(subject: ValidationSubject): CheckOutcome {
  const parameter = 'primary_turns';
  if (subject.kind !== 'transformer') return unavailable(parameter, 'Faraday turns check applies to transformers only');

  const { design, requirements: req } = subject;
  const primary = design.winding.windings.find(w => w.name === 'primary');
  if (!primary) return unavailable(parameter, 'design has no primary winding');

  const kf = waveformCoefficient(req.waveform);
  const reference = req.primaryVoltageV / (kf * req.frequencyHz * design.sizing.bmaxT * design.core.aeCm2 * 1e-4);
  const diff = percentDiff(primary.turns, reference);
  return available({
    parameter,
    ourValue: primary.turns,
    referenceValue: reference,
    unit: 'turns',
    diffPercent: diff,
    status: statusFromDiff(diff),
    confidence: 'high',
    source: "Faraday's law",
    notes: `Kf=${kf} for ${req.waveform} waveform`,
  });
}

export function checkCoreLoss(subject: ValidationSubject): CheckOutcome {
  const parameter = 'core_loss_W';
  const { design } = subject;
  const family = classifyMaterialName(design.core.material);
  if (family !== null && family !== 'ferrite') {
    return unavailable(parameter, `no reference loss data for ${family} material ${design.core.material}`);
  }
  if (!(design.losses.coreLossW > 0)) return unavailable(parameter, 'design reports no core loss');

  const frequencyKHz = subject.requirements.frequencyHz / 1000;
  const fluxMT = acFluxDensityT(subject) * 1000;
  const ref = referenceLossDensity(design.core.material, frequencyKHz, fluxMT);
  const referenceW = (ref.lossDensityMWcm3 * design.core.veCm3) / 1000;
  const diff = percentDiff(design.losses.coreLossW, referenceW);

  return available({
    parameter,
    ourValue: design.losses.coreLossW,
    referenceValue: referenceW,
    unit: 'W',
    diffPercent: diff,
    status: statusFromDiff(diff, 10, 30),
    confidence: confidenceFromLogDistance(ref.logDistance),
    source: 'Datasheet reference anchors',
    notes:
      `${referenceMaterialKey(design.core.material)} anchor ` +
      `${ref.anchor.frequencyKHz} kHz / ${ref.anchor.fluxDensityMT} mT`,
  });
}

export function checkFluxDensity(subject: ValidationSubject): CheckOutcome {
  const parameter = 'flux_density_T';
  const bsat = subject.design.core.bsatT;
  const b = subject.kind === 'transformer' ? subject.design.sizing.bmaxT : subject.design.flux.bpeakT;
  if (!(b > 0) || !(bsat > 0)) return unavailable(parameter, 'flux density or Bsat not positive');

  const margin = ((bsat - b) / bsat) * 100;
  let status: CheckStatus = 'pass';
  if (b > bsat * 0.9) status = 'fail';
  else if (b > bsat * 0.8) status = 'warning';

  return available({
    parameter,
    ourValue: b,
    referenceValue: bsat * 0.7,
    unit: 'T',
    diffPercent: margin,
    status,
    confidence: 'high',
    source: 'Saturation limit',
    notes: `${margin.toFixed(1)}% margin to Bsat=${bsat}T`,
  });
}

export function checkTemperatureRise(subject: ValidationSubject): CheckOutcome {
  const parameter = 'temperature_rise_C';
  const { thermal, losses, core } = subject.design;
  if (!(thermal.temperatureRiseC > 0)) return unavailable(parameter, 'design reports no temperature rise');
  if (!(losses.totalLossW > 0) || !(core.atCm2 > 0)) return unavailable(parameter, 'no loss or surface area');

  const psi = losses.totalLossW / core.atCm2;
  const natural = 450 * psi ** 0.826;
  const reference = thermal.cooling === 'forced' ? natural / 2 : natural;
  const diff = percentDiff(thermal.temperatureRiseC, reference);

  return available({
    parameter,
    ourValue: thermal.temperatureRiseC,
    referenceValue: reference,
    unit: '°C',
    diffPercent: diff,
    status: statusFromDiff(diff, 10, 25),
    confidence: 'medium',
    source: 'McLyman empirical formula',
    notes: `Ψ = ${psi.toFixed(3)} W/cm²`,
  });
}

/** Typical efficiency for the power class. */
export function expectedEfficiencyPercent(outputPowerW: number): number {
  if (outputPowerW < 100) return 90;
  if (outputPowerW < 1000) return 95;
  if (outputPowerW < 10_000) return 97;
  return 98;
}

export function checkEfficiency(subject: ValidationSubject): CheckOutcome {
  const parameter = 'efficiency_percent';
  if (subject.kind !== 'transformer') return unavailable(parameter, 'efficiency is not defined for an inductor');

  const { design, requirements: req } = subject;
  const eta = design.losses.efficiencyPercent;
  if (eta === null || !(eta > 0)) return unavailable(parameter, 'design reports no efficiency');

  const expected = expectedEfficiencyPercent(req.outputPowerW);
  let status: CheckStatus = 'pass';
  if (eta < req.efficiencyPercent * 0.95) status = 'fail';
  else if (eta < req.efficiencyPercent) status = 'warning';

  return available({
    parameter,
    ourValue: eta,
    referenceValue: expected,
    unit: '%',
    diffPercent: percentDiff(eta, expected),
    status,
    confidence: 'medium',
    source: 'Expected for power level',
    notes: `Target: ${req.efficiencyPercent}%`,
  });
}

export const REFERENCE_KU = 0.4;

export function checkWindowUtilization(subject: ValidationSubject): CheckOutcome {
  const parameter = 'window_utilization_Ku';
  const ku = subject.design.winding.windowUtilization;
  if (!(ku > 0)) return unavailable(parameter, 'design reports no window utilization');

  let status: CheckStatus = 'pass';
  let notes = 'Good window utilization';
  if (ku > 0.6) {
    status = 'fail';
    notes = 'Window overfilled - reduce wire size or turns';
  } else if (ku > 0.5) {
    status = 'warning';
    notes = 'Window nearly full - tight fit';
  } else if (ku < 0.2) {
    status = 'warning';
    notes = 'Low utilization - core may be oversized';
  }

  return available({
    parameter,
    ourValue: ku,
    referenceValue: REFERENCE_KU,
    unit: 'ratio',
    diffPercent: percentDiff(ku, REFERENCE_KU),
    status,
    confidence: 'high',
    source: 'Typical practice',
    notes,
  });
}

export function checkMaterialAgainstProvider(
  subject: ValidationSubject,
  provider: CoreCandidateProvider,
): CheckOutcome {
  const parameter = 'core_loss_vs_provider';
  const { design } = subject;
  let props: MaterialPropertiesV1 | null;
  try {
    if (!provider.isAvailable()) return unavailable(parameter, `${provider.name} reported unavailable`);
    props = provider.materialProperties(design.core.material);
  } catch (err) {
    return unavailable(parameter, `${provider.name} lookup failed: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (props === null) return unavailable(parameter, `${provider.name} has no data for ${design.core.material}`);

  const fKHz = subject.requirements.frequencyHz / 1000;
  const bMT = acFluxDensityT(subject) * 1000;
  const referenceW = (props.k * fKHz ** props.alpha * bMT ** props.beta * design.core.veCm3) / 1000;
  if (!(referenceW > 0)) return unavailable(parameter, 'provider model gives no loss');

  const diff = percentDiff(design.losses.coreLossW, referenceW);
  return available({
    parameter,
    ourValue: design.losses.coreLossW,
    referenceValue: referenceW,
    unit: 'W',
    diffPercent: diff,
    status: statusFromDiff(diff, 15, 30),
    confidence: 'medium',
    source: `${provider.name} material data`,
    notes: `Material: ${props.name}, family: ${props.family}`,
  });
}

// ── Aggregation ───────────────────────────────────────────────────────────────

export function aggregateChecks(checks: readonly ValidationCheckV1[]): {
  overallStatus: ValidationStatus;
  overallConfidence: number;
  summary: string;
  recommendations: string[];
} {
  if (checks.length === 0) {
    return { overallStatus: 'unknown', overallConfidence: 0, summary: 'No validations performed', recommendations: [] };
  }

  const count = (s: CheckStatus) => checks.filter(c => c.status === s).length;
  const fails = count('fail');
  const warns = count('warning');
  const passes = count('pass');

  let overallStatus: ValidationStatus = 'pass';
  if (fails > 0) overallStatus = 'fail';
  else if (warns > checks.length / 2) overallStatus = 'warning';

  let weighted = 0;
  let totalWeight = 0;
  for (const c of checks) {
    const weight = CONFIDENCE_WEIGHT[c.confidence];
    weighted += STATUS_SCORE[c.status] * weight;
    totalWeight += weight;
  }
  const overallConfidence = weighted / totalWeight;

  const recommendations = checks.flatMap(c => {
    if (c.status === 'fail') return [`CRITICAL: ${c.parameter} differs by ${c.diffPercent.toFixed(1)}% from ${c.source}`];
    if (c.status === 'warning') return [`Review: ${c.parameter} - ${c.notes}`];
    return [];
  });

  return {
    overallStatus,
    overallConfidence,
    summary:
      `Validation: ${passes} pass, ${warns} warning, ${fails} fail ` +
      `(confidence: ${Math.round(overallConfidence * 100)}%)`,
    recommendations,
  };
}

export interface CrossValidationOptions {
  /**
   * External source of a second opinion on the core material. The bundled
   * catalog is where the design's own loss data comes from, so it is never
   * passed here.
   */
  provider?: CoreCandidateProvider;
  logger?: EngineLogger;
}

export function crossValidateDesign(
  subject: ValidationSubject,
  options: CrossValidationOptions = {},
): CrossValidationReportV1 {
  const logger = options.logger ?? silentLogger;
  const outcomes = [
    checkPrimaryTurns(subject),
    checkCoreLoss(subject),
    checkFluxDensity(subject),
    checkTemperatureRise(subject),
    checkEfficiency(subject),
    checkWindowUtilization(subject),
  ];
  if (options.provider) outcomes.push(checkMaterialAgainstProvider(subject, options.provider));

  const checks: ValidationCheckV1[] = [];
  const skipped: SkippedCheckV1[] = [];
  for (const outcome of outcomes) {
    if (outcome.available) {
      checks.push(outcome.check);
    } else {
      skipped.push(outcome.skipped);
      logger.debug(makeEngineEvent('validation', 'check_skipped', {
        parameter: outcome.skipped.parameter,
        reason: outcome.skipped.reason,
      }));
    }
  }

  return {
    designKind: subject.kind,
    designMethod: subject.design.sizing.method,
    checks,
    skipped,
    ...aggregateChecks(checks),
  };
}
