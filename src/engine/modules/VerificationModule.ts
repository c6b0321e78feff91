/**
 * VerificationModule — folds the per-domain results into a verdict.
 *
 * viable      ⇔ no errors
 * confidence  0.9 viable without warnings · 0.7 viable with warnings · 0.3 not viable
 */

import type {
  DomainStatus,
  FluxResultV1,
  LossBreakdownV1,
  ThermalResultV1,
  VerificationStatusV1,
  WindingPlanV1,
  WindowStatus,
} from '../../contracts/DesignResultV1';

export const SATURATION_WARNING_MARGIN_PCT = 15;
export const INDUCTOR_ELECTRICAL_PASS_MARGIN_PCT = 10;
export const INDUCTANCE_TOLERANCE_WARNING_PCT = 10;

export function windowStatusToDomain(status: WindowStatus): DomainStatus {
  switch (status) {
    case 'ok':
      return 'pass';
    case 'warning':
      return 'warning';
    case 'error':
      return 'fail';
  }
}

export function confidenceFor(viable: boolean, warningCount: number): number {
  if (!viable) return 0.3;
  return warningCount === 0 ? 0.9 : 0.7;
}

export interface VerificationOutcome {
  verification: VerificationStatusV1;
  viable: boolean;
  confidenceScore: number;
}

function conclude(
  electrical: DomainStatus,
  winding: WindingPlanV1,
  thermal: ThermalResultV1,
  warnings: string[],
  errors: string[],
  recommendations: string[],
): VerificationOutcome {
  const viable = errors.length === 0;
  return {
    verification: {
      electrical,
      mechanical: windowStatusToDomain(winding.windowStatus),
      thermal: thermal.status,
      warnings,
      errors,
      recommendations,
    },
    viable,
    confidenceScore: confidenceFor(viable, warnings.length),
  };
}

function windowMessages(winding: WindingPlanV1, warnings: string[], errors: string[]): void {
  const ku = winding.windowUtilization.toFixed(2);
  if (winding.windowStatus === 'error') errors.push(`Window overfill: Ku = ${ku} > 0.6`);
  else if (winding.windowStatus === 'warning') warnings.push(`Window fill marginal: Ku = ${ku}`);
}

function thermalMessages(thermal: ThermalResultV1, warnings: string[], errors: string[]): void {
  if (thermal.status === 'fail') {
    errors.push(`Thermal limit exceeded: Tr = ${thermal.temperatureRiseC.toFixed(1)}°C`);
  } else if (thermal.status === 'warning') {
    warnings.push(`Thermal margin low: ${thermal.marginToTargetC.toFixed(1)}°C`);
  }
}

export function verifyTransformerDesign(params: {
  winding: WindingPlanV1;
  losses: LossBreakdownV1;
  thermal: ThermalResultV1;
  targetEfficiencyPercent: number;
  bmaxT: number;
  bsatT: number;
  extraWarnings?: string[];
}): VerificationOutcome {
  const warnings: string[] = [];
  const errors: string[] = [];

  windowMessages(params.winding, warnings, errors);
  thermalMessages(params.thermal, warnings, errors);

  let electrical: DomainStatus = 'pass';
  const efficiency = params.losses.efficiencyPercent;
  if (efficiency !== null && efficiency < params.targetEfficiencyPercent) {
    warnings.push(`Efficiency ${efficiency.toFixed(1)}% below target ${params.targetEfficiencyPercent}%`);
    electrical = 'warning';
  }

  const saturationMargin = ((params.bsatT - params.bmaxT) / params.bsatT) * 100;
  if (saturationMargin < SATURATION_WARNING_MARGIN_PCT) {
    warnings.push(`Low saturation margin: ${saturationMargin.toFixed(1)}% below Bsat`);
    electrical = 'warning';
  }
  warnings.push(...(params.extraWarnings ?? []));

  return conclude(electrical, params.winding, params.thermal, warnings, errors, [...params.thermal.recommendations]);
}

export function inductorElectricalStatus(saturationMarginPercent: number): DomainStatus {
  if (saturationMarginPercent >= INDUCTOR_ELECTRICAL_PASS_MARGIN_PCT) return 'pass';
  if (saturationMarginPercent >= 0) return 'warning';
  return 'fail';
}

export function verifyInductorDesign(params: {
  winding: WindingPlanV1;
  thermal: ThermalResultV1;
  flux: FluxResultV1;
  bsatT: number;
  inductanceTolerancePercent: number;
  extraWarnings?: string[];
}): VerificationOutcome {
  const warnings: string[] = [];
  const errors: string[] = [];
  const margin = params.flux.saturationMarginPercent;

  if (margin < SATURATION_WARNING_MARGIN_PCT) warnings.push(`Low saturation margin: ${margin.toFixed(1)}%`);
  if (margin < 0) {
    errors.push(
      `Core saturates: Bpeak = ${params.flux.bpeakT.toFixed(3)} T > Bsat = ${params.bsatT.toFixed(3)} T`,
    );
  }
  windowMessages(params.winding, warnings, errors);
  thermalMessages(params.thermal, warnings, errors);
  if (params.inductanceTolerancePercent > INDUCTANCE_TOLERANCE_WARNING_PCT) {
    warnings.push(`Inductance deviation: ${params.inductanceTolerancePercent.toFixed(1)}% from target`);
  }
  warnings.push(...(params.extraWarnings ?? []));

  return conclude(
    inductorElectricalStatus(margin),
    params.winding,
    params.thermal,
    warnings,
    errors,
    [...params.thermal.recommendations],
  );
}
