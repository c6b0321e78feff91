import type { CrossValidationReportV1 } from '../contracts/CrossValidationV1';
import type {
  InductorRequirementsV1,
  TransformerRequirementsV1,
} from '../contracts/DesignRequirementsV1';
import type {
  CoreCandidateV1,
  DesignMetaV1,
  InductorDesignResultV1,
  NoMatchResultV1,
  TransformerDesignResultV1,
} from '../contracts/DesignResultV1';
import type {
  InsulationResultV1,
  PulseTransformerDesignResultV1,
  PulseTransformerRequirementsV1,
} from '../contracts/PulseTransformerV1';
import { CONTRACT_VERSION, ENGINE_VERSION } from '../contracts/versions';
import { matchesFilters, type CoreCandidateProvider } from './catalog/CoreCandidateProvider';
import { getBundledCatalog } from './catalog/LocalCoreCatalog';
import { lookupMaterial, type MaterialFamily } from './catalog/materials';
import { LITZ_THRESHOLD_HZ } from './config/designDefaults';
import { makeEngineEvent, silentLogger, type EngineLogger } from './logging/engineLogger';
import {
  estimateRegulation,
  sizeTransformer,
} from './modules/AreaProductModule';
import {
  buildInductorNoMatch,
  buildTransformerNoMatch,
  findCandidatesHybrid,
  findOversizedCores,
  listAvailableCores,
} from './modules/CoreCandidateModule';
import { crossValidateDesign } from './modules/CrossValidationModule';
import {
  SATURATION_RETRY_MARGIN_PCT,
  sizeInductor,
  solveGappedInductor,
} from './modules/InductorSizingModule';
import { calculateInsulation } from './modules/InsulationModule';
import { calculateTotalLosses, estimateMagnetizingInductance } from './modules/LossModule';
import {
  buildPulseNoMatch,
  designForVoltSecond,
  designPulseTransformer,
  estimatePulseAreaProduct,
  pulseBmax,
  pulseSearchFamily,
  resolvePulseMaterial,
  selectPulseCore,
} from './modules/PulseTransformerModule';
import { runThermalAnalysis } from './modules/ThermalModule';
import { verifyInductorDesign, verifyTransformerDesign } from './modules/VerificationModule';
import { synthesizeInductorWinding, synthesizeTransformerWinding } from './modules/WindingModule';
import {
  normalizeInductorRequirements,
  normalizeTransformerRequirements,
} from './normalizer/Normalizer';
import {
  parseInductorRequirements,
  parseInsulationRequirements,
  parsePulseTransformerRequirements,
  parseTransformerRequirements,
} from './schema/DesignRequirementsSchema';

export interface EngineOptions {
  /** Defaults to the bundled catalog. */
  provider?: CoreCandidateProvider;
  /** Optional second source; failures degrade to the primary provider alone. */
  externalProvider?: CoreCandidateProvider;
  logger?: EngineLogger;
  litzThresholdHz?: number;
}

interface EngineContext {
  provider: CoreCandidateProvider;
  externalProvider: CoreCandidateProvider | undefined;
  logger: EngineLogger;
  litzThresholdHz: number;
}

function resolveContext(options: EngineOptions): EngineContext {
  return {
    provider: options.provider ?? getBundledCatalog(),
    externalProvider: options.externalProvider,
    logger: options.logger ?? silentLogger,
    litzThresholdHz: options.litzThresholdHz ?? LITZ_THRESHOLD_HZ,
  };
}

const META: DesignMetaV1 = { engineVersion: ENGINE_VERSION, contractVersion: CONTRACT_VERSION };

interface CandidateSelection {
  candidates: CoreCandidateV1[];
  /**
   * Cores the sources hold for the frequency that also meet the preferences;
   * only filled when the band is empty.
   */
  available: CoreCandidateV1[];
}

function selectCandidates(
  ctx: EngineContext,
  requiredApCm4: number,
  frequencyHz: number,
  family: MaterialFamily,
  preferences: { preferredGeometry?: string; preferredMaterial?: string },
): CandidateSelection {
  const filters = { geometry: preferences.preferredGeometry, material: preferences.preferredMaterial };
  const candidates = findCandidatesHybrid(
    ctx.provider,
    ctx.externalProvider,
    { requiredApCm4, frequencyHz, family, ...filters },
    ctx.logger,
  );
  if (candidates.length > 0) return { candidates, available: [] };

  const available = listAvailableCores(ctx.provider, ctx.externalProvider, frequencyHz, family, ctx.logger)
    .filter(c => matchesFilters(c, filters));
  return { candidates: findOversizedCores(available, requiredApCm4), available };
}

function logNoMatch(ctx: EngineContext, result: NoMatchResultV1): void {
  ctx.logger.info(makeEngineEvent('candidates', 'no_match', {
    designKind: result.designKind,
    requiredApCm4: result.requiredApCm4,
    availableMaxApCm4: result.availableMaxApCm4,
    suggestions: result.suggestions.length,
  }));
}

// ── Transformer ───────────────────────────────────────────────────────────────

function designTransformer(
  req: TransformerRequirementsV1,
  ctx: EngineContext,
): TransformerDesignResultV1 | NoMatchResultV1 {
  const normalized = normalizeTransformerRequirements(req);
  const sizing = sizeTransformer(req, normalized);

  const { candidates, available } = selectCandidates(
    ctx,
    sizing.requiredApCm4,
    req.frequencyHz,
    normalized.family,
    req,
  );
  if (candidates.length === 0) {
    const noMatch = buildTransformerNoMatch(req, sizing, normalized.kf, available);
    logNoMatch(ctx, noMatch);
    return noMatch;
  }
  const [core, ...others] = candidates;

  const winding = synthesizeTransformerWinding({
    core,
    req,
    apparentPowerVA: normalized.apparentPowerVA,
    bmaxT: sizing.bmaxT,
    kf: normalized.kf,
    operatingTempC: normalized.operatingTempC,
    litzThresholdHz: ctx.litzThresholdHz,
  });
  const [primary, secondary] = winding.windings;

  const losses = calculateTotalLosses({
    core,
    winding,
    frequencyHz: req.frequencyHz,
    bacT: sizing.bmaxT / 2,
    material: core.material,
    outputPowerW: req.outputPowerW,
  });
  const thermal = runThermalAnalysis({
    totalLossW: losses.totalLossW,
    surfaceAreaCm2: core.atCm2,
    ambientTempC: req.ambientTempC,
    maxTempRiseC: req.maxTempRiseC,
    cooling: req.cooling,
    materialMaxTempC: lookupMaterial(core.material).maxTempC,
  });

  const estimatedRegulationPercent = estimateRegulation({
    primaryRdcOhm: primary.rdcOhm,
    secondaryRdcOhm: secondary.rdcOhm,
    primaryCurrentA: primary.currentRmsA,
    secondaryCurrentA: secondary.currentRmsA,
    primaryVoltageV: req.primaryVoltageV,
    secondaryVoltageV: req.secondaryVoltageV,
  });
  const regulationWarnings =
    estimatedRegulationPercent > req.regulationPercent
      ? [`Estimated regulation ${estimatedRegulationPercent.toFixed(1)}% exceeds target ${req.regulationPercent}%`]
      : [];

  const outcome = verifyTransformerDesign({
    winding,
    losses,
    thermal,
    targetEfficiencyPercent: req.efficiencyPercent,
    bmaxT: sizing.bmaxT,
    bsatT: core.bsatT,
    extraWarnings: regulationWarnings,
  });

  return {
    kind: 'transformer',
    meta: META,
    sizing,
    materialGrade: normalized.materialGrade,
    core,
    alternatives: others.slice(0, 3),
    winding,
    losses,
    thermal,
    ...outcome,
    turnsRatio: secondary.turns / primary.turns,
    magnetizingInductanceUH: estimateMagnetizingInductance(primary.turns, core),
    estimatedRegulationPercent,
  };
}

// ── Inductor ──────────────────────────────────────────────────────────────────

function designInductor(
  req: InductorRequirementsV1,
  ctx: EngineContext,
): InductorDesignResultV1 | NoMatchResultV1 {
  const normalized = normalizeInductorRequirements(req);
  const sizing = sizeInductor(req, normalized);

  const { candidates, available } = selectCandidates(
    ctx,
    sizing.requiredApCm4,
    req.frequencyHz,
    normalized.family,
    req,
  );
  if (candidates.length === 0) {
    const noMatch = buildInductorNoMatch(req, sizing, available);
    logNoMatch(ctx, noMatch);
    return noMatch;
  }
  const [core, ...others] = candidates;

  const solution = solveGappedInductor(core, req, normalized);
  const retryWarnings: string[] = [];
  if (solution.retried) {
    ctx.logger.info(makeEngineEvent('sizing', 'saturation_retry', {
      core: core.partNumber,
      initialTurns: solution.initialTurns,
      turns: solution.turns,
      saturationMarginPercent: solution.flux.saturationMarginPercent,
    }));
    if (solution.flux.saturationMarginPercent < SATURATION_RETRY_MARGIN_PCT) {
      retryWarnings.push(
        `Saturation margin ${solution.flux.saturationMarginPercent.toFixed(1)}% still below ` +
          `${SATURATION_RETRY_MARGIN_PCT}% after raising turns to ${solution.turns}`,
      );
    }
  }

  const winding = synthesizeInductorWinding({
    core,
    req,
    turns: solution.turns,
    rmsCurrentA: normalized.rmsCurrentA,
    operatingTempC: normalized.operatingTempC,
    litzThresholdHz: ctx.litzThresholdHz,
  });
  const losses = calculateTotalLosses({
    core,
    winding,
    frequencyHz: req.frequencyHz,
    bacT: solution.flux.bacT,
    material: core.material,
    outputPowerW: null,
  });
  const thermal = runThermalAnalysis({
    totalLossW: losses.totalLossW,
    surfaceAreaCm2: core.atCm2,
    ambientTempC: req.ambientTempC,
    maxTempRiseC: req.maxTempRiseC,
    cooling: req.cooling,
    materialMaxTempC: lookupMaterial(core.material).maxTempC,
  });

  const outcome = verifyInductorDesign({
    winding,
    thermal,
    flux: solution.flux,
    bsatT: core.bsatT,
    inductanceTolerancePercent: solution.inductanceTolerancePercent,
    extraWarnings: retryWarnings,
  });

  return {
    kind: 'inductor',
    meta: META,
    sizing,
    materialGrade: normalized.materialGrade,
    core,
    alternatives: others.slice(0, 3),
    winding,
    losses,
    thermal,
    ...outcome,
    peakCurrentA: normalized.peakCurrentA,
    rmsCurrentA: normalized.rmsCurrentA,
    gap: solution.gap,
    flux: solution.flux,
    initialTurns: solution.initialTurns,
    saturationRetried: solution.retried,
    calculatedInductanceUH: solution.calculatedInductanceUH,
    inductanceTolerancePercent: solution.inductanceTolerancePercent,
  };
}

// ── Pulse transformer ─────────────────────────────────────────────────────────

function designPulse(
  req: PulseTransformerRequirementsV1,
  ctx: EngineContext,
): PulseTransformerDesignResultV1 | NoMatchResultV1 {
  const material = resolvePulseMaterial(req);
  const voltSecond = designForVoltSecond({
    voltageV: req.primaryVoltageV,
    pulseWidthUs: req.pulseWidthUs,
    dutyCyclePercent: req.dutyCyclePercent,
    bmaxT: pulseBmax(material),
    initialTurns: req.primaryTurns,
  });
  ctx.logger.debug(makeEngineEvent('sizing', 'volt_second_sized', {
    material,
    voltSecondUVs: voltSecond.voltSecondUVs,
    requiredAeCm2: voltSecond.requiredAeCm2,
  }));

  const insulation = calculateInsulation({
    workingVoltageVrms: req.isolationVoltageVrms,
    insulationType: req.insulationType,
    overvoltageCategory: req.overvoltageCategory,
    pollutionDegree: req.pollutionDegree,
    altitudeM: req.altitudeM,
    materialGroup: req.materialGroup,
  });

  const preferredGeometry =
    req.preferredGeometry ?? (req.application === 'hv_power_pulse' ? 'EI' : undefined);
  const { candidates, available } = selectCandidates(
    ctx,
    estimatePulseAreaProduct(voltSecond.requiredAeCm2),
    req.frequencyHz,
    pulseSearchFamily(material),
    { preferredGeometry, preferredMaterial: req.preferredMaterial },
  );
  const core = selectPulseCore(candidates, voltSecond.requiredAeCm2);
  if (!core) {
    const noMatch = buildPulseNoMatch(voltSecond, available);
    logNoMatch(ctx, noMatch);
    return noMatch;
  }

  const result = designPulseTransformer({ req, voltSecond, core, insulation });
  if (!result.meetsSpecifications) {
    ctx.logger.info(makeEngineEvent('validation', 'pulse_specs_missed', { warnings: result.warnings }));
  }
  return result;
}

// ── Public entry points ───────────────────────────────────────────────────────

/** Throws InvalidInputError for malformed requirements; every other outcome is returned. */
export function runTransformerDesign(
  rawRequirements: unknown,
  options: EngineOptions = {},
): TransformerDesignResultV1 | NoMatchResultV1 {
  return designTransformer(parseTransformerRequirements(rawRequirements), resolveContext(options));
}

export function runInductorDesign(
  rawRequirements: unknown,
  options: EngineOptions = {},
): InductorDesignResultV1 | NoMatchResultV1 {
  return designInductor(parseInductorRequirements(rawRequirements), resolveContext(options));
}

export function runPulseTransformerDesign(
  rawRequirements: unknown,
  options: EngineOptions = {},
): PulseTransformerDesignResultV1 | NoMatchResultV1 {
  return designPulse(parsePulseTransformerRequirements(rawRequirements), resolveContext(options));
}

/** IEC 60664-1 clearance, creepage and solid insulation on their own. */
export function runInsulationDesign(rawRequirements: unknown): InsulationResultV1 {
  return calculateInsulation(parseInsulationRequirements(rawRequirements));
}

export type DesignRequest =
  | { kind: 'transformer'; requirements: unknown }
  | { kind: 'inductor'; requirements: unknown };

export type ValidatedDesign =
  | { result: TransformerDesignResultV1 | InductorDesignResultV1; validation: CrossValidationReportV1 }
  | { result: NoMatchResultV1; validation: null };

/**
 * Design, then audit the result.  The audit never changes the design; a
 * NoMatch result has nothing to audit.
 */
export function runDesignWithValidation(request: DesignRequest, options: EngineOptions = {}): ValidatedDesign {
  const ctx = resolveContext(options);
  const validationOptions = { provider: ctx.externalProvider, logger: ctx.logger };

  if (request.kind === 'transformer') {
    const requirements = parseTransformerRequirements(request.requirements);
    const result = designTransformer(requirements, ctx);
    if (result.kind === 'no_match') return { result, validation: null };
    return {
      result,
      validation: crossValidateDesign({ kind: 'transformer', design: result, requirements }, validationOptions),
    };
  }

  const requirements = parseInductorRequirements(request.requirements);
  const result = designInductor(requirements, ctx);
  if (result.kind === 'no_match') return { result, validation: null };
  return {
    result,
    validation: crossValidateDesign({ kind: 'inductor', design: result, requirements }, validationOptions),
  };
}
