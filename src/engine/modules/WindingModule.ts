/**
 * WindingModule — turns, resistance, window fill and layer layout.
 *
 *   N     = ⌈V × 10⁴ / (Kf × B × f × Ae)⌉                  (Faraday)
 *   Rdc   = ρ20 (1 + 0.00393 (T − 20)) × N × MLT / A
 *   Fr    = Dowell-style skin × layer terms in d/δ, ≥ 1
 *   Ku    = 1.3 × Σ(Nᵢ Aᵢ) / Wa      ok < 0.45 ≤ warning < 0.6 ≤ error
 */

import type {
  InductorRequirementsV1,
  TransformerRequirementsV1,
} from '../../contracts/DesignRequirementsV1';
import type {
  CoreCandidateV1,
  WindingPlanV1,
  WindingV1,
  WindowStatus,
  WireSpecV1,
} from '../../contracts/DesignResultV1';
import {
  COPPER_RESISTIVITY_20C,
  COPPER_TEMP_COEFFICIENT,
  WINDOW_INSULATION_FACTOR,
} from '../config/designDefaults';
import { InvalidInputError, requirePositive } from '../errors';
import {
  calculateWireArea,
  selectWireForFrequency,
  skinDepthMm,
  type WireSelectionOptions,
} from './WireSelectionModule';

export const KU_WARNING_THRESHOLD = 0.45;
export const KU_ERROR_THRESHOLD = 0.6;

// ── Turns ─────────────────────────────────────────────────────────────────────

export function calculateTurns(
  voltageV: number,
  frequencyHz: number,
  bmaxT: number,
  aeCm2: number,
  kf = 4.44,
): number {
  requirePositive({ voltageV, frequencyHz, bmaxT, aeCm2 });
  return Math.ceil((voltageV * 1e4) / (kf * bmaxT * frequencyHz * aeCm2));
}

// ── Resistance ────────────────────────────────────────────────────────────────

export function copperResistivity(temperatureC: number): number {
  return COPPER_RESISTIVITY_20C * (1 + COPPER_TEMP_COEFFICIENT * (temperatureC - 20));
}

export function calculateDcResistance(
  turns: number,
  mltCm: number,
  wireAreaCm2: number,
  temperatureC = 20,
): number {
  if (!(wireAreaCm2 > 0)) throw new InvalidInputError(`wire area must be > 0 (got ${wireAreaCm2})`);
  return (copperResistivity(temperatureC) * turns * mltCm) / wireAreaCm2;
}

export function calculateAcResistanceFactor(
  wireDiameterMm: number,
  frequencyHz: number,
  layers = 1,
  temperatureC = 100,
): number {
  if (frequencyHz <= 0) return 1.0;
  const dd = wireDiameterMm / skinDepthMm(frequencyHz, temperatureC);
  if (dd < 0.5) return 1.0;

  const skin = dd <= 2 ? 1 + dd ** 4 / 48 : dd / 2;
  const proximity = layers <= 1 ? 1.0 : 1 + ((layers ** 2 - 1) / 3) * (dd ** 4 / 48);
  return Math.max(1.0, skin * proximity);
}

// ── Window ────────────────────────────────────────────────────────────────────

export function classifyWindowUtilization(ku: number): WindowStatus {
  if (ku < KU_WARNING_THRESHOLD) return 'ok';
  if (ku < KU_ERROR_THRESHOLD) return 'warning';
  return 'error';
}

export function calculateWindowUtilization(
  windings: readonly { turns: number; wire: Pick<WireSpecV1, 'areaCm2'> }[],
  waCm2: number,
  insulationFactor = WINDOW_INSULATION_FACTOR,
): { ku: number; status: WindowStatus } {
  requirePositive({ waCm2 });
  const copper = windings.reduce((sum, w) => sum + w.turns * w.wire.areaCm2, 0);
  const ku = (copper * insulationFactor) / waCm2;
  return { ku, status: classifyWindowUtilization(ku) };
}

// ── Layers ────────────────────────────────────────────────────────────────────

const ASPECT_GROUPS: readonly { shapes: readonly string[]; aspect: number }[] = [
  { shapes: ['E', 'EE', 'EI', 'ETD', 'ER', 'EQ', 'EFD', 'EP'], aspect: 1.5 },
  { shapes: ['PQ', 'PM', 'P', 'POT'], aspect: 1.2 },
  { shapes: ['RM'], aspect: 0.8 },
  { shapes: ['T', 'TC', 'TOROID'], aspect: 1.0 },
  { shapes: ['U', 'UI', 'UU'], aspect: 1.3 },
];

export const DEFAULT_WINDOW_ASPECT = 1.2;

/** Window height : width by core shape. */
export function windowAspectRatio(geometry: string): number {
  const upper = geometry.toUpperCase();
  return ASPECT_GROUPS.find(g => g.shapes.includes(upper))?.aspect ?? DEFAULT_WINDOW_ASPECT;
}

export interface LayerLayout {
  layers: number;
  turnsPerLayer: number;
  windowWidthCm: number;
  windowHeightCm: number;
  layerThicknessCm: number;
  stackHeightCm: number;
}

const BOBBIN_MARGIN = 0.85;
const WIRE_INSULATION_BUILD = 1.1;
const INTERLAYER_INSULATION_CM = 0.01;
const MAX_STACK_FRACTION = 0.9;

export function calculateLayers(
  turns: number,
  wireDiameterMm: number,
  waCm2: number,
  geometry = 'E',
  fillFactor = 0.75,
): LayerLayout {
  if (turns <= 0 || wireDiameterMm <= 0 || waCm2 <= 0) {
    return {
      layers: 1,
      turnsPerLayer: Math.max(0, turns),
      windowWidthCm: 1,
      windowHeightCm: 1,
      layerThicknessCm: 0.1,
      stackHeightCm: 0.1,
    };
  }

  const aspect = windowAspectRatio(geometry);
  const windowWidthCm = Math.sqrt(waCm2 / aspect);
  const windowHeightCm = waCm2 / windowWidthCm;
  const wireCm = (wireDiameterMm / 10) * WIRE_INSULATION_BUILD;

  let turnsPerLayer = Math.max(1, Math.floor(((windowWidthCm * BOBBIN_MARGIN) / wireCm) * fillFactor));
  let layers = Math.ceil(turns / turnsPerLayer);
  const layerThicknessCm = wireCm + INTERLAYER_INSULATION_CM;

  // Stack taller than the window: spread turns over the layers that fit.
  if (layers * layerThicknessCm > windowHeightCm * MAX_STACK_FRACTION) {
    const maxLayers = Math.floor((windowHeightCm * MAX_STACK_FRACTION) / layerThicknessCm);
    if (maxLayers > 0) {
      layers = maxLayers;
      turnsPerLayer = Math.ceil(turns / layers);
    }
  }

  return {
    layers,
    turnsPerLayer,
    windowWidthCm,
    windowHeightCm,
    layerThicknessCm,
    stackHeightCm: layers * layerThicknessCm,
  };
}

// ── Synthesis ─────────────────────────────────────────────────────────────────

interface WindingSpec {
  name: WindingV1['name'];
  turns: number;
  currentRmsA: number;
}

function buildWinding(
  spec: WindingSpec,
  core: CoreCandidateV1,
  frequencyHz: number,
  currentDensityAcm2: number,
  operatingTempC: number,
  wireOptions: WireSelectionOptions,
): WindingV1 {
  const wire = selectWireForFrequency(
    calculateWireArea(spec.currentRmsA, currentDensityAcm2),
    frequencyHz,
    wireOptions,
  );
  const layout = calculateLayers(spec.turns, wire.outerDiameterMm, core.waCm2, core.geometry);
  const acDcRatio =
    wire.type === 'litz' && wire.acFactor !== null
      ? wire.acFactor
      : calculateAcResistanceFactor(wire.diameterMm, frequencyHz, layout.layers, operatingTempC);

  return {
    name: spec.name,
    turns: spec.turns,
    currentRmsA: spec.currentRmsA,
    wire,
    rdcOhm: calculateDcResistance(spec.turns, core.mltCm, wire.areaCm2, operatingTempC),
    acDcRatio,
    layers: layout.layers,
    turnsPerLayer: layout.turnsPerLayer,
  };
}

function buildPlan(
  windings: WindingV1[],
  core: CoreCandidateV1,
  frequencyHz: number,
  operatingTempC: number,
): WindingPlanV1 {
  const window = calculateWindowUtilization(windings, core.waCm2);
  return {
    windings,
    windowUtilization: window.ku,
    windowStatus: window.status,
    skinDepthMm: skinDepthMm(frequencyHz, operatingTempC),
    operatingTempC,
  };
}

export interface TransformerWindingInput {
  core: CoreCandidateV1;
  req: TransformerRequirementsV1;
  apparentPowerVA: number;
  bmaxT: number;
  kf: number;
  operatingTempC: number;
  litzThresholdHz?: number;
}

/**
 * Primary turns from Faraday at the design Bmax; secondary by voltage ratio.
 * Primary current is taken as Pt / (2 Vp), secondary as Pout / Vs.
 */
export function synthesizeTransformerWinding(input: TransformerWindingInput): WindingPlanV1 {
  const { core, req, operatingTempC } = input;
  const primaryTurns = calculateTurns(req.primaryVoltageV, req.frequencyHz, input.bmaxT, core.aeCm2, input.kf);
  const secondaryTurns = Math.max(1, Math.round(primaryTurns * (req.secondaryVoltageV / req.primaryVoltageV)));
  const wireOptions = { litzThresholdHz: input.litzThresholdHz, forceLitz: req.forceLitz };

  const windings = [
    { name: 'primary' as const, turns: primaryTurns, currentRmsA: input.apparentPowerVA / (2 * req.primaryVoltageV) },
    { name: 'secondary' as const, turns: secondaryTurns, currentRmsA: req.outputPowerW / req.secondaryVoltageV },
  ].map(spec =>
    buildWinding(spec, core, req.frequencyHz, req.maxCurrentDensityAcm2, operatingTempC, wireOptions),
  );

  return buildPlan(windings, core, req.frequencyHz, operatingTempC);
}

export interface InductorWindingInput {
  core: CoreCandidateV1;
  req: InductorRequirementsV1;
  turns: number;
  rmsCurrentA: number;
  operatingTempC: number;
  litzThresholdHz?: number;
}

export function synthesizeInductorWinding(input: InductorWindingInput): WindingPlanV1 {
  const { core, req, operatingTempC } = input;
  const winding = buildWinding(
    { name: 'main', turns: input.turns, currentRmsA: input.rmsCurrentA },
    core,
    req.frequencyHz,
    req.maxCurrentDensityAcm2,
    operatingTempC,
    { litzThresholdHz: input.litzThresholdHz, forceLitz: req.forceLitz },
  );
  return buildPlan([winding], core, req.frequencyHz, operatingTempC);
}
