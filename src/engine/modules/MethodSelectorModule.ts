/**
 * MethodSelectorModule — picks the sizing method for a transformer.
 *
 * Rule (applied only when the request says 'auto'):
 *   f > 1 kHz          → area_product   (Kg→Ap conversion is unreliable above line frequency)
 *   regulation < 3 %   → core_geometry
 *   otherwise          → area_product
 *
 * An explicit method in the request bypasses the rule.
 */

import type { DesignMethod, DesignMethodRequest } from '../../contracts/DesignRequirementsV1';
import { HIGH_FREQUENCY_THRESHOLD_HZ } from '../config/designDefaults';

/** Regulation target (%) below which the core-geometry method is preferred. */
export const KG_REGULATION_THRESHOLD_PCT = 3;

export const METHOD_LABELS: Record<DesignMethod, string> = {
  area_product: 'Area Product (Ap)',
  core_geometry: 'Core Geometry (Kg, regulation)',
  loss_optimized: 'Core Geometry Kgfe (loss optimized)',
};

export function selectDesignMethod(
  frequencyHz: number,
  regulationPercent: number,
  requested: DesignMethodRequest = 'auto',
): DesignMethod {
  if (requested !== 'auto') return requested;
  if (frequencyHz > HIGH_FREQUENCY_THRESHOLD_HZ) return 'area_product';
  if (regulationPercent < KG_REGULATION_THRESHOLD_PCT) return 'core_geometry';
  return 'area_product';
}
