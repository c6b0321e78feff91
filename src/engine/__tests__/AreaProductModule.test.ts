import { describe, it, expect } from 'vitest';
import {
  calculateAreaProduct,
  calculateCoreGeometry,
  calculateElectricalCoefficient,
  calculateLossOptimizedSizing,
  estimateOptimalFluxSwing,
  estimateRegulation,
  kgToAp,
  sizeTransformer,
} from '../modules/AreaProductModule';
import { normalizeTransformerRequirements } from '../normalizer/Normalizer';
import { parseTransformerRequirements } from '../schema/DesignRequirementsSchema';
import { InvalidInputError } from '../errors';

const transformer = (overrides: Record<string, unknown> = {}) =>
  parseTransformerRequirements({
    outputPowerW: 100,
    primaryVoltageV: 48,
    secondaryVoltageV: 12,
    frequencyHz: 100_000,
    waveform: 'square',
    ...overrides,
  });

describe('AreaProductModule', () => {
  // ── Area Product ──────────────────────────────────────────────────────────

  describe('calculateAreaProduct', () => {
    it('100 W / 90 % / 100 kHz square wave needs ≈ 0.377 cm⁴', () => {
      expect(calculateAreaProduct(100 * (1 + 100 / 90), 100_000, 0.1, 400, 0.35, 4.0)).toBeCloseTo(0.37698, 5);
    });

    it('is monotonic: up with Pt, down with f, B, J and Ku', () => {
      const base = calculateAreaProduct(200, 50_000, 0.1, 400, 0.35);
      expect(calculateAreaProduct(400, 50_000, 0.1, 400, 0.35)).toBeGreaterThan(base);
      expect(calculateAreaProduct(200, 100_000, 0.1, 400, 0.35)).toBeLessThan(base);
      expect(calculateAreaProduct(200, 50_000, 0.2, 400, 0.35)).toBeLessThan(base);
      expect(calculateAreaProduct(200, 50_000, 0.1, 500, 0.35)).toBeLessThan(base);
      expect(calculateAreaProduct(200, 50_000, 0.1, 400, 0.45)).toBeLessThan(base);
    });

    it('rejects Ku outside [0.1, 0.8] and non-positive inputs', () => {
      expect(() => calculateAreaProduct(200, 50_000, 0.1, 400, 0.05)).toThrow(InvalidInputError);
      expect(() => calculateAreaProduct(200, 50_000, 0.1, 400, 0.81)).toThrow(InvalidInputError);
      expect(() => calculateAreaProduct(200, 50_000, 0, 400, 0.35)).toThrow('bmaxT must be > 0 (got 0)');
    });
  });

  // ── Core Geometry ─────────────────────────────────────────────────────────

  describe('core geometry', () => {
    it('Ke = 0.145 Kf² f² B² 10⁻⁴', () => {
      expect(calculateElectricalCoefficient(50, 1.5, 4.44)).toBeCloseTo(1.6078905, 6);
    });

    it('Kg = Pt × 10⁴ / (2 Ke α)', () => {
      expect(calculateCoreGeometry(100, 5, 2)).toBe(50_000);
      expect(() => calculateCoreGeometry(100, 0, 2)).toThrow(InvalidInputError);
    });

    it('kgToAp uses the family Kp, 48 when unknown', () => {
      expect(kgToAp(1, 'toroid')).toBe(30);
      expect(kgToAp(1, 'ee')).toBe(48);
      expect(kgToAp(1, 'XYZ')).toBe(48);
      expect(kgToAp(32, 'PQ')).toBeCloseTo(720, 6);
    });
  });

  // ── Loss-optimized ────────────────────────────────────────────────────────

  describe('loss-optimized sizing', () => {
    it('optimal swing is 0.3/√(f_kHz/10), clamped to [0.05, 0.2]', () => {
      expect(estimateOptimalFluxSwing(100_000)).toBeCloseTo(0.0948683, 6);
      expect(estimateOptimalFluxSwing(20_000)).toBe(0.2);
      expect(estimateOptimalFluxSwing(1_000_000)).toBe(0.05);
    });

    it('splits the loss budget β : 2 between core and copper', () => {
      const sizing = calculateLossOptimizedSizing({
        apparentPowerVA: 100 * (1 + 100 / 90),
        outputPowerW: 100,
        efficiencyPercent: 90,
        frequencyHz: 100_000,
        currentDensityAcm2: 400,
        ku: 0.35,
        kf: 4.44,
        steinmetzBeta: 2.5,
        bmaxCeilingT: 0.1,
      });
      expect(sizing.bacT).toBeCloseTo(0.0948683, 6);
      expect(sizing.requiredApCm4).toBeCloseTo(0.357997, 5);
      expect(sizing.optimalLossRatio).toBe(1.25);
      expect(sizing.maxLossW).toBeCloseTo(11.1111, 4);
      expect(sizing.coreLossBudgetW).toBeCloseTo(6.17284, 4);
      expect(sizing.copperLossBudgetW).toBeCloseTo(4.93827, 4);
    });

    it('the table ceiling caps the swing', () => {
      const sizing = calculateLossOptimizedSizing({
        apparentPowerVA: 200,
        outputPowerW: 100,
        efficiencyPercent: 100,
        frequencyHz: 20_000,
        currentDensityAcm2: 400,
        ku: 0.35,
        kf: 4.44,
        steinmetzBeta: 2.5,
        bmaxCeilingT: 0.1,
      });
      expect(sizing.bacT).toBe(0.1);
      expect(sizing.maxLossW).toBe(0);
    });
  });

  // ── Regulation ────────────────────────────────────────────────────────────

  describe('estimateRegulation', () => {
    it('refers the primary drop to the secondary by the voltage ratio', () => {
      const reg = estimateRegulation({
        primaryRdcOhm: 1,
        secondaryRdcOhm: 0.1,
        primaryCurrentA: 1,
        secondaryCurrentA: 4,
        primaryVoltageV: 100,
        secondaryVoltageV: 10,
      });
      expect(reg).toBeCloseTo(5, 10);
    });
  });

  // ── sizeTransformer ───────────────────────────────────────────────────────

  describe('sizeTransformer', () => {
    it('area product path', () => {
      const req = transformer();
      const sizing = sizeTransformer(req, normalizeTransformerRequirements(req));
      expect(sizing.method).toBe('area_product');
      expect(sizing.requiredApCm4).toBeCloseTo(0.37698, 5);
      expect(sizing.requiredKgCm5).toBeNull();
      expect(sizing.energyUJ).toBeNull();
      expect(sizing.bmaxT).toBe(0.1);
      expect(sizing.bmaxLimitation).toBe('loss_limited');
      expect(sizing.apparentPowerVA).toBeCloseTo(211.111, 3);
    });

    it('core geometry path records Kg and converts with the preferred geometry', () => {
      const req = transformer({ frequencyHz: 50, waveform: 'sinusoidal', regulationPercent: 2, preferredGeometry: 'EI' });
      const sizing = sizeTransformer(req, normalizeTransformerRequirements(req));
      expect(sizing.method).toBe('core_geometry');
      expect(sizing.requiredKgCm5).not.toBeNull();
      expect(sizing.requiredApCm4).toBeCloseTo(kgToAp(sizing.requiredKgCm5 ?? 0, 'EI'), 6);
      expect(sizing.notes.some(n => n.startsWith('Kg = '))).toBe(true);
    });

    it('loss-optimized path sizes at the optimal swing', () => {
      const req = transformer({ waveform: 'sinusoidal', designMethod: 'loss_optimized' });
      const sizing = sizeTransformer(req, normalizeTransformerRequirements(req));
      expect(sizing.method).toBe('loss_optimized');
      expect(sizing.bmaxT).toBeCloseTo(0.0948683, 6);
      expect(sizing.requiredApCm4).toBeCloseTo(0.357997, 5);
      expect(sizing.optimalLossRatio).toBe(1.25);
      expect(sizing.notes).toContain('Minimum total loss at Pfe/Pcu = 1.25');
    });
  });
});
