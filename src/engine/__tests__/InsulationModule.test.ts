import { describe, it, expect } from 'vitest';
import {
  altitudeFactor,
  calculateInsulation,
  creepageForVoltage,
  mainsVoltageLevel,
  ratedImpulseKV,
} from '../modules/InsulationModule';
import { runInsulationDesign } from '../Engine';
import { parseInsulationRequirements } from '../schema/DesignRequirementsSchema';
import { InvalidInputError } from '../errors';
import type { InsulationRequirementsV1 } from '../../contracts/PulseTransformerV1';

const MAINS_230V: InsulationRequirementsV1 = {
  workingVoltageVrms: 230,
  insulationType: 'basic',
  overvoltageCategory: 'II',
  pollutionDegree: 2,
  altitudeM: 2000,
  materialGroup: 'II',
};

describe('InsulationModule', () => {
  // ── Table lookups ─────────────────────────────────────────────────────────

  describe('table lookups', () => {
    it('takes the mains row at or above 0.9 × the working voltage', () => {
      expect(mainsVoltageLevel(230)).toBe(300);
      expect(mainsVoltageLevel(110)).toBe(100);
      expect(mainsVoltageLevel(5000)).toBe(1000);
    });

    it('reads the impulse column for the overvoltage category', () => {
      expect(ratedImpulseKV(120, 'III')).toBe(2.5);
      expect(ratedImpulseKV(230, 'IV')).toBe(6.0);
    });

    it('creepage takes the next tabulated voltage up, and the last row past the table', () => {
      expect(creepageForVoltage(230)).toBe(1.0);
      expect(creepageForVoltage(250)).toBe(1.0);
      expect(creepageForVoltage(3000)).toBe(10.0);
    });

    it('altitude adds 7% per km above 2000 m', () => {
      expect(altitudeFactor(0)).toBe(1);
      expect(altitudeFactor(2000)).toBe(1);
      expect(altitudeFactor(5000)).toBeCloseTo(1.21, 10);
    });
  });

  // ── Barrier dimensions ────────────────────────────────────────────────────

  describe('calculateInsulation', () => {
    it('230 V basic insulation', () => {
      const result = calculateInsulation(MAINS_230V);
      expect(result.impulseWithstandKV).toBe(2.5);
      expect(result.clearanceMm).toBe(1.5);
      expect(result.creepageMm).toBe(1.0);
      expect(result.solidInsulationMm).toBeCloseTo(1.0, 10);
      expect(result.acWithstandVrms).toBe(1460);
      expect(result.recommendedMaterials).toEqual(['Polyimide (Kapton)', 'Polyester (Mylar)', 'Nomex']);
      expect(result.constructionNotes).toEqual(['Minimum creepage path: 1.00mm', 'Minimum clearance: 1.50mm']);
    });

    it('reinforced insulation doubles the distances and raises the test voltage', () => {
      const result = calculateInsulation({ ...MAINS_230V, insulationType: 'reinforced', overvoltageCategory: 'III' });
      expect(result.impulseWithstandKV).toBeCloseTo(6.4, 10);
      expect(result.clearanceMm).toBe(16);
      expect(result.creepageMm).toBe(2);
      expect(result.solidInsulationMm).toBeCloseTo(5.12, 10);
      expect(result.acWithstandVrms).toBe(2190);
      expect(result.recommendedMaterials).toEqual([
        'Triple-insulated wire',
        'Polyimide tape (3 layers)',
        'Silicone-coated fiberglass',
      ]);
      expect(result.constructionNotes).toEqual([
        'Use triple-insulated wire OR 3 layers of insulation tape',
        'Each layer must meet basic insulation requirements',
        'Minimum creepage path: 2.00mm',
        'Minimum clearance: 16.00mm',
      ]);
    });

    it('functional insulation halves the impulse', () => {
      const result = calculateInsulation({ ...MAINS_230V, insulationType: 'functional' });
      expect(result.impulseWithstandKV).toBe(1.25);
      expect(result.clearanceMm).toBe(0.5);
      expect(result.solidInsulationMm).toBeCloseTo(0.5, 10);
    });

    it('pollution degree 3 and a low-CTI material lengthen the creepage', () => {
      const result = calculateInsulation({ ...MAINS_230V, pollutionDegree: 3, materialGroup: 'IIIb' });
      expect(result.creepageMm).toBeCloseTo(2.56, 10);
      expect(result.constructionNotes).toEqual([
        'PD3: Consider conformal coating',
        'Minimum creepage path: 2.56mm',
        'Minimum clearance: 1.50mm',
      ]);
    });

    it('a clean environment and a high-CTI material shorten the creepage', () => {
      const result = calculateInsulation({ ...MAINS_230V, pollutionDegree: 1, materialGroup: 'I' });
      expect(result.creepageMm).toBeCloseTo(0.64, 10);
    });

    it('clearance grows with altitude above 2000 m', () => {
      const result = calculateInsulation({ ...MAINS_230V, altitudeM: 4000 });
      expect(result.clearanceMm).toBeCloseTo(1.71, 10);
      expect(result.constructionNotes).toEqual([
        'Altitude correction: 1.14x for 4000m',
        'Minimum creepage path: 1.00mm',
        'Minimum clearance: 1.71mm',
      ]);
    });

    it('working voltages past the impulse table use its last row and say so', () => {
      const result = calculateInsulation({ ...MAINS_230V, workingVoltageVrms: 1500 });
      expect(result.impulseWithstandKV).toBe(6.0);
      expect(result.clearanceMm).toBe(5.5);
      expect(result.creepageMm).toBe(6.3);
      expect(result.solidInsulationMm).toBeCloseTo(2.4, 10);
      expect(result.acWithstandVrms).toBe(4000);
      expect(result.constructionNotes[0]).toBe('Working voltage beyond the 1000 V impulse table; its last row is used');
    });

    it('an impulse past the clearance table uses its last row and says so', () => {
      const result = calculateInsulation({
        ...MAINS_230V,
        workingVoltageVrms: 1000,
        overvoltageCategory: 'IV',
        insulationType: 'reinforced',
      });
      expect(result.impulseWithstandKV).toBeCloseTo(19.2, 10);
      expect(result.clearanceMm).toBe(28);
      expect(result.creepageMm).toBe(8);
      expect(result.constructionNotes).toEqual([
        'Impulse 19.2 kV beyond the clearance table; its last row is used',
        'Use triple-insulated wire OR 3 layers of insulation tape',
        'Each layer must meet basic insulation requirements',
        'Minimum creepage path: 8.00mm',
        'Minimum clearance: 28.00mm',
      ]);
    });

    it('a non-positive working voltage throws', () => {
      expect(() => calculateInsulation({ ...MAINS_230V, workingVoltageVrms: 0 })).toThrow(InvalidInputError);
    });
  });

  // ── Entry point ───────────────────────────────────────────────────────────

  describe('runInsulationDesign', () => {
    it('fills the defaults from the working voltage alone', () => {
      expect(parseInsulationRequirements({ workingVoltageVrms: 230 })).toEqual(MAINS_230V);
      expect(runInsulationDesign({ workingVoltageVrms: 230 })).toEqual(calculateInsulation(MAINS_230V));
    });

    it('rejects an unknown pollution degree', () => {
      expect(() => runInsulationDesign({ workingVoltageVrms: 230, pollutionDegree: 4 })).toThrow(InvalidInputError);
    });
  });
});
