import { describe, it, expect } from 'vitest';
import {
  confidenceFor,
  inductorElectricalStatus,
  verifyInductorDesign,
  verifyTransformerDesign,
  windowStatusToDomain,
} from '../modules/VerificationModule';
import type {
  DomainStatus,
  FluxResultV1,
  LossBreakdownV1,
  ThermalResultV1,
  WindingPlanV1,
  WindowStatus,
} from '../../contracts/DesignResultV1';

function plan(windowStatus: WindowStatus, windowUtilization: number): WindingPlanV1 {
  return { windings: [], windowUtilization, windowStatus, skinDepthMm: 0.2, operatingTempC: 65 };
}

function thermal(status: DomainStatus, temperatureRiseC: number, recommendations: string[] = []): ThermalResultV1 {
  return {
    dissipationDensityWcm2: 0.01,
    temperatureRiseC,
    hotspotTempC: 40 + temperatureRiseC,
    marginToTargetC: 50 - temperatureRiseC,
    marginToMaterialC: 80 - temperatureRiseC,
    materialMaxTempC: 120,
    cooling: 'natural',
    status,
    coolingRecommendation: status === 'pass' ? 'adequate' : 'forced air recommended',
    recommendations,
  };
}

function losses(efficiencyPercent: number | null): LossBreakdownV1 {
  return {
    coreLossW: 0.1,
    coreLossDensityMWcm3: 20,
    copperLossW: [],
    totalCopperLossW: 0.2,
    totalLossW: 0.3,
    efficiencyPercent,
    coreToCopperRatio: 0.5,
    balance: 'optimal',
  };
}

function flux(saturationMarginPercent: number, bpeakT = 0.1): FluxResultV1 {
  return { bdcT: bpeakT * 0.9, bacT: bpeakT * 0.1, bpeakT, muEff: 60, saturationMarginPercent };
}

describe('VerificationModule', () => {
  it('maps window status onto the domain scale', () => {
    expect(windowStatusToDomain('ok')).toBe('pass');
    expect(windowStatusToDomain('warning')).toBe('warning');
    expect(windowStatusToDomain('error')).toBe('fail');
  });

  it('confidence: 0.9 clean, 0.7 with warnings, 0.3 not viable', () => {
    expect(confidenceFor(true, 0)).toBe(0.9);
    expect(confidenceFor(true, 2)).toBe(0.7);
    expect(confidenceFor(false, 0)).toBe(0.3);
  });

  // ── Transformer ───────────────────────────────────────────────────────────

  describe('verifyTransformerDesign', () => {
    const base = {
      winding: plan('ok', 0.3),
      losses: losses(99),
      thermal: thermal('pass', 11),
      targetEfficiencyPercent: 90,
      bmaxT: 0.1,
      bsatT: 0.38,
    };

    it('a clean design passes every domain', () => {
      const outcome = verifyTransformerDesign(base);
      expect(outcome.verification).toEqual({
        electrical: 'pass',
        mechanical: 'pass',
        thermal: 'pass',
        warnings: [],
        errors: [],
        recommendations: [],
      });
      expect(outcome.viable).toBe(true);
      expect(outcome.confidenceScore).toBe(0.9);
    });

    it('marginal window fill is a warning', () => {
      const outcome = verifyTransformerDesign({ ...base, winding: plan('warning', 0.549406) });
      expect(outcome.verification.warnings).toEqual(['Window fill marginal: Ku = 0.55']);
      expect(outcome.verification.mechanical).toBe('warning');
      expect(outcome.confidenceScore).toBe(0.7);
    });

    it('overfill and thermal failure are errors', () => {
      const outcome = verifyTransformerDesign({
        ...base,
        winding: plan('error', 0.65),
        thermal: thermal('fail', 55.094, ['Increase core size to reduce losses']),
      });
      expect(outcome.verification.errors).toEqual([
        'Window overfill: Ku = 0.65 > 0.6',
        'Thermal limit exceeded: Tr = 55.1°C',
      ]);
      expect(outcome.verification.recommendations).toEqual(['Increase core size to reduce losses']);
      expect(outcome.viable).toBe(false);
      expect(outcome.confidenceScore).toBe(0.3);
    });

    it('low efficiency marks electrical as warning; Bmax near Bsat warns', () => {
      const outcome = verifyTransformerDesign({
        ...base,
        losses: losses(90.98),
        targetEfficiencyPercent: 95,
        bmaxT: 0.35,
        thermal: thermal('warning', 44.1),
        extraWarnings: ['Estimated regulation 9.6% exceeds target 5%'],
      });
      expect(outcome.verification.electrical).toBe('warning');
      expect(outcome.verification.warnings).toEqual([
        'Thermal margin low: 5.9°C',
        'Efficiency 91.0% below target 95%',
        'Low saturation margin: 7.9% below Bsat',
        'Estimated regulation 9.6% exceeds target 5%',
      ]);
    });

    it('Bmax within 15% of Bsat alone marks electrical as warning', () => {
      const outcome = verifyTransformerDesign({ ...base, bmaxT: 0.35 });
      expect(outcome.verification.electrical).toBe('warning');
      expect(outcome.verification.warnings).toEqual(['Low saturation margin: 7.9% below Bsat']);
      expect(outcome.viable).toBe(true);
      expect(outcome.confidenceScore).toBe(0.7);
    });

    it('a 15% margin or more leaves electrical at pass', () => {
      const outcome = verifyTransformerDesign({ ...base, bmaxT: 0.32 });
      expect(outcome.verification.electrical).toBe('pass');
      expect(outcome.verification.warnings).toEqual([]);
    });
  });

  // ── Inductor ──────────────────────────────────────────────────────────────

  describe('verifyInductorDesign', () => {
    const base = {
      winding: plan('ok', 0.40885),
      thermal: thermal('pass', 7.857),
      bsatT: 0.38,
      inductanceTolerancePercent: 0,
    };

    it('electrical status bands on saturation margin', () => {
      expect(inductorElectricalStatus(10)).toBe('pass');
      expect(inductorElectricalStatus(9.99)).toBe('warning');
      expect(inductorElectricalStatus(0)).toBe('warning');
      expect(inductorElectricalStatus(-0.01)).toBe('fail');
    });

    it('a well-margined inductor is clean', () => {
      const outcome = verifyInductorDesign({ ...base, flux: flux(78.5177) });
      expect(outcome.verification.warnings).toEqual([]);
      expect(outcome.verification.electrical).toBe('pass');
      expect(outcome.confidenceScore).toBe(0.9);
    });

    it('thin margin warns', () => {
      const outcome = verifyInductorDesign({ ...base, flux: flux(2.818) });
      expect(outcome.verification.warnings).toEqual(['Low saturation margin: 2.8%']);
      expect(outcome.verification.electrical).toBe('warning');
      expect(outcome.viable).toBe(true);
    });

    it('saturation is an error', () => {
      const outcome = verifyInductorDesign({ ...base, bsatT: 0.4, flux: flux(-5, 0.42) });
      expect(outcome.verification.errors).toEqual(['Core saturates: Bpeak = 0.420 T > Bsat = 0.400 T']);
      expect(outcome.verification.electrical).toBe('fail');
      expect(outcome.viable).toBe(false);
    });

    it('inductance deviation beyond 10% warns', () => {
      const outcome = verifyInductorDesign({ ...base, flux: flux(50), inductanceTolerancePercent: 12.34 });
      expect(outcome.verification.warnings).toEqual(['Inductance deviation: 12.3% from target']);
    });
  });
});
