import { describe, it, expect } from 'vitest';
import { KG_REGULATION_THRESHOLD_PCT, METHOD_LABELS, selectDesignMethod } from '../modules/MethodSelectorModule';

describe('MethodSelectorModule', () => {
  it('above 1 kHz always uses the area product, whatever the regulation', () => {
    expect(selectDesignMethod(1001, 1)).toBe('area_product');
    expect(selectDesignMethod(100_000, 0.5)).toBe('area_product');
  });

  it('at line frequency, regulation below 3% selects core geometry', () => {
    expect(selectDesignMethod(50, 2.9)).toBe('core_geometry');
    expect(selectDesignMethod(1000, 2)).toBe('core_geometry');
  });

  it('regulation of exactly 3% stays on the area product', () => {
    expect(selectDesignMethod(50, KG_REGULATION_THRESHOLD_PCT)).toBe('area_product');
  });

  it('an explicit method bypasses the rule', () => {
    expect(selectDesignMethod(100_000, 10, 'core_geometry')).toBe('core_geometry');
    expect(selectDesignMethod(50, 1, 'loss_optimized')).toBe('loss_optimized');
  });

  it('labels every method', () => {
    expect(Object.keys(METHOD_LABELS).sort()).toEqual(['area_product', 'core_geometry', 'loss_optimized']);
  });
});
