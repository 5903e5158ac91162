/**
 * Unit Tests - Glass Resource Validator
 *
 * Missing-share boundaries, the capability cap and style presets.
 */

import { describe, it, expect } from '@jest/globals';
import {
  createGlassResourceValidator,
  recommendTier,
  styleConfigFor
} from '../../../src/core/glass-resource-validator';
import { GLASS_COLORS, GLASS_DIMENSIONS, GLASS_VISUALS } from '../../../src/core/resource-catalog';
import { FakeHost } from '../../helpers/fake-host';

describe('Glass resource validation', () => {
  it('recommends the full tier when everything is present', () => {
    const report = createGlassResourceValidator(new FakeHost(), () => true).validateAll();

    expect(report.totalMissing).toBe(0);
    expect(report.missingPercentage).toBe(0);
    expect(report.effectsSupported).toBe(true);
    expect(report.recommendedTier).toBe('full');
    expect(report.visual.total + report.color.total + report.dimension.total).toBe(30);
  });

  it('recommends reduced at 7 of 30 missing', () => {
    const host = new FakeHost(GLASS_VISUALS.slice(0, 7));
    const report = createGlassResourceValidator(host, () => true).validateAll();

    expect(report.totalMissing).toBe(7);
    expect(report.recommendedTier).toBe('reduced');
    expect(report.visual.availabilityPercentage).toBe(30);
  });

  it('recommends minimal at exactly half missing', () => {
    const host = new FakeHost([...GLASS_VISUALS, ...GLASS_COLORS.slice(0, 5)]);
    const report = createGlassResourceValidator(host, () => true).validateAll();

    expect(report.missingPercentage).toBe(50);
    expect(report.recommendedTier).toBe('minimal');
  });

  it('recommends none beyond half missing', () => {
    const host = new FakeHost([...GLASS_VISUALS, ...GLASS_COLORS.slice(0, 6)]);
    const report = createGlassResourceValidator(host, () => true).validateAll();

    expect(report.totalMissing).toBe(16);
    expect(report.recommendedTier).toBe('none');
  });

  it('caps the tier at reduced without advanced rendering', () => {
    const validator = createGlassResourceValidator(new FakeHost(), () => false);
    const report = validator.validateAll();

    expect(report.effectsSupported).toBe(false);
    expect(report.recommendedTier).toBe('reduced');
  });

  it('recommends reduced without advanced rendering even when most resources are missing', () => {
    const host = new FakeHost([...GLASS_VISUALS, ...GLASS_DIMENSIONS]);
    const report = createGlassResourceValidator(host, () => false).validateAll();

    expect(report.missingPercentage).toBeGreaterThan(50);
    expect(report.recommendedTier).toBe('reduced');
  });

  it('treats a throwing capability probe as unsupported', () => {
    const report = createGlassResourceValidator(new FakeHost(), () => {
      throw new Error('probe failed');
    }).validateAll();

    expect(report.effectsSupported).toBe(false);
    expect(report.recommendedTier).toBe('reduced');
  });

  it('has a fallback for every glass resource', () => {
    const host = new FakeHost([...GLASS_VISUALS, ...GLASS_COLORS, ...GLASS_DIMENSIONS]);
    const validator = createGlassResourceValidator(host, () => true);
    const report = validator.validateAll();

    expect(report.totalFallbacksAvailable).toBe(report.totalMissing);
    expect(validator.fallbackFor('blur_background')).toEqual({ kind: 'visual', replacement: 'screen_background_dark' });
    expect(validator.fallbackFor('glass_blur_radius')).toEqual({ kind: 'dimension', dp: 25 });
  });

  it('reports whether effects may be used and the optimal style', () => {
    const host = new FakeHost([...GLASS_VISUALS, ...GLASS_COLORS]);
    const validator = createGlassResourceValidator(host, () => true);

    expect(validator.canUseEffects()).toBe(false);
    expect(validator.optimalStyleConfig().backgroundAlpha).toBe(1);
  });
});

describe('recommendTier', () => {
  it('maps the boundaries', () => {
    expect(recommendTier(0, true)).toBe('full');
    expect(recommendTier(25, true)).toBe('reduced');
    expect(recommendTier(25.1, true)).toBe('minimal');
    expect(recommendTier(50, true)).toBe('minimal');
    expect(recommendTier(50.1, true)).toBe('none');
    expect(recommendTier(51, true)).toBe('none');
  });

  it('always recommends reduced when effects are unsupported', () => {
    expect([0, 20, 40, 60, 100].map(share => recommendTier(share, false))).toEqual([
      'reduced',
      'reduced',
      'reduced',
      'reduced',
      'reduced'
    ]);
  });
});

describe('styleConfigFor', () => {
  it('drops blur at reduced but keeps shadows', () => {
    const style = styleConfigFor('reduced');
    expect(style.enableBlurEffects).toBe(false);
    expect(style.blurRadius).toBe(0);
    expect(style.backgroundAlpha).toBe(0.8);
    expect(style.enableElevationShadows).toBe(true);
  });

  it('softens the border at minimal', () => {
    const style = styleConfigFor('minimal');
    expect(style.enableElevationShadows).toBe(false);
    expect(style.enableComplexAnimations).toBe(false);
    expect(style.borderAlpha).toBe(0.5);
  });

  it('is opaque and borderless at none', () => {
    const style = styleConfigFor('none');
    expect(style.backgroundAlpha).toBe(1);
    expect(style.borderAlpha).toBe(0);
  });

  it('leaves the base untouched at full', () => {
    expect(styleConfigFor('full').blurRadius).toBe(25);
  });
});
