import { describe, expect, it } from 'vitest';
import { ScalerRegistry, fitScaler, transform } from '../normalization';

describe('fitScaler', () => {
  it('fits min-max, standard and robust scalers', () => {
    expect(fitScaler('minmax', [0, 5, 10])).toEqual({ method: 'minmax', min: 0, max: 10 });
    expect(fitScaler('standard', [1, 3])).toEqual({ method: 'standard', mean: 2, std: 1 });
    expect(fitScaler('robust', [1, 2, 3, 4, 5])).toEqual({ method: 'robust', median: 3, iqr: 2 });
  });

  it('needs at least two values', () => {
    expect(fitScaler('minmax', [4, null])).toBeNull();
  });
});

describe('transform', () => {
  it('scales values and keeps nulls', () => {
    expect(transform([0, null, 5, 10], { method: 'minmax', min: 0, max: 10 })).toEqual([0, null, 0.5, 1]);
    expect(transform([1, 3], { method: 'standard', mean: 2, std: 1 })).toEqual([-1, 1]);
    expect(transform([1, 2, 3, 4, 5], { method: 'robust', median: 3, iqr: 2 })).toEqual([-1, -0.5, 0, 0.5, 1]);
  });

  it('maps a zero spread to 0', () => {
    expect(transform([7, 7], { method: 'minmax', min: 7, max: 7 })).toEqual([0, 0]);
  });
});

describe('ScalerRegistry', () => {
  it('reuses the parameters fitted first for a column', () => {
    const registry = new ScalerRegistry('minmax');

    expect(registry.fitTransform('xCenter', [0, 10])).toEqual([0, 1]);
    expect(registry.fitTransform('xCenter', [5])).toEqual([0.5]);
    expect(registry.parameters()).toEqual({ xCenter: { method: 'minmax', min: 0, max: 10 } });

    registry.reset();
    expect(registry.get('xCenter')).toBeUndefined();
  });
});
