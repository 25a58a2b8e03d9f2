import { describe, expect, it } from 'vitest';
import { suppressDuplicates } from '../deduplication';

const box = (xCenter: number, yCenter: number, confidence: number, label = '') => ({
  xCenter,
  yCenter,
  width: 50,
  height: 50,
  confidence,
  label,
});

describe('suppressDuplicates', () => {
  it('keeps the higher-confidence detection of an overlapping pair', () => {
    const result = suppressDuplicates([box(100, 100, 0.9, 'a'), box(105, 102, 0.6, 'b')], 0.7);

    expect(result.kept.map(d => d.label)).toEqual(['a']);
    expect(result.suppressed).toHaveLength(1);
    expect(result.suppressed[0].index).toBe(1);
    expect(result.suppressed[0].keptIndex).toBe(0);
    expect(result.suppressed[0].iou).toBeCloseTo(2160 / 2840, 10);
  });

  it('keeps the higher-confidence detection regardless of input position', () => {
    const result = suppressDuplicates([box(105, 102, 0.6, 'low'), box(100, 100, 0.9, 'high')], 0.7);
    expect(result.kept.map(d => d.label)).toEqual(['high']);
  });

  it('keeps the earlier detection on an exact confidence tie', () => {
    const result = suppressDuplicates([box(100, 100, 0.8, 'first'), box(100, 100, 0.8, 'second')], 0.7);
    expect(result.kept.map(d => d.label)).toEqual(['first']);
  });

  it('returns survivors in input order', () => {
    const result = suppressDuplicates([box(0, 0, 0.5, 'a'), box(500, 500, 0.9, 'b'), box(1000, 0, 0.7, 'c')], 0.7);
    expect(result.kept.map(d => d.label)).toEqual(['a', 'b', 'c']);
    expect(result.suppressed).toEqual([]);
  });

  it('only suppresses when IoU is strictly above the threshold', () => {
    const result = suppressDuplicates([box(0, 0, 0.9, 'a'), box(0, 0, 0.5, 'b')], 1);
    expect(result.kept.map(d => d.label)).toEqual(['a', 'b']);
  });

  it('is idempotent', () => {
    const input = [box(100, 100, 0.9), box(105, 102, 0.6), box(400, 400, 0.7), box(402, 401, 0.95)];
    const once = suppressDuplicates(input, 0.7).kept;
    const twice = suppressDuplicates(once, 0.7).kept;
    expect(twice).toEqual(once);
  });
});
