import { describe, expect, it } from 'vitest';
import { at, detected, observation } from '../../__tests__/fixtures';
import { defaultConfig, resolveConfig } from '../../config';
import { cleanSeries } from '../cleaner';
import { computeMovements } from '../movement';

const config = defaultConfig();

describe('computeMovements', () => {
  it('measures two equal steps through an interpolated midpoint', () => {
    const raw = [detected(at(10, 0), 0, 0), observation(at(10, 1)), detected(at(10, 2), 10, 10)];
    const { records } = cleanSeries(raw, config.cleaning.columns, config.cleaning);

    const result = computeMovements(records, config);

    expect(result.distances).toHaveLength(2);
    expect(result.distances[0]).toBeCloseTo(7.0710678, 6);
    expect(result.distances[1]).toBeCloseTo(7.0710678, 6);
    expect(result.samples.map(s => s.elapsedMinutes)).toEqual([1, 1]);
  });

  it('drops a step faster than the speed ceiling instead of clamping it', () => {
    // 既定の上限はフレーム対角線の半分（約 1101 px/分）
    const series = [detected(at(10, 0), 0, 0), detected(at(10, 1), 2000, 0), detected(at(10, 2), 2000, 10)];

    const result = computeMovements(series, config);

    expect(result.rejected).toHaveLength(1);
    expect(result.rejected[0].distance).toBe(2000);
    expect(result.distances).toEqual([10]);
  });

  it('honours a configured speed ceiling', () => {
    const slow = resolveConfig({ movement: { maxSpeedPxPerMinute: 5 } });
    const series = [detected(at(10, 0), 0, 0), detected(at(10, 1), 3, 4), detected(at(10, 2), 9, 12)];

    expect(computeMovements(series, slow).distances).toEqual([5]);
  });

  it('skips rows without a position', () => {
    const series = [detected(at(10, 0), 0, 0), observation(at(10, 1)), detected(at(10, 2), 3, 4)];

    const result = computeMovements(series, config);

    expect(result.samples).toEqual([{ from: at(10, 0), to: at(10, 2), distance: 5, elapsedMinutes: 2 }]);
  });

  it('does not apply the speed check when no time has passed', () => {
    const series = [detected(at(10, 0), 0, 0), detected(at(10, 0), 2000, 0)];
    expect(computeMovements(series, config).distances).toEqual([2000]);
  });

  it('is symmetric and zero for a stationary subject', () => {
    const forward = [detected(at(10, 0), 10, 20), detected(at(10, 1), 13, 24)];
    const backward = [detected(at(10, 0), 13, 24), detected(at(10, 1), 10, 20)];

    expect(computeMovements(forward, config).distances).toEqual([5]);
    expect(computeMovements(backward, config).distances).toEqual([5]);
    expect(computeMovements([detected(at(10, 0), 7, 7), detected(at(10, 1), 7, 7)], config).distances).toEqual([0]);
  });

  it('counts steps under the jitter threshold as no movement', () => {
    const jittery = resolveConfig({ movement: { jitterThreshold: 2 } });
    const series = [detected(at(10, 0), 0, 0), detected(at(10, 1), 1, 0), detected(at(10, 2), 11, 0)];

    expect(computeMovements(series, jittery).distances).toEqual([0, 10]);
  });

  it('replaces a spurious jump in a long sequence', () => {
    const xs = [0, 10, 20, 30, 40, 50, 550, 560, 570, 580, 590, 600];
    const series = xs.map((x, i) => detected(at(10, i), x, 0));

    const result = computeMovements(series, config);

    expect(result.outliersReplaced).toBe(1);
    expect(result.distances).toEqual(new Array<number>(11).fill(10));
    expect(result.samples[5].distance).toBe(500);
  });

  it('returns nothing for an empty series', () => {
    expect(computeMovements([], config)).toEqual({ samples: [], rejected: [], distances: [], outliersReplaced: 0 });
  });
});
