import { describe, expect, it } from 'vitest';
import { at, detected, observation } from '../../__tests__/fixtures';
import { defaultConfig } from '../../config';
import {
  analyzeFeatures,
  autocorrelation,
  cumulative,
  detectSeasonality,
  detectSeriesPatterns,
  differences,
  extractFeatures,
  linearTrend,
  resampleSeries,
  rollingStatistics,
} from '../features';

const config = defaultConfig();

describe('rollingStatistics', () => {
  it('uses the trailing window and skips missing values', () => {
    const { mean, std } = rollingStatistics([1, null, 3, 5], 2);

    expect(mean).toEqual([1, 1, 3, 4]);
    expect(std.slice(0, 3)).toEqual([null, null, null]);
    expect(std[3]).toBeCloseTo(Math.SQRT2, 12);
  });
});

describe('differences / cumulative', () => {
  it('leaves null where a neighbour is missing', () => {
    expect(differences([1, 4, null, 6])).toEqual([null, 3, null, null]);
  });

  it('accumulates over present values only', () => {
    expect(cumulative([2, null, -1, 5])).toEqual({
      sum: [2, null, 1, 6],
      max: [2, null, 2, 5],
      min: [2, null, -1, -1],
    });
  });
});

describe('extractFeatures', () => {
  const series = [detected(at(10, 0), 960, 540), detected(at(10, 1), 963, 544), observation(at(10, 2))];

  it('derives position features from both centre columns', () => {
    const features = extractFeatures(series, ['xCenter', 'yCenter'], config);

    expect(features.timestamps).toEqual([at(10, 0), at(10, 1), at(10, 2)]);
    expect(features.columns.xCenter?.diff).toEqual([null, 3, null]);
    expect(features.columns.yCenter?.cumulativeSum).toEqual([540, 1084, null]);

    const position = features.position;
    expect(position?.distanceFromCenter).toEqual([0, 5, null]);
    expect(position?.speedPxPerSecond[0]).toBeNull();
    expect(position?.speedPxPerSecond[1]).toBeCloseTo(5 / 60, 12);
    expect(position?.angleDegrees[1]).toBeCloseTo((Math.atan2(4, 3) * 180) / Math.PI, 12);
    expect(position?.angleDegrees[2]).toBeNull();
  });

  it('skips position features without both centre columns', () => {
    const features = extractFeatures(series, ['xCenter'], config);

    expect(features.position).toBeNull();
    expect(Object.keys(features.columns)).toEqual(['xCenter']);
  });
});

describe('resampleSeries', () => {
  it('aggregates into wall-clock intervals including empty ones', () => {
    const series = [detected(at(10, 0), 1, 0), detected(at(10, 5), 3, 0), detected(at(10, 25), 10, 0)];

    const intervals = resampleSeries(series, ['xCenter'], 10);

    expect(intervals.map(interval => [interval.start, interval.observationCount])).toEqual([
      ['2024-06-01T10:00', 2],
      ['2024-06-01T10:10', 0],
      ['2024-06-01T10:20', 1],
    ]);
    expect(intervals[0].columns.xCenter).toEqual({
      mean: 2,
      std: Math.sqrt(2),
      min: 1,
      max: 3,
      count: 2,
    });
    expect(intervals[1].columns.xCenter).toEqual({ mean: null, std: null, min: null, max: null, count: 0 });
    expect(intervals[2].columns.xCenter).toEqual({ mean: 10, std: null, min: 10, max: 10, count: 1 });
  });

  it('labels intervals with the recorded wall clock', () => {
    const intervals = resampleSeries([detected('2024-06-01T23:55:00+09:00', 1, 1)], ['xCenter'], 10);
    expect(intervals.map(interval => interval.start)).toEqual(['2024-06-01T23:50']);
  });

  it('returns nothing for an empty series', () => {
    expect(resampleSeries([], ['xCenter'], 10)).toEqual([]);
  });
});

describe('linearTrend', () => {
  it('fits a line over the sample index', () => {
    const trend = linearTrend(Array.from({ length: 10 }, (_, x) => 2 * x + 1));

    expect(trend.slope).toBeCloseTo(2, 12);
    expect(trend.intercept).toBeCloseTo(1, 12);
    expect(trend.rSquared).toBeCloseTo(1, 12);
    expect(trend.direction).toBe('increasing');
  });

  it('calls a constant series stable', () => {
    expect(linearTrend(new Array<number>(10).fill(4))).toEqual({
      slope: 0,
      intercept: 4,
      rSquared: 0,
      direction: 'stable',
    });
  });
});

describe('seasonality', () => {
  const repeating = Array.from({ length: 24 }, (_, i) => (i % 3 === 2 ? 1 : 0));

  it('correlates a series with its shifted self', () => {
    expect(autocorrelation(repeating, 3)).toBeCloseTo(1, 12);
    expect(autocorrelation(new Array<number>(24).fill(1), 1)).toBeNull();
  });

  it('picks the lag with the strongest autocorrelation', () => {
    const seasonality = detectSeasonality(repeating, 0.3);

    expect(seasonality?.lag).toBe(3);
    expect(seasonality?.autocorrelation).toBeCloseTo(1, 12);
    expect(seasonality?.detected).toBe(true);
  });

  it('needs at least 20 samples', () => {
    expect(detectSeasonality(repeating.slice(0, 19), 0.3)).toBeNull();
  });
});

describe('detectSeriesPatterns', () => {
  it('reports anomalies by their row in the input', () => {
    const values = [null, ...new Array<number>(10).fill(10), 100, ...new Array<number>(10).fill(10)];

    const patterns = detectSeriesPatterns(values, config);

    expect(patterns?.samples).toBe(21);
    expect(patterns?.anomalies).toEqual({ count: 1, ratio: 1 / 21, indices: [11] });
    expect(patterns?.trend.direction).toBeDefined();
  });

  it('needs at least 10 present values', () => {
    expect(detectSeriesPatterns([1, 2, 3, null, 5, 6, 7, 8, 9, 10], config)).toBeNull();
  });
});

describe('analyzeFeatures', () => {
  it('combines row features, intervals and patterns', () => {
    const series = Array.from({ length: 12 }, (_, i) => detected(at(10, i), i, 0));

    const features = analyzeFeatures(series, ['xCenter'], config);

    expect(features.rows.columns.xCenter?.cumulativeMax[11]).toBe(11);
    expect(features.intervals.map(interval => interval.observationCount)).toEqual([10, 2]);
    expect(features.patterns.xCenter?.trend.direction).toBe('increasing');
    expect(features.patterns.xCenter?.seasonality).toBeNull();
  });
});
