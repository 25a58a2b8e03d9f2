import { describe, expect, it } from 'vitest';
import { at, detected, observation } from '../../__tests__/fixtures';
import { defaultConfig } from '../../config';
import { cleanSeries } from '../cleaner';
import {
  completenessRatio,
  computeMetrics,
  emptyMetrics,
  peakActivityHour,
  summarizeDay,
  summarizeHours,
} from '../activity';

const config = defaultConfig();

const exampleDay = () => {
  const raw = [detected(at(10, 0), 0, 0, 0.9), observation(at(10, 1)), detected(at(10, 2), 10, 10, 0.7)];
  return cleanSeries(raw, config.cleaning.columns, config.cleaning).records;
};

describe('computeMetrics', () => {
  it('returns zero metrics for an empty series', () => {
    const metrics = computeMetrics([], config);

    expect(metrics).toEqual(emptyMetrics());
    expect(metrics.dataCompletenessRatio).toBe(0);
    expect(metrics.averageMovementPerDetection).toBe(0);
  });

  it('returns zero metrics for a day observed without any detection', () => {
    const raw = Array.from({ length: 720 }, (_, index) => observation(at(Math.floor(index / 60), index % 60)));
    const series = cleanSeries(raw, config.cleaning.columns, config.cleaning).records;

    const metrics = computeMetrics(series, config);

    expect(series).toHaveLength(720);
    expect(metrics).toEqual(emptyMetrics());
    expect(metrics.dataCompletenessRatio).toBe(0);
    expect(metrics.averageMovementPerDetection).toBe(0);
  });

  it('derives the activity metrics of a cleaned day', () => {
    const metrics = computeMetrics(exampleDay(), config);

    expect(metrics.totalDetections).toBe(2);
    expect(metrics.totalMovementDistance).toBeCloseTo(2 * Math.SQRT2 * 5, 10);
    expect(metrics.averageMovementPerDetection).toBeCloseTo(Math.SQRT2 * 5, 10);
    expect(metrics.peakActivityHour).toBe(10);
    expect(metrics.activeDurationMinutes).toBe(2);
    expect(metrics.detectionReliability).toBeCloseTo(0.8, 10);
    expect(metrics.movementStatistics.nonZeroMovements).toBe(2);
    expect(metrics.movementStatistics.stdDistance).toBeCloseTo(0, 10);
    expect(metrics.movementPatterns).toEqual(['insufficient_data']);
  });
});

describe('peakActivityHour', () => {
  it('breaks ties by the earliest hour', () => {
    const detections = [
      detected(at(15, 0), 0, 0),
      detected(at(15, 5), 0, 0),
      detected(at(8, 0), 0, 0),
      detected(at(8, 5), 0, 0),
    ];
    expect(peakActivityHour(detections)).toBe(8);
  });
});

describe('completenessRatio', () => {
  it('divides by the expected number of rows and stays within [0, 1]', () => {
    expect(completenessRatio(720, config)).toBe(0.5);
    expect(completenessRatio(5000, config)).toBe(1);
    expect(completenessRatio(0, config)).toBe(0);
    expect(completenessRatio(12, { observation: { intervalMinutes: 5, periodMinutes: 60 } })).toBe(1);
  });
});

describe('summarizeHours', () => {
  it('always emits 24 rows', () => {
    const hourly = summarizeHours('2024-06-01', exampleDay(), config);

    expect(hourly).toHaveLength(24);
    expect(hourly.map(h => h.hour)).toEqual(Array.from({ length: 24 }, (_, hour) => hour));

    const ten = hourly[10];
    expect(ten.observationCount).toBe(3);
    expect(ten.detectionCount).toBe(2);
    expect(ten.movementDistance).toBeCloseTo(2 * Math.SQRT2 * 5, 10);
    expect(ten.averageConfidence).toBeCloseTo(0.8, 10);
    expect(ten.activityLevel).toBe('low');

    expect(hourly[3]).toEqual({
      date: '2024-06-01',
      hour: 3,
      observationCount: 0,
      detectionCount: 0,
      movementDistance: 0,
      averageConfidence: null,
      activityLevel: 'none',
    });
  });

  it('emits 24 empty rows for a day without observations', () => {
    const hourly = summarizeHours('2024-06-02', exampleDay(), config);
    expect(hourly).toHaveLength(24);
    expect(hourly.every(h => h.observationCount === 0)).toBe(true);
  });
});

describe('summarizeDay', () => {
  it('combines the day metrics with its hourly rows', () => {
    const summary = summarizeDay('2024-06-01', exampleDay(), config);

    expect(summary.observationCount).toBe(3);
    expect(summary.activeHours).toBe(1);
    expect(summary.metrics.totalDetections).toBe(2);
    expect(summary.hourly).toHaveLength(24);
  });

  it('yields zero metrics for a day with no data', () => {
    const summary = summarizeDay('2024-06-05', [], config);
    expect(summary.metrics).toEqual(emptyMetrics());
    expect(summary.activeHours).toBe(0);
  });

  it('picks the rows of the recorded wall-clock date', () => {
    const series = [detected('2024-06-01T23:30:00+09:00', 0, 0), detected('2024-06-02T00:10:00+09:00', 3, 4)];

    const first = summarizeDay('2024-06-01', series, config);
    const second = summarizeDay('2024-06-02', series, config);

    expect(first.observationCount).toBe(1);
    expect(first.hourly[23].detectionCount).toBe(1);
    expect(second.observationCount).toBe(1);
    expect(second.hourly[0].detectionCount).toBe(1);
  });

  it('files hour 24 under midnight of the next day', () => {
    const series = [detected(at(23, 59), 0, 0), detected('2024-06-01T24:00:00+09:00', 3, 4)];

    const first = summarizeDay('2024-06-01', series, config);
    const second = summarizeDay('2024-06-02', series, config);

    expect(first.observationCount).toBe(1);
    expect(first.hourly[23].detectionCount).toBe(1);
    expect(second.observationCount).toBe(1);
    expect(second.hourly[0].detectionCount).toBe(1);
  });
});
