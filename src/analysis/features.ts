import type { AppConfig, CleaningConfig } from '../config';
import type { NumericColumn, ObservationRecord } from '../types';
import { mean, presentValues } from '../utils/statistics';
import { elapsedMinutes, formatWallClockMinutes, wallClockMinutes } from '../utils/timestamp';
import { detectColumnOutliers } from './outliers';

export type FeatureOptions = Pick<AppConfig, 'frame' | 'features'> & { cleaning: Pick<CleaningConfig, 'outlier'> };

export type Series = (number | null)[];

export interface ColumnFeatures {
  rollingMean: Series;
  rollingStd: Series;
  diff: Series;
  diffAbs: Series;
  cumulativeSum: Series;
  cumulativeMax: Series;
  cumulativeMin: Series;
}

/** xCenter と yCenter の両方を扱うときだけ作る位置の特徴量 */
export interface PositionFeatures {
  distanceFromCenter: Series;
  speedPxPerSecond: Series;
  angleDegrees: Series;
}

export interface FeatureSet {
  timestamps: string[];
  columns: Partial<Record<NumericColumn, ColumnFeatures>>;
  position: PositionFeatures | null;
}

export interface ColumnAggregate {
  mean: number | null;
  std: number | null;
  min: number | null;
  max: number | null;
  count: number;
}

export interface ResampledInterval {
  /** 区間の開始（記録された時差の壁時計、YYYY-MM-DDTHH:mm） */
  start: string;
  observationCount: number;
  columns: Partial<Record<NumericColumn, ColumnAggregate>>;
}

export type TrendDirection = 'increasing' | 'decreasing' | 'stable';

export interface TrendPattern {
  slope: number;
  intercept: number;
  rSquared: number;
  direction: TrendDirection;
}

export interface SeasonalityPattern {
  lag: number;
  autocorrelation: number;
  detected: boolean;
}

export interface AnomalyPattern {
  count: number;
  ratio: number;
  /** 入力系列での行番号 */
  indices: number[];
}

export interface SeriesPatterns {
  samples: number;
  trend: TrendPattern;
  seasonality: SeasonalityPattern | null;
  anomalies: AnomalyPattern;
}

export interface SeriesFeatures {
  rows: FeatureSet;
  intervals: ResampledInterval[];
  patterns: Partial<Record<NumericColumn, SeriesPatterns>>;
}

const PATTERN_MIN_SAMPLES = 10;
const SEASONALITY_MIN_SAMPLES = 20;
const MAX_AUTOCORRELATION_LAG = 50;

/** 不偏標準偏差 (ddof = 1)。2 点未満は null。 */
function sampleStandardDeviation(values: readonly number[]): number | null {
  if (values.length < 2) return null;
  const m = mean(values);
  return Math.sqrt(values.reduce((acc, value) => acc + (value - m) ** 2, 0) / (values.length - 1));
}

/** 直近 window 行（自身を含む）の平均と標準偏差。欠損は除いて数える。 */
export function rollingStatistics(values: Series, window: number): { mean: Series; std: Series } {
  const means: Series = [];
  const stds: Series = [];

  values.forEach((_, index) => {
    const present = presentValues(values.slice(Math.max(0, index - window + 1), index + 1));
    means.push(present.length > 0 ? mean(present) : null);
    stds.push(sampleStandardDeviation(present));
  });

  return { mean: means, std: stds };
}

export function differences(values: Series): Series {
  return values.map((value, index) => {
    const previous = index > 0 ? values[index - 1] : null;
    return value === null || previous === null ? null : value - previous;
  });
}

/** 累積和・累積最大・累積最小。欠損の行は null のまま、次の値からまた積み上げる。 */
export function cumulative(values: Series): { sum: Series; max: Series; min: Series } {
  const sums: Series = [];
  const maxima: Series = [];
  const minima: Series = [];
  let total = 0;
  let high = -Infinity;
  let low = Infinity;

  for (const value of values) {
    if (value === null) {
      sums.push(null);
      maxima.push(null);
      minima.push(null);
      continue;
    }
    total += value;
    high = Math.max(high, value);
    low = Math.min(low, value);
    sums.push(total);
    maxima.push(high);
    minima.push(low);
  }

  return { sum: sums, max: maxima, min: minima };
}

function positionFeatures(series: readonly ObservationRecord[], options: FeatureOptions): PositionFeatures {
  const centerX = options.frame.width / 2;
  const centerY = options.frame.height / 2;

  const distanceFromCenter = series.map(record =>
    record.xCenter === null || record.yCenter === null
      ? null
      : Math.sqrt((record.xCenter - centerX) ** 2 + (record.yCenter - centerY) ** 2)
  );

  const speedPxPerSecond: Series = [];
  const angleDegrees: Series = [];
  series.forEach((record, index) => {
    const previous = index > 0 ? series[index - 1] : null;
    if (
      previous === null ||
      record.xCenter === null ||
      record.yCenter === null ||
      previous.xCenter === null ||
      previous.yCenter === null
    ) {
      speedPxPerSecond.push(null);
      angleDegrees.push(null);
      return;
    }

    const dx = record.xCenter - previous.xCenter;
    const dy = record.yCenter - previous.yCenter;
    const seconds = elapsedMinutes(previous.timestamp, record.timestamp) * 60;
    speedPxPerSecond.push(seconds > 0 ? Math.sqrt(dx ** 2 + dy ** 2) / seconds : null);
    angleDegrees.push((Math.atan2(dy, dx) * 180) / Math.PI);
  });

  return { distanceFromCenter, speedPxPerSecond, angleDegrees };
}

/** 行ごとの時系列特徴量。系列は時刻順に並んでいること。 */
export function extractFeatures(
  series: readonly ObservationRecord[],
  columns: readonly NumericColumn[],
  options: FeatureOptions
): FeatureSet {
  const features: FeatureSet = {
    timestamps: series.map(record => record.timestamp),
    columns: {},
    position: null,
  };

  for (const column of columns) {
    const values = series.map(record => record[column]);
    const rolling = rollingStatistics(values, options.features.rollingWindow);
    const diff = differences(values);
    const totals = cumulative(values);

    features.columns[column] = {
      rollingMean: rolling.mean,
      rollingStd: rolling.std,
      diff,
      diffAbs: diff.map(value => (value === null ? null : Math.abs(value))),
      cumulativeSum: totals.sum,
      cumulativeMax: totals.max,
      cumulativeMin: totals.min,
    };
  }

  if (columns.includes('xCenter') && columns.includes('yCenter')) {
    features.position = positionFeatures(series, options);
  }

  return features;
}

function aggregate(values: Series): ColumnAggregate {
  const present = presentValues(values);
  if (present.length === 0) {
    return { mean: null, std: null, min: null, max: null, count: 0 };
  }
  return {
    mean: mean(present),
    std: sampleStandardDeviation(present),
    min: Math.min(...present),
    max: Math.max(...present),
    count: present.length,
  };
}

/**
 * intervalMinutes ごとの区間に集約する。区間は壁時計の 0 時にそろえ、
 * 最初の区間から最後の区間までを観察のない区間も含めて返す。
 */
export function resampleSeries(
  series: readonly ObservationRecord[],
  columns: readonly NumericColumn[],
  intervalMinutes: number
): ResampledInterval[] {
  if (series.length === 0) return [];

  const buckets = new Map<number, ObservationRecord[]>();
  for (const record of series) {
    const bucket = Math.floor(wallClockMinutes(record.timestamp) / intervalMinutes);
    const rows = buckets.get(bucket);
    if (rows) {
      rows.push(record);
    } else {
      buckets.set(bucket, [record]);
    }
  }

  const keys = [...buckets.keys()];
  const first = Math.min(...keys);
  const last = Math.max(...keys);

  const intervals: ResampledInterval[] = [];
  for (let bucket = first; bucket <= last; bucket++) {
    const rows = buckets.get(bucket) ?? [];
    const interval: ResampledInterval = {
      start: formatWallClockMinutes(bucket * intervalMinutes),
      observationCount: rows.length,
      columns: {},
    };
    for (const column of columns) {
      interval.columns[column] = aggregate(rows.map(record => record[column]));
    }
    intervals.push(interval);
  }
  return intervals;
}

/** 行番号に対する最小二乗直線 */
export function linearTrend(values: readonly number[]): TrendPattern {
  const n = values.length;
  const xMean = (n - 1) / 2;
  const yMean = mean(values);

  let sxy = 0;
  let sxx = 0;
  let syy = 0;
  values.forEach((y, x) => {
    sxy += (x - xMean) * (y - yMean);
    sxx += (x - xMean) ** 2;
    syy += (y - yMean) ** 2;
  });

  const slope = sxx === 0 ? 0 : sxy / sxx;
  const rSquared = sxx === 0 || syy === 0 ? 0 : sxy ** 2 / (sxx * syy);

  return {
    slope,
    intercept: yMean - slope * xMean,
    rSquared,
    direction: slope > 0 ? 'increasing' : slope < 0 ? 'decreasing' : 'stable',
  };
}

/** lag だけずらした系列との相関。どちらかが一定なら null。 */
export function autocorrelation(values: readonly number[], lag: number): number | null {
  if (lag <= 0 || lag >= values.length - 1) return null;

  const head = values.slice(lag);
  const tail = values.slice(0, values.length - lag);
  const headMean = mean(head);
  const tailMean = mean(tail);

  let covariance = 0;
  let headSquares = 0;
  let tailSquares = 0;
  head.forEach((value, index) => {
    covariance += (value - headMean) * (tail[index] - tailMean);
    headSquares += (value - headMean) ** 2;
    tailSquares += (tail[index] - tailMean) ** 2;
  });

  if (headSquares === 0 || tailSquares === 0) return null;
  return covariance / Math.sqrt(headSquares * tailSquares);
}

/** 自己相関の絶対値が最大のラグ。ラグは 1 から min(n/4, 50) 未満まで。 */
export function detectSeasonality(values: readonly number[], threshold: number): SeasonalityPattern | null {
  if (values.length < SEASONALITY_MIN_SAMPLES) return null;

  let best: SeasonalityPattern | null = null;
  const maxLag = Math.min(Math.floor(values.length / 4), MAX_AUTOCORRELATION_LAG);
  for (let lag = 1; lag < maxLag; lag++) {
    const value = autocorrelation(values, lag);
    if (value === null) continue;
    if (!best || Math.abs(value) > Math.abs(best.autocorrelation)) {
      best = { lag, autocorrelation: value, detected: Math.abs(value) > threshold };
    }
  }
  return best;
}

/**
 * 1 列の傾向・周期性・異常値の割合。
 * 欠損を除いて PATTERN_MIN_SAMPLES 点未満なら null。
 */
export function detectSeriesPatterns(values: Series, options: FeatureOptions): SeriesPatterns | null {
  const present = presentValues(values);
  if (present.length < PATTERN_MIN_SAMPLES) return null;

  const outliers = detectColumnOutliers(values, options.cleaning.outlier);
  const indices = outliers.mask.flatMap((flagged, index) => (flagged ? [index] : []));

  return {
    samples: present.length,
    trend: linearTrend(present),
    seasonality: detectSeasonality(present, options.features.seasonalityThreshold),
    anomalies: { count: indices.length, ratio: indices.length / present.length, indices },
  };
}

export function analyzeFeatures(
  series: readonly ObservationRecord[],
  columns: readonly NumericColumn[],
  options: FeatureOptions
): SeriesFeatures {
  const patterns: Partial<Record<NumericColumn, SeriesPatterns>> = {};
  for (const column of columns) {
    const detected = detectSeriesPatterns(series.map(record => record[column]), options);
    if (detected) patterns[column] = detected;
  }

  return {
    rows: extractFeatures(series, columns, options),
    intervals: resampleSeries(series, columns, options.features.resampleMinutes),
    patterns,
  };
}

