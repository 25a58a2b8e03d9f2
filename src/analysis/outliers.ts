import type { CleaningConfig } from '../config';
import { mean, presentValues, quantile, standardDeviation } from '../utils/statistics';

export interface OutlierBounds {
  lower: number;
  upper: number;
}

export interface ColumnOutliers {
  mask: boolean[];
  bounds: OutlierBounds | null;
  count: number;
}

const DENSITY_MIN_ROWS = 10;

function fromBounds(values: readonly (number | null)[], bounds: OutlierBounds | null): ColumnOutliers {
  if (bounds === null) {
    return { mask: values.map(() => false), bounds, count: 0 };
  }
  const mask = values.map(value => value !== null && (value < bounds.lower || value > bounds.upper));
  return { mask, bounds, count: mask.filter(Boolean).length };
}

/**
 * |z| > threshold を外れ値とする。平均・標準偏差（母）は欠損を除いて計算。
 * 標準偏差 0 の列には外れ値なし。
 */
export function detectZScoreOutliers(values: readonly (number | null)[], threshold: number): ColumnOutliers {
  const present = presentValues(values);
  const std = standardDeviation(present);
  if (present.length === 0 || std === 0) {
    return fromBounds(values, null);
  }
  const m = mean(present);
  return fromBounds(values, { lower: m - threshold * std, upper: m + threshold * std });
}

/** [Q1 - k·IQR, Q3 + k·IQR] の外側を外れ値とする。 */
export function detectIqrOutliers(values: readonly (number | null)[], multiplier: number): ColumnOutliers {
  const present = presentValues(values);
  if (present.length === 0) {
    return fromBounds(values, null);
  }
  const q1 = quantile(present, 0.25);
  const q3 = quantile(present, 0.75);
  const iqr = q3 - q1;
  return fromBounds(values, { lower: q1 - multiplier * iqr, upper: q3 + multiplier * iqr });
}

function standardizeColumn(values: readonly number[]): number[] {
  const m = mean(values);
  const std = standardDeviation(values);
  return values.map(value => (std === 0 ? 0 : (value - m) / std));
}

/**
 * 複数列をまとめた点の k 近傍平均距離で外れ値を判定する。
 * 各列は標準化してから距離を取り、k 近傍距離の z 値が threshold を超える行を外れ値とする。
 * 欠損のない行が少なすぎる場合は null（呼び出し側で列ごとの z 値にフォールバック）。
 */
export function detectDensityOutliers(
  columns: readonly (readonly (number | null)[])[],
  neighbors: number,
  threshold: number
): boolean[] | null {
  if (columns.length === 0) return null;

  const rowCount = columns[0].length;
  const completeRows: number[] = [];
  for (let row = 0; row < rowCount; row++) {
    if (columns.every(column => column[row] !== null)) {
      completeRows.push(row);
    }
  }

  if (completeRows.length < DENSITY_MIN_ROWS) {
    return null;
  }

  const standardized = columns.map(column => standardizeColumn(completeRows.map(row => column[row] ?? 0)));
  const points = completeRows.map((_, i) => standardized.map(column => column[i]));
  const k = Math.min(neighbors, points.length - 1);

  const kDistances = points.map((point, i) => {
    const distances = points
      .filter((_, j) => j !== i)
      .map(other => Math.sqrt(point.reduce((acc, value, d) => acc + (value - other[d]) ** 2, 0)))
      .sort((a, b) => a - b);
    return mean(distances.slice(0, k));
  });

  const m = mean(kDistances);
  const std = standardDeviation(kDistances);

  const mask = new Array<boolean>(rowCount).fill(false);
  if (std === 0) return mask;

  completeRows.forEach((row, i) => {
    mask[row] = (kDistances[i] - m) / std > threshold;
  });
  return mask;
}

/** 設定された手法で 1 列の外れ値を判定する。density は列単位では z 値で代用する。 */
export function detectColumnOutliers(
  values: readonly (number | null)[],
  outlier: CleaningConfig['outlier']
): ColumnOutliers {
  switch (outlier.method) {
    case 'zscore':
    case 'density':
      return detectZScoreOutliers(values, outlier.threshold);
    case 'iqr':
      return detectIqrOutliers(values, outlier.multiplier);
  }
}

export function clipToBounds(values: readonly (number | null)[], bounds: OutlierBounds): (number | null)[] {
  return values.map(value => (value === null ? null : Math.min(bounds.upper, Math.max(bounds.lower, value))));
}
