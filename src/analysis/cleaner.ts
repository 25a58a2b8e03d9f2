import { isNumericColumn, type NumericColumn, type ObservationRecord } from '../types';
import type { CleaningConfig } from '../config';
import type { Diagnostic } from '../utils/errors';
import { getLogger } from '../utils/logger';
import { toEpochMs } from '../utils/timestamp';
import { interpolateMissing } from './interpolation';
import { clipToBounds, detectColumnOutliers, detectDensityOutliers, type ColumnOutliers } from './outliers';
import { centeredMovingAverage } from './smoothing';
import { ScalerRegistry, type ScalerParameters } from './normalization';

const logger = getLogger('cleaner');

export interface CleaningReport {
  inputRows: number;
  outputRows: number;
  duplicatesDropped: number;
  missingValuesFilled: number;
  outliersDetected: number;
  outliersCorrected: number;
  rowsRemoved: number;
  pointsSmoothed: number;
  columns: NumericColumn[];
  skippedColumns: string[];
  normalized: Partial<Record<NumericColumn, (number | null)[]>>;
  scalers: Record<string, ScalerParameters>;
  diagnostics: Diagnostic[];
}

export interface CleaningResult {
  records: ObservationRecord[];
  report: CleaningReport;
}

type ColumnData = Map<NumericColumn, (number | null)[]>;

/**
 * 時刻昇順に並べ（安定ソート）、同一時刻の重複は最初の行を残す。
 */
export function sortAndDeduplicate(records: readonly ObservationRecord[]): {
  records: ObservationRecord[];
  duplicates: number;
} {
  const sorted = records
    .map(record => ({ record, epoch: toEpochMs(record.timestamp) }))
    .sort((a, b) => a.epoch - b.epoch);

  const unique: ObservationRecord[] = [];
  let lastEpoch: number | null = null;
  for (const { record, epoch } of sorted) {
    if (epoch === lastEpoch) continue;
    unique.push(record);
    lastEpoch = epoch;
  }

  return { records: unique, duplicates: records.length - unique.length };
}

function resolveColumns(columns: readonly string[], diagnostics: Diagnostic[]) {
  const accepted: NumericColumn[] = [];
  const skipped: string[] = [];

  for (const column of columns) {
    if (isNumericColumn(column)) {
      if (!accepted.includes(column)) accepted.push(column);
    } else {
      skipped.push(column);
      diagnostics.push({
        kind: 'missing-column',
        message: `Column "${column}" is not present in observation records; skipped`,
        context: { column },
      });
      logger.warn(`Column "${column}" is not present in observation records; skipped`);
    }
  }

  return { accepted, skipped };
}

function outlierMasks(data: ColumnData, columns: readonly NumericColumn[], config: CleaningConfig) {
  const masks = new Map<NumericColumn, ColumnOutliers>();

  if (config.outlier.method === 'density') {
    const rowMask = detectDensityOutliers(
      columns.map(column => data.get(column) ?? []),
      config.outlier.neighbors,
      config.outlier.threshold
    );
    if (rowMask) {
      for (const column of columns) {
        const values = data.get(column) ?? [];
        const mask = rowMask.map((flagged, row) => flagged && values[row] !== null);
        masks.set(column, { mask, bounds: null, count: mask.filter(Boolean).length });
      }
      return masks;
    }
  }

  // density で行数が足りないときもここに来る
  for (const column of columns) {
    masks.set(column, detectColumnOutliers(data.get(column) ?? [], config.outlier));
  }
  return masks;
}

/**
 * 観察レコード列のクリーニング。
 * ソート・重複除去 → 欠損補間 → 外れ値検出と処理 → 平滑化（任意）→ 正規化（任意）。
 * 入力は変更せず、新しい配列を返す。
 */
export function cleanSeries(
  records: readonly ObservationRecord[],
  columns: readonly string[],
  config: CleaningConfig,
  scalers?: ScalerRegistry
): CleaningResult {
  const diagnostics: Diagnostic[] = [];
  const { records: ordered, duplicates } = sortAndDeduplicate(records);
  const { accepted, skipped } = resolveColumns(columns, diagnostics);

  const report: CleaningReport = {
    inputRows: records.length,
    outputRows: ordered.length,
    duplicatesDropped: duplicates,
    missingValuesFilled: 0,
    outliersDetected: 0,
    outliersCorrected: 0,
    rowsRemoved: 0,
    pointsSmoothed: 0,
    columns: accepted,
    skippedColumns: skipped,
    normalized: {},
    scalers: {},
    diagnostics,
  };

  if (ordered.length === 0 || accepted.length === 0) {
    return { records: ordered, report };
  }

  let rows = ordered;
  let times = rows.map(record => toEpochMs(record.timestamp));
  const data: ColumnData = new Map();

  // 1. 欠損補間
  for (const column of accepted) {
    const interpolated = interpolateMissing(
      times,
      rows.map(record => record[column])
    );
    data.set(column, interpolated.values);
    report.missingValuesFilled += interpolated.filled;
  }

  // 2. 外れ値
  const masks = outlierMasks(data, accepted, config);
  for (const outliers of masks.values()) {
    report.outliersDetected += outliers.count;
  }

  if (report.outliersDetected > 0) {
    if (config.resolution === 'remove') {
      const removeRow = rows.map((_, row) => accepted.some(column => masks.get(column)?.mask[row] === true));
      rows = rows.filter((_, row) => !removeRow[row]);
      times = times.filter((_, row) => !removeRow[row]);
      for (const column of accepted) {
        data.set(column, (data.get(column) ?? []).filter((_, row) => !removeRow[row]));
      }
      report.rowsRemoved = removeRow.filter(Boolean).length;
    } else {
      for (const column of accepted) {
        const outliers = masks.get(column);
        const values = data.get(column);
        if (!outliers || !values || outliers.count === 0) continue;

        if (config.resolution === 'clip' && outliers.bounds) {
          data.set(column, clipToBounds(values, outliers.bounds));
        } else {
          const blanked = values.map((value, row) => (outliers.mask[row] ? null : value));
          data.set(column, interpolateMissing(times, blanked).values);
        }
        report.outliersCorrected += outliers.count;
      }
    }
    logger.debug('Outliers handled', {
      method: config.outlier.method,
      resolution: config.resolution,
      detected: report.outliersDetected,
    });
  }

  // 3. 平滑化
  if (config.smoothing.enabled) {
    for (const column of accepted) {
      const values = data.get(column) ?? [];
      const smoothed = centeredMovingAverage(values, config.smoothing.window);
      report.pointsSmoothed += smoothed.filter((value, row) => value !== values[row]).length;
      data.set(column, smoothed);
    }
  }

  // 4. 正規化（元の値は残し、別に返す）
  if (config.normalization !== 'none') {
    const registry = scalers ?? new ScalerRegistry(config.normalization);
    for (const column of accepted) {
      const normalized = registry.fitTransform(column, data.get(column) ?? []);
      if (normalized) report.normalized[column] = normalized;
    }
    report.scalers = registry.parameters();
  }

  const cleaned = rows.map((record, row) => {
    const next: ObservationRecord = { ...record };
    for (const column of accepted) {
      next[column] = data.get(column)?.[row] ?? null;
    }
    return next;
  });

  report.outputRows = cleaned.length;
  logger.debug('Series cleaned', {
    inputRows: report.inputRows,
    outputRows: report.outputRows,
    filled: report.missingValuesFilled,
  });

  return { records: cleaned, report };
}
