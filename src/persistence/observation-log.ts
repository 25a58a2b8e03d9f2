import path from 'path';
import { z } from 'zod';
import type { ObservationRecord } from '../types';
import { type Diagnostic, PersistenceError, ValidationError, diagnosticFromValidation } from '../utils/errors';
import { appendText, ensureDirectoryExists, fileExists, listFiles, readText } from '../utils/file';
import { getLogger } from '../utils/logger';
import { isValidTimestamp, localDate } from '../utils/timestamp';
import {
  type CsvRow,
  booleanCell,
  formatFloat,
  formatInteger,
  integerCell,
  nullableFloatCell,
  parseCsv,
  stringifyCsv,
} from './csv';

const logger = getLogger('observation-log');

export const OBSERVATION_COLUMNS = [
  'timestamp',
  'sequence',
  'detectionCount',
  'hasDetection',
  'xCenter',
  'yCenter',
  'meanConfidence',
  'maxConfidence',
  'bboxArea',
  'qualityScore',
  'processingTimeMs',
] as const satisfies readonly (keyof ObservationRecord)[];

const OBSERVATION_FILE = /^observations_(\d{4}-\d{2}-\d{2})\.csv$/;

const observationRowSchema = z.object({
  timestamp: z.string().refine(isValidTimestamp, 'invalid timestamp'),
  sequence: integerCell,
  detectionCount: integerCell,
  hasDetection: booleanCell,
  xCenter: nullableFloatCell,
  yCenter: nullableFloatCell,
  meanConfidence: nullableFloatCell,
  maxConfidence: nullableFloatCell,
  bboxArea: nullableFloatCell,
  qualityScore: nullableFloatCell,
  processingTimeMs: nullableFloatCell,
});

export interface ObservationReadResult {
  records: ObservationRecord[];
  diagnostics: Diagnostic[];
}

export function observationFileName(date: string): string {
  return `observations_${date}.csv`;
}

export function toObservationRow(record: ObservationRecord): CsvRow {
  return {
    timestamp: record.timestamp,
    sequence: formatInteger(record.sequence),
    detectionCount: formatInteger(record.detectionCount),
    hasDetection: String(record.hasDetection),
    xCenter: formatFloat(record.xCenter),
    yCenter: formatFloat(record.yCenter),
    meanConfidence: formatFloat(record.meanConfidence),
    maxConfidence: formatFloat(record.maxConfidence),
    bboxArea: formatFloat(record.bboxArea),
    qualityScore: formatFloat(record.qualityScore),
    processingTimeMs: formatFloat(record.processingTimeMs),
  };
}

/**
 * 1日1ファイルの観察ログ (observations_YYYY-MM-DD.csv)。
 * 日付はタイムスタンプ自身の時差での日付。
 */
export class ObservationLog {
  constructor(private readonly logDir: string) {}

  filePath(date: string): string {
    return path.join(this.logDir, observationFileName(date));
  }

  /** 日付ごとに追記する。新規ファイルにはヘッダーを付ける。書いたファイルのパスを返す。 */
  async append(records: readonly ObservationRecord[]): Promise<string[]> {
    const byDate = new Map<string, ObservationRecord[]>();
    for (const record of records) {
      const date = localDate(record.timestamp);
      const bucket = byDate.get(date);
      if (bucket) {
        bucket.push(record);
      } else {
        byDate.set(date, [record]);
      }
    }

    await ensureDirectoryExists(this.logDir);

    const written: string[] = [];
    for (const [date, bucket] of [...byDate].sort(([a], [b]) => a.localeCompare(b))) {
      const filePath = this.filePath(date);
      const isNew = !(await fileExists(filePath));
      await appendText(filePath, stringifyCsv(OBSERVATION_COLUMNS, bucket.map(toObservationRow), isNew));
      logger.debug(`Appended ${bucket.length} rows`, { file: filePath });
      written.push(filePath);
    }
    return written;
  }

  /**
   * 指定日のログを読む。壊れた行は ValidationError の診断にしてスキップする。
   * ファイルが無い日は空の結果。
   */
  async read(date: string): Promise<ObservationReadResult> {
    const filePath = this.filePath(date);
    if (!(await fileExists(filePath))) {
      return { records: [], diagnostics: [] };
    }

    const content = await readText(filePath);
    let rows: unknown[];
    try {
      rows = parseCsv(content);
    } catch (error) {
      throw new PersistenceError('Could not parse observation log', filePath, error);
    }

    const records: ObservationRecord[] = [];
    const diagnostics: Diagnostic[] = [];

    rows.forEach((row, index) => {
      const parsed = observationRowSchema.safeParse(row);
      if (parsed.success) {
        records.push(parsed.data);
        return;
      }
      // ヘッダーの次が 2 行目
      const line = index + 2;
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      diagnostics.push(
        diagnosticFromValidation(
          new ValidationError(`Malformed observation row at line ${line}`, { file: filePath, line, issues })
        )
      );
    });

    if (diagnostics.length > 0) {
      logger.warn(`Skipped ${diagnostics.length} malformed rows`, { file: filePath });
    }

    return { records, diagnostics };
  }

  /** 保存済みの日付（昇順） */
  listDates(): string[] {
    return listFiles(this.logDir, 'observations_*.csv').flatMap(name => {
      const match = OBSERVATION_FILE.exec(name);
      return match ? [match[1]] : [];
    });
  }
}
