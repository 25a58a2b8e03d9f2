import path from 'path';
import { z } from 'zod';
import type { DailySummary, DailySummaryRecord, HourlySummary, MovementPattern } from '../types';
import {
  type Diagnostic,
  PersistenceError,
  ValidationError,
  describeError,
  diagnosticFromValidation,
} from '../utils/errors';
import { fileExists, readText, removeFile, writeFileAtomic } from '../utils/file';
import { getLogger } from '../utils/logger';
import {
  type CsvRow,
  floatCell,
  formatFloat,
  formatInteger,
  integerCell,
  nullableFloatCell,
  parseCsv,
  stringifyCsv,
} from './csv';

const logger = getLogger('summary-store');

export const DAILY_SUMMARY_FILE = 'daily_summary.csv';

export const HOURLY_COLUMNS = [
  'date',
  'hour',
  'observationCount',
  'detectionCount',
  'movementDistance',
  'averageConfidence',
  'activityLevel',
] as const satisfies readonly (keyof HourlySummary)[];

export const DAILY_COLUMNS = [
  'date',
  'observationCount',
  'activeHours',
  'totalDetections',
  'totalMovementDistance',
  'averageMovementPerDetection',
  'peakActivityHour',
  'activeDurationMinutes',
  'detectionReliability',
  'dataCompletenessRatio',
  'activityScore',
  'meanDistance',
  'stdDistance',
  'maxDistance',
  'nonZeroMovements',
  'movementPatterns',
] as const;

const PATTERN_SEPARATOR = '|';

const MOVEMENT_PATTERNS = [
  'no_activity',
  'insufficient_data',
  'low_mobility',
  'moderate_mobility',
  'high_mobility',
  'consistent_movement',
  'variable_movement',
  'erratic_movement',
  'continuous_activity',
  'intermittent_activity',
  'sporadic_activity',
  'diurnal',
  'nocturnal',
  'crepuscular',
] as const satisfies readonly MovementPattern[];

const movementPatternSchema = z.enum(MOVEMENT_PATTERNS);

const patternsCell = z
  .string()
  .transform(value => (value === '' ? [] : value.split(PATTERN_SEPARATOR)))
  .pipe(z.array(movementPatternSchema));

const dailyRowSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'invalid date'),
  observationCount: integerCell,
  activeHours: integerCell,
  totalDetections: integerCell,
  totalMovementDistance: floatCell,
  averageMovementPerDetection: floatCell,
  peakActivityHour: integerCell,
  activeDurationMinutes: floatCell,
  detectionReliability: floatCell,
  dataCompletenessRatio: floatCell,
  activityScore: floatCell,
  meanDistance: floatCell,
  stdDistance: floatCell,
  maxDistance: floatCell,
  nonZeroMovements: integerCell,
  movementPatterns: patternsCell,
});

export interface DailySummaryReadResult {
  summaries: DailySummaryRecord[];
  diagnostics: Diagnostic[];
}

export function hourlyFileName(date: string): string {
  return `hourly_${date}.csv`;
}

export function toHourlyRow(summary: HourlySummary): CsvRow {
  return {
    date: summary.date,
    hour: formatInteger(summary.hour),
    observationCount: formatInteger(summary.observationCount),
    detectionCount: formatInteger(summary.detectionCount),
    movementDistance: formatFloat(summary.movementDistance),
    averageConfidence: formatFloat(summary.averageConfidence),
    activityLevel: summary.activityLevel,
  };
}

export function toDailyRow(summary: DailySummaryRecord): CsvRow {
  const { metrics } = summary;
  return {
    date: summary.date,
    observationCount: formatInteger(summary.observationCount),
    activeHours: formatInteger(summary.activeHours),
    totalDetections: formatInteger(metrics.totalDetections),
    totalMovementDistance: formatFloat(metrics.totalMovementDistance),
    averageMovementPerDetection: formatFloat(metrics.averageMovementPerDetection),
    peakActivityHour: formatInteger(metrics.peakActivityHour),
    activeDurationMinutes: formatFloat(metrics.activeDurationMinutes),
    detectionReliability: formatFloat(metrics.detectionReliability),
    dataCompletenessRatio: formatFloat(metrics.dataCompletenessRatio),
    activityScore: formatFloat(metrics.activityScore),
    meanDistance: formatFloat(metrics.movementStatistics.meanDistance),
    stdDistance: formatFloat(metrics.movementStatistics.stdDistance),
    maxDistance: formatFloat(metrics.movementStatistics.maxDistance),
    nonZeroMovements: formatInteger(metrics.movementStatistics.nonZeroMovements),
    movementPatterns: metrics.movementPatterns.join(PATTERN_SEPARATOR),
  };
}

function fromDailyRow(row: z.infer<typeof dailyRowSchema>): DailySummaryRecord {
  return {
    date: row.date,
    observationCount: row.observationCount,
    activeHours: row.activeHours,
    metrics: {
      totalDetections: row.totalDetections,
      totalMovementDistance: row.totalMovementDistance,
      averageMovementPerDetection: row.averageMovementPerDetection,
      peakActivityHour: row.peakActivityHour,
      activeDurationMinutes: row.activeDurationMinutes,
      detectionReliability: row.detectionReliability,
      dataCompletenessRatio: row.dataCompletenessRatio,
      activityScore: row.activityScore,
      movementStatistics: {
        meanDistance: row.meanDistance,
        stdDistance: row.stdDistance,
        maxDistance: row.maxDistance,
        nonZeroMovements: row.nonZeroMovements,
      },
      movementPatterns: row.movementPatterns,
    },
  };
}

/**
 * 集計結果の保存先。
 * hourly_YYYY-MM-DD.csv（24行）と daily_summary.csv（日付ごと1行、日付で上書き）。
 */
export class SummaryStore {
  constructor(private readonly logDir: string) {}

  hourlyPath(date: string): string {
    return path.join(this.logDir, hourlyFileName(date));
  }

  dailyPath(): string {
    return path.join(this.logDir, DAILY_SUMMARY_FILE);
  }

  async readDaily(): Promise<DailySummaryReadResult> {
    const filePath = this.dailyPath();
    if (!(await fileExists(filePath))) {
      return { summaries: [], diagnostics: [] };
    }

    let rows: unknown[];
    try {
      rows = parseCsv(await readText(filePath));
    } catch (error) {
      if (error instanceof PersistenceError) throw error;
      throw new PersistenceError('Could not parse daily summary', filePath, error);
    }

    const summaries: DailySummaryRecord[] = [];
    const diagnostics: Diagnostic[] = [];
    rows.forEach((row, index) => {
      const parsed = dailyRowSchema.safeParse(row);
      if (parsed.success) {
        summaries.push(fromDailyRow(parsed.data));
      } else {
        const line = index + 2;
        diagnostics.push(
          diagnosticFromValidation(
            new ValidationError(`Malformed daily summary row at line ${line}`, {
              file: filePath,
              line,
              issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
            })
          )
        );
      }
    });

    return { summaries, diagnostics };
  }

  /**
   * 1日分の時間別ファイルと日次サマリーを書く。
   * 両方の内容を用意してから書き、日次サマリーの書き込みに失敗したら時間別ファイルを元に戻す。
   */
  async saveDay(summary: DailySummary): Promise<string[]> {
    const hourlyPath = this.hourlyPath(summary.date);
    const dailyPath = this.dailyPath();

    const hourlyContent = stringifyCsv(HOURLY_COLUMNS, summary.hourly.map(toHourlyRow), true);
    const dailyContent = await this.mergedDailyContent(summary);
    const previousHourly = (await fileExists(hourlyPath)) ? await readText(hourlyPath) : null;

    await writeFileAtomic(hourlyPath, hourlyContent);
    try {
      await writeFileAtomic(dailyPath, dailyContent);
    } catch (error) {
      await this.restoreHourly(hourlyPath, previousHourly).catch((rollbackError: unknown) => {
        logger.error('Could not roll back the hourly summary', { file: hourlyPath, error: describeError(rollbackError) });
      });
      throw error;
    }

    return [hourlyPath, dailyPath];
  }

  /** 同じ日付の行を置き換えた、日付順の daily_summary.csv の内容。壊れた行があれば書き直さない。 */
  private async mergedDailyContent(summary: DailySummaryRecord): Promise<string> {
    const { summaries, diagnostics } = await this.readDaily();
    if (diagnostics.length > 0) {
      throw new PersistenceError(
        `Daily summary has ${diagnostics.length} malformed rows (${diagnostics.map(d => d.message).join('; ')})`,
        this.dailyPath()
      );
    }

    const merged = new Map(summaries.map(existing => [existing.date, existing] as const));
    merged.set(summary.date, summary);
    const ordered = [...merged.values()].sort((a, b) => a.date.localeCompare(b.date));
    return stringifyCsv(DAILY_COLUMNS, ordered.map(toDailyRow), true);
  }

  private async restoreHourly(hourlyPath: string, previous: string | null): Promise<void> {
    if (previous === null) {
      await removeFile(hourlyPath);
    } else {
      await writeFileAtomic(hourlyPath, previous);
    }
  }
}
