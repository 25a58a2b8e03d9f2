import path from 'path';
import type { AppConfig } from './config';
import type { ObservationRecord } from './types';
import type { AnalysisReport, IngestReport } from './types/detection';
import { DetectionFilter } from './detection/detector';
import { cleanSeries } from './analysis/cleaner';
import { computeMovements } from './analysis/movement';
import { summarizeDay } from './analysis/activity';
import { analyzeFeatures } from './analysis/features';
import { computePeriodStatistics, type PeriodStatistics } from './analysis/period';
import type { ScalerRegistry } from './analysis/normalization';
import { ObservationLog } from './persistence/observation-log';
import { SummaryStore } from './persistence/summary-store';
import { readCycles } from './persistence/cycle-reader';
import type { Diagnostic } from './utils/errors';
import { getLogger } from './utils/logger';

const logger = getLogger('pipeline');

export const REPORT_VERSION = '1.0.0';

export interface RunOptions {
  dryRun?: boolean;
  /** 複数日をまとめて解析するときに正規化パラメータを共有する */
  scalers?: ScalerRegistry;
}

export interface AnalysisRunResult {
  report: AnalysisReport;
  files: string[];
}

export interface PeriodRunResult {
  statistics: PeriodStatistics;
  diagnostics: Diagnostic[];
}

/**
 * 観察サイクル（JSON Lines）を検出フィルタに通し、日別の観察ログへ追記する。
 * 壊れた行・検出は診断として返し、処理は止めない。
 */
export async function ingestCycles(inputFile: string, config: AppConfig, options: RunOptions = {}): Promise<IngestReport> {
  const { cycles, diagnostics } = await readCycles(inputFile);
  const filter = new DetectionFilter(config);
  const processed = filter.processCycles(cycles);

  const files = options.dryRun ? [] : await new ObservationLog(config.logDir).append(processed.records);

  return {
    inputFile: path.resolve(inputFile),
    cycles: cycles.length,
    recordsWritten: options.dryRun ? 0 : processed.records.length,
    files,
    filterStatistics: filter.getStatistics(),
    diagnostics: [...diagnostics, ...processed.diagnostics],
  };
}

/**
 * 1日分のレコードをクリーニングし、移動量・活動指標・時間別/日別の集計と特徴量を作る。
 * I/O は行わない。
 */
export function analyzeRecords(
  date: string,
  records: readonly ObservationRecord[],
  config: AppConfig,
  scalers?: ScalerRegistry
): AnalysisReport {
  const cleaning = cleanSeries(records, config.cleaning.columns, config.cleaning, scalers);
  const movements = computeMovements(cleaning.records, config);
  const daily = summarizeDay(date, cleaning.records, config);

  const diagnostics: Diagnostic[] = [...cleaning.report.diagnostics];
  if (cleaning.records.length === 0) {
    diagnostics.push({
      kind: 'insufficient-data',
      message: `No observations recorded for ${date}`,
      context: { date },
    });
  } else if (daily.metrics.totalDetections === 0) {
    diagnostics.push({
      kind: 'insufficient-data',
      message: `No detections recorded for ${date}`,
      context: { date, observations: cleaning.records.length },
    });
  }

  return {
    version: REPORT_VERSION,
    date,
    createdAt: new Date().toISOString(),
    statistics: {
      inputRecords: records.length,
      cleanedRecords: cleaning.records.length,
      movementSamples: movements.samples.length,
      rejectedMovements: movements.rejected.length,
    },
    cleaning: cleaning.report,
    movements: movements.samples.map((sample, index) => ({ ...sample, distance: movements.distances[index] })),
    metrics: daily.metrics,
    daily,
    features: analyzeFeatures(cleaning.records, cleaning.report.columns, config),
    diagnostics,
  };
}

/**
 * 保存済みの観察ログから日次解析を行い、集計ファイルを書き出す。
 * すべて計算し終えてから書く。書き込みの途中で失敗した場合も中途半端な集計は残さない。
 */
export async function runDailyAnalysis(
  date: string,
  config: AppConfig,
  options: RunOptions = {}
): Promise<AnalysisRunResult> {
  const log = new ObservationLog(config.logDir);
  const { records, diagnostics } = await log.read(date);

  const report = analyzeRecords(date, records, config, options.scalers);
  report.diagnostics.unshift(...diagnostics);

  if (options.dryRun) {
    return { report, files: [] };
  }

  const files = await new SummaryStore(config.logDir).saveDay(report.daily);
  logger.info(`Daily analysis written for ${date}`, { records: records.length, files: files.length });

  return { report, files };
}

export function storedDates(config: AppConfig): string[] {
  return new ObservationLog(config.logDir).listDates();
}

/** 保存済みの日次サマリーから期間統計を出す。from / to は YYYY-MM-DD（両端含む）。 */
export async function summarizePeriod(config: AppConfig, range: { from?: string; to?: string } = {}): Promise<PeriodRunResult> {
  const { summaries, diagnostics } = await new SummaryStore(config.logDir).readDaily();
  const selected = summaries.filter(
    summary => (!range.from || summary.date >= range.from) && (!range.to || summary.date <= range.to)
  );
  return { statistics: computePeriodStatistics(selected), diagnostics };
}
