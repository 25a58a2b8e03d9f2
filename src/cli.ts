import { Command, InvalidArgumentError } from 'commander';
import { isLogLevel, type LogLevel } from './utils/logger';

export type GlobalOptions = {
  config?: string;
  logDir?: string;
  logLevel?: LogLevel;
};

export interface IngestOptions {
  dryRun: boolean;
}

export interface AnalyzeOptions {
  all: boolean;
  dryRun: boolean;
  json?: string;
}

export interface ReportOptions {
  from?: string;
  to?: string;
  json?: string;
}

export interface CommandHandlers {
  ingest(input: string, options: IngestOptions, global: GlobalOptions): Promise<void>;
  analyze(date: string | undefined, options: AnalyzeOptions, global: GlobalOptions): Promise<void>;
  report(options: ReportOptions, global: GlobalOptions): Promise<void>;
  config(global: GlobalOptions): Promise<void>;
}

function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError('Log level must be one of debug, info, warn, error');
  }
  return value;
}

function parseDate(value: string): string {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    throw new InvalidArgumentError('Date must be in YYYY-MM-DD format');
  }
  return value;
}

export function createCLI(handlers: CommandHandlers): Command {
  const program = new Command();

  program
    .name('insect-activity')
    .description('Filter insect detections, clean observation logs and summarize activity')
    .version('1.0.0')
    .option('-c, --config <path>', 'Configuration file (JSON)')
    .option('--log-dir <path>', 'Directory for observation logs and summaries')
    .option('--log-level <level>', 'Log level (debug, info, warn, error)', parseLogLevel);

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();

  program
    .command('ingest')
    .description('Filter observation cycles (JSON Lines) and append them to the daily observation logs')
    .argument('<input>', 'Input file with one observation cycle per line')
    .option('--dry-run', 'Filter and report without writing observation logs', false)
    .action(async (input: string, options: IngestOptions) => {
      await handlers.ingest(input, options, globals());
    });

  program
    .command('analyze')
    .description('Clean one day of observations and write hourly and daily summaries')
    .argument('[date]', 'Date to analyze (YYYY-MM-DD, default: today)', parseDate)
    .option('--all', 'Analyze every date with a stored observation log', false)
    .option('--json <path>', 'Write the full analysis report as JSON')
    .option('--dry-run', 'Analyze without writing summary files', false)
    .action(async (date: string | undefined, options: AnalyzeOptions) => {
      await handlers.analyze(date, options, globals());
    });

  program
    .command('report')
    .description('Show statistics over the stored daily summaries')
    .option('--from <date>', 'First date to include (YYYY-MM-DD)', parseDate)
    .option('--to <date>', 'Last date to include (YYYY-MM-DD)', parseDate)
    .option('--json <path>', 'Write the period statistics as JSON')
    .action(async (options: ReportOptions) => {
      await handlers.report(options, globals());
    });

  program
    .command('config')
    .description('Validate the configuration and print the resolved values')
    .action(async () => {
      await handlers.config(globals());
    });

  return program;
}
