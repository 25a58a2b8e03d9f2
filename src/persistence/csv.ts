import { parse } from 'csv-parse/sync';
import { createObjectCsvStringifier } from 'csv-writer';
import { z } from 'zod';

export const FLOAT_PRECISION = 4;

export type CsvCell = string | number;
export type CsvRow = Record<string, CsvCell>;

/** 浮動小数点は固定桁、null は空欄（0 とは書かない） */
export function formatFloat(value: number | null): string {
  return value === null ? '' : value.toFixed(FLOAT_PRECISION);
}

export function formatInteger(value: number | null): string {
  return value === null ? '' : String(Math.round(value));
}

export function stringifyCsv(columns: readonly string[], rows: readonly CsvRow[], withHeader: boolean): string {
  const stringifier = createObjectCsvStringifier({
    header: columns.map(column => ({ id: column, title: column })),
  });

  const header = withHeader ? stringifier.getHeaderString() ?? '' : '';
  return header + stringifier.stringifyRecords([...rows]);
}

/** ヘッダー付き CSV を行オブジェクトの配列として読む。列数の不一致は行の検証に任せる。 */
export function parseCsv(content: string): unknown[] {
  const rows: unknown = parse(content, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
  });
  return Array.isArray(rows) ? rows : [];
}

// セル単位のスキーマ

export const nullableFloatCell = z.string().transform((value, ctx) => {
  if (value === '') return null;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a number: "${value}"` });
    return z.NEVER;
  }
  return parsed;
});

export const floatCell = z.string().transform((value, ctx) => {
  const parsed = Number(value);
  if (value === '' || !Number.isFinite(parsed)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a number: "${value}"` });
    return z.NEVER;
  }
  return parsed;
});

export const integerCell = z
  .string()
  .regex(/^-?\d+$/, 'not an integer')
  .transform(value => Number.parseInt(value, 10));

export const booleanCell = z.enum(['true', 'false']).transform(value => value === 'true');
