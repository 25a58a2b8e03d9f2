import { addMinutes, differenceInMilliseconds, isValid, parseISO } from 'date-fns';

// 時差の指定は必須（ホストのタイムゾーンでは解釈しない）
const ISO_DATETIME = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(Z|[+-]\d{2}:?\d{2})$/;

function offsetMinutes(designator: string): number {
  if (designator === 'Z') return 0;
  const sign = designator.startsWith('-') ? -1 : 1;
  const digits = designator.slice(1).replace(':', '');
  return sign * (Number.parseInt(digits.slice(0, 2), 10) * 60 + Number.parseInt(digits.slice(2), 10));
}

/**
 * 記録された時差での壁時計を UTC フィールドに載せた Date。
 * T24:00 のような表記も瞬間に直してから読むので、翌日 0 時になる。
 */
function wallClock(timestamp: string): Date {
  const match = ISO_DATETIME.exec(timestamp);
  const instant = parseISO(timestamp);
  if (!match || !isValid(instant)) {
    throw new RangeError(`Invalid timestamp: ${timestamp}`);
  }
  return addMinutes(instant, offsetMinutes(match[1]));
}

export function isValidTimestamp(value: string): boolean {
  return ISO_DATETIME.test(value) && isValid(parseISO(value));
}

export function toEpochMs(timestamp: string): number {
  return parseISO(timestamp).getTime();
}

export function elapsedMinutes(from: string, to: string): number {
  return differenceInMilliseconds(parseISO(to), parseISO(from)) / 60_000;
}

/** タイムスタンプ自身の時差での日付 (YYYY-MM-DD) */
export function localDate(timestamp: string): string {
  return wallClock(timestamp).toISOString().slice(0, 10);
}

/** タイムスタンプ自身の時差での時 (0-23) */
export function localHour(timestamp: string): number {
  return wallClock(timestamp).getUTCHours();
}

/** タイムスタンプ自身の時差での壁時計を 1970-01-01T00:00 からの分で表したもの */
export function wallClockMinutes(timestamp: string): number {
  return Math.floor(wallClock(timestamp).getTime() / 60_000);
}

/** wallClockMinutes の逆変換（YYYY-MM-DDTHH:mm） */
export function formatWallClockMinutes(minutes: number): string {
  return new Date(minutes * 60_000).toISOString().slice(0, 16);
}
