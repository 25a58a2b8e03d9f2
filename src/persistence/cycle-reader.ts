import { z } from 'zod';
import type { ObservationCycle } from '../types/detection';
import { type Diagnostic, ValidationError, describeError, diagnosticFromValidation } from '../utils/errors';
import { readText } from '../utils/file';

// 範囲チェックは検出フィルタ側で行うので、ここでは数値であることだけ確かめる
const detectionSchema = z.object({
  xCenter: z.number(),
  yCenter: z.number(),
  width: z.number(),
  height: z.number(),
  confidence: z.number(),
  classId: z.union([z.string(), z.number()]).transform(value => String(value)),
});

export const observationCycleSchema = z.object({
  timestamp: z.string(),
  sequence: z.number().int().nonnegative().optional(),
  detectionCount: z.number().int().nonnegative().optional(),
  detected: z.boolean().optional(),
  detections: z.array(detectionSchema).default([]),
  processingTimeMs: z.number().nonnegative().nullable().optional(),
});

export interface CycleReadResult {
  cycles: ObservationCycle[];
  diagnostics: Diagnostic[];
}

function invalidLine(message: string, line: number, detail: Record<string, unknown>): Diagnostic {
  return diagnosticFromValidation(new ValidationError(`${message} at line ${line}`, { line, ...detail }));
}

/** JSON Lines 形式の観察サイクルを解釈する。読めない行は診断にして読み飛ばす。 */
export function parseCycles(content: string): CycleReadResult {
  const cycles: ObservationCycle[] = [];
  const diagnostics: Diagnostic[] = [];

  content.split(/\r?\n/).forEach((text, index) => {
    const line = index + 1;
    if (text.trim() === '') return;

    let value: unknown;
    try {
      value = JSON.parse(text);
    } catch (error) {
      diagnostics.push(invalidLine('Invalid JSON', line, { error: describeError(error) }));
      return;
    }

    const parsed = observationCycleSchema.safeParse(value);
    if (parsed.success) {
      cycles.push(parsed.data);
    } else {
      diagnostics.push(
        invalidLine('Malformed observation cycle', line, {
          issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
        })
      );
    }
  });

  return { cycles, diagnostics };
}

export async function readCycles(filePath: string): Promise<CycleReadResult> {
  return parseCycles(await readText(filePath));
}
