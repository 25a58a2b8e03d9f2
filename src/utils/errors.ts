export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'PERSISTENCE_ERROR';

export class ActivityAnalyzerError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** 個々の検出・レコードの不正。スキップして処理は継続する。 */
export class ValidationError extends ActivityAnalyzerError {
  readonly context: Record<string, unknown>;

  constructor(message: string, context: Record<string, unknown> = {}) {
    super('VALIDATION_ERROR', message);
    this.context = context;
  }
}

export class ConfigurationError extends ActivityAnalyzerError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('CONFIGURATION_ERROR', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.issues = issues;
  }
}

export class PersistenceError extends ActivityAnalyzerError {
  readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super('PERSISTENCE_ERROR', `${message}: ${path}`, { cause });
    this.path = path;
  }
}

export type DiagnosticKind = 'validation' | 'missing-column' | 'insufficient-data';

export interface Diagnostic {
  kind: DiagnosticKind;
  message: string;
  context?: Record<string, unknown>;
}

export function diagnosticFromValidation(error: ValidationError): Diagnostic {
  return { kind: 'validation', message: error.message, context: error.context };
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
