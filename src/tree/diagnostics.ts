/**
 * Diagnostics (errors/warnings) produced by loading, parsing and querying.
 *
 * Queries degrade instead of throwing, so everything a caller may want to
 * inspect afterwards is carried here:
 * - `code`: stable identifier for programmatic handling.
 * - `message`: human-readable description.
 * - `line`: ordinal of the config line involved (when applicable).
 */
export type DiagnosticSeverity = 'error' | 'warning';

export type DiagnosticCode =
  | 'PATTERN_COMPILE'
  | 'AMBIGUOUS_MATCH'
  | 'AMBIGUOUS_CHILD_MATCH'
  | 'NO_VALID_CONFIG';

export interface Diagnostic {
  severity: DiagnosticSeverity;
  code: DiagnosticCode;
  message: string;
  line?: number;
}

export function errorDiagnostic(
  code: DiagnosticCode,
  message: string,
  line?: number
): Diagnostic {
  return { severity: 'error', code, message, line };
}

export function warningDiagnostic(
  code: DiagnosticCode,
  message: string,
  line?: number
): Diagnostic {
  return { severity: 'warning', code, message, line };
}

/**
 * A (possibly empty or partial) value plus whatever degraded while computing it.
 */
export interface QueryOutcome<T> {
  value: T;
  errors: Diagnostic[];
  warnings: Diagnostic[];
}

export function outcome<T>(value: T, diagnostics: Diagnostic[] = []): QueryOutcome<T> {
  return {
    value,
    errors: diagnostics.filter((d) => d.severity === 'error'),
    warnings: diagnostics.filter((d) => d.severity === 'warning'),
  };
}

export type LoadErrorCode = 'LOAD_NOT_FOUND' | 'LOAD_NOT_A_FILE' | 'LOAD_UNREADABLE';

/**
 * Raised by the text loader. This is the only failure the core throws.
 */
export class LoadError extends Error {
  readonly code: LoadErrorCode;
  readonly path: string;

  constructor(code: LoadErrorCode, path: string, message: string) {
    super(message);
    this.name = 'LoadError';
    this.code = code;
    this.path = path;
  }
}

export function formatDiagnostic(d: Diagnostic): string {
  return `${d.code}${d.line !== undefined ? `@${d.line}` : ''}: ${d.message}`;
}
