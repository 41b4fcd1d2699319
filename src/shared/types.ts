// === Catalog Model ===

/** A named section of the catalog and the tag lines declared under it. */
export interface Group {
  name: string;
  /** Verbatim, comment-stripped lines in source order. Duplicates are kept. */
  tags: string[];
}

/** Groups in the order their headers appear in the source text. */
export type ParseResult = Group[];

export interface ParserOptions {
  /**
   * Append the final accumulator even when no header was ever seen, producing
   * a group with an empty name. Off by default.
   */
  emitUnnamedGroup?: boolean;
  /** Clear previously parsed groups at the start of every `parse()` call. */
  resetOnParse?: boolean;
}

// === Catalog Config (.tagcatalog.yml) ===

export interface TagCatalogConfig {
  parser?: {
    emit_unnamed_group?: boolean;
    reset_on_parse?: boolean;
  };
}

export interface EnvConfig {
  log_level: 'debug' | 'info' | 'warn' | 'error' | 'silent';
}

// === Error Type ===

export type ErrorSeverity = 'critical' | 'high' | 'medium' | 'low';

export interface ErrorContext {
  path?: string;
  /** 1-based line number in the catalog text. */
  line?: number;
  raw?: string;
}

export class TagCatalogError extends Error {
  readonly code: string;
  readonly severity: ErrorSeverity;
  readonly context: ErrorContext;
  readonly cause?: Error;
  readonly timestamp: string;

  constructor(opts: {
    code: string;
    severity: ErrorSeverity;
    message: string;
    context?: ErrorContext;
    cause?: Error;
  }) {
    super(opts.message);
    this.name = 'TagCatalogError';
    this.code = opts.code;
    this.severity = opts.severity;
    this.context = opts.context ?? {};
    this.cause = opts.cause;
    this.timestamp = new Date().toISOString();
  }
}

/** A line starting with `[` that has no closing `]` once its comment is stripped. */
export class MalformedHeaderError extends TagCatalogError {
  constructor(line: number, raw: string) {
    super({
      code: 'TAGCATALOG_E101',
      severity: 'medium',
      message: `Malformed group header on line ${line}: missing closing "]" in "${raw}"`,
      context: { line, raw },
    });
    this.name = 'MalformedHeaderError';
  }
}

export class CatalogIoError extends TagCatalogError {
  constructor(path: string, cause?: Error) {
    super({
      code: 'TAGCATALOG_E201',
      severity: 'high',
      message: `Failed to read tag catalog "${path}": ${cause?.message ?? 'unknown error'}`,
      context: { path },
      cause,
    });
    this.name = 'CatalogIoError';
  }
}

export class ConfigError extends TagCatalogError {
  constructor(message: string) {
    super({ code: 'TAGCATALOG_E301', severity: 'critical', message });
    this.name = 'ConfigError';
  }
}
