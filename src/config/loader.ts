import fs from 'fs';
import { parse as parseYaml } from 'yaml';
import { tagCatalogConfigSchema } from './schema';
import type { ParserOptions, TagCatalogConfig } from '../shared/types';

export interface ConfigWarning {
  field: string;
  message: string;
}

/** Config with every field populated. */
export interface ResolvedTagCatalogConfig {
  parser: {
    emit_unnamed_group: boolean;
    reset_on_parse: boolean;
  };
}

export interface LoadConfigResult {
  config: ResolvedTagCatalogConfig;
  warnings: ConfigWarning[];
}

export const DEFAULT_CONFIG_PATH = '.tagcatalog.yml';

/** Values used when the file is absent or fields are omitted. */
export const CONFIG_DEFAULTS: ResolvedTagCatalogConfig = {
  parser: {
    emit_unnamed_group: false,
    reset_on_parse: true,
  },
};

/** Known keys per parent path, for "did you mean?" suggestions and stripping. */
const KNOWN_KEYS: Record<string, string[]> = {
  '': ['parser'],
  parser: ['emit_unnamed_group', 'reset_on_parse'],
};

/**
 * Load and validate a .tagcatalog.yml file.
 * Returns fully-populated config with defaults applied.
 *
 * - Missing file → defaults
 * - Empty file → defaults
 * - Invalid YAML → E501 warning + defaults
 * - Invalid values → E502 warning + field defaults
 * - Unknown keys → E502 warning with "did you mean?"
 */
export function loadTagCatalogConfig(filePath?: string): LoadConfigResult {
  const warnings: ConfigWarning[] = [];

  const resolvedPath = filePath ?? DEFAULT_CONFIG_PATH;
  let rawContent: string;

  try {
    rawContent = fs.readFileSync(resolvedPath, 'utf-8');
  } catch {
    // Absent config is the common case
    return { config: withDefaults({}), warnings };
  }

  if (!rawContent || rawContent.trim() === '') {
    return { config: withDefaults({}), warnings };
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(rawContent);
  } catch (err) {
    warnings.push({
      field: '_yaml',
      message: `E501: Invalid YAML syntax: ${err instanceof Error ? err.message : 'Unknown error'}. Using defaults.`,
    });
    return { config: withDefaults({}), warnings };
  }

  // Comment-only documents parse to null
  if (parsed === null || parsed === undefined) {
    return { config: withDefaults({}), warnings };
  }

  if (!isRecord(parsed)) {
    warnings.push({
      field: '_yaml',
      message: 'E501: Config must be a YAML mapping. Using defaults.',
    });
    return { config: withDefaults({}), warnings };
  }

  const result = tagCatalogConfigSchema.safeParse(parsed);
  if (result.success) {
    return { config: withDefaults(result.data), warnings };
  }

  const cleaned = stripUnknownKeys(parsed, '');
  for (const issue of result.error.issues) {
    const fieldPath = issue.path.join('.');
    if (issue.code === 'unrecognized_keys') {
      for (const key of issue.keys) {
        const suggestion = findSimilarKey(key, fieldPath);
        const msg = suggestion
          ? `E502: Unknown key "${key}". Did you mean "${suggestion}"?`
          : `E502: Unknown key "${key}".`;
        warnings.push({ field: fieldPath ? `${fieldPath}.${key}` : key, message: msg });
      }
    } else {
      warnings.push({
        field: fieldPath || '_unknown',
        message: `E502: ${issue.message}. Using default for this field.`,
      });
      dropPath(cleaned, issue.path);
    }
  }

  const retryResult = tagCatalogConfigSchema.safeParse(cleaned);
  if (retryResult.success) {
    return { config: withDefaults(retryResult.data), warnings };
  }

  return { config: withDefaults({}), warnings };
}

/** Map the file's snake_case parser section onto constructor options. */
export function toParserOptions(config: ResolvedTagCatalogConfig): ParserOptions {
  return {
    emitUnnamedGroup: config.parser.emit_unnamed_group,
    resetOnParse: config.parser.reset_on_parse,
  };
}

function withDefaults(input: TagCatalogConfig): ResolvedTagCatalogConfig {
  return {
    parser: {
      emit_unnamed_group: input.parser?.emit_unnamed_group ?? CONFIG_DEFAULTS.parser.emit_unnamed_group,
      reset_on_parse: input.parser?.reset_on_parse ?? CONFIG_DEFAULTS.parser.reset_on_parse,
    },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function findSimilarKey(key: string, parentPath: string): string | null {
  const lower = key.toLowerCase();
  for (const known of KNOWN_KEYS[parentPath] ?? []) {
    if (levenshtein(lower, known) <= 3) {
      return known;
    }
  }
  return null;
}

function levenshtein(a: string, b: string): number {
  const m = a.length;
  const n = b.length;
  const dp: number[][] = Array.from({ length: m + 1 }, () => new Array<number>(n + 1).fill(0));

  for (let i = 0; i <= m; i++) dp[i][0] = i;
  for (let j = 0; j <= n; j++) dp[0][j] = j;

  for (let i = 1; i <= m; i++) {
    for (let j = 1; j <= n; j++) {
      dp[i][j] =
        a[i - 1] === b[j - 1]
          ? dp[i - 1][j - 1]
          : 1 + Math.min(dp[i - 1][j], dp[i][j - 1], dp[i - 1][j - 1]);
    }
  }

  return dp[m][n];
}

/** Copy `obj` keeping only known keys, recursing into known sections. */
function stripUnknownKeys(obj: Record<string, unknown>, parentPath: string): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const key of KNOWN_KEYS[parentPath] ?? []) {
    if (!(key in obj)) continue;
    const value = obj[key];
    const childPath = parentPath ? `${parentPath}.${key}` : key;
    result[key] = isRecord(value) && childPath in KNOWN_KEYS ? stripUnknownKeys(value, childPath) : value;
  }
  return result;
}

function dropPath(obj: Record<string, unknown>, path: ReadonlyArray<string | number>): void {
  if (path.length === 0) return;
  let target: unknown = obj;
  for (const key of path.slice(0, -1)) {
    if (!isRecord(target)) return;
    target = target[String(key)];
  }
  if (isRecord(target)) {
    delete target[String(path[path.length - 1])];
  }
}
