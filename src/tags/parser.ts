/**
 * Group parser for line-oriented tag catalogs.
 *
 * Catalog syntax:
 *
 *   # full-line comment
 *   [Group Name]      # inline comments are stripped everywhere
 *   one tag per line, kept verbatim
 *
 * Lines before the first header are orphan tags and are dropped.
 */

import fs from 'fs';
import { createLogger } from '../shared/logger';
import {
  CatalogIoError,
  MalformedHeaderError,
  type Group,
  type ParseResult,
  type ParserOptions,
} from '../shared/types';

const log = createLogger({ module: 'tags/parser' });

const LINE_BREAK = /\r\n|\r|\n/;
const COMMENT_CHAR = '#';
const HEADER_OPEN = '[';
const HEADER_CLOSE = ']';

interface ParseStats {
  orphans: number;
}

/** Remove an inline comment and surrounding whitespace. */
function stripComment(line: string): string {
  const hash = line.indexOf(COMMENT_CHAR);
  return (hash === -1 ? line : line.slice(0, hash)).trim();
}

function copyGroup(group: Group): Group {
  return { name: group.name, tags: [...group.tags] };
}

/**
 * Parse catalog text into groups.
 * Throws MalformedHeaderError when a header line has no closing bracket.
 */
export function parseGroups(text: string, options: ParserOptions = {}): ParseResult {
  return parseWithStats(text, options, { orphans: 0 });
}

function parseWithStats(text: string, options: ParserOptions, stats: ParseStats): ParseResult {
  const groups: ParseResult = [];
  let current: Group = { name: '', tags: [] };

  const lines = text.split(LINE_BREAK);
  for (let i = 0; i < lines.length; i++) {
    const trimmed = lines[i].trim();
    if (trimmed === '' || trimmed.startsWith(COMMENT_CHAR)) continue;

    const line = stripComment(trimmed);

    if (line.startsWith(HEADER_OPEN)) {
      if (!line.endsWith(HEADER_CLOSE)) {
        log.warn({ line: i + 1, raw: lines[i] }, 'Malformed group header');
        throw new MalformedHeaderError(i + 1, lines[i]);
      }
      if (current.name !== '') {
        groups.push(current);
        current = { name: '', tags: [] };
      }
      current.name = line.slice(1, -1).trim();
      continue;
    }

    if (current.name === '') {
      log.debug({ line: i + 1, raw: lines[i] }, 'Discarded orphan tag line');
      stats.orphans++;
      continue;
    }
    current.tags.push(line);
  }

  if (current.name !== '' || options.emitUnnamedGroup) {
    groups.push(current);
  }

  return groups;
}

/**
 * Holds a catalog's text and the groups parsed from it.
 *
 * `fromText` parses eagerly; `fromPath` only reads the file, so call
 * `parse()` before `groups()`.
 */
export class GroupParser {
  private readonly source: string;
  private readonly options: Required<ParserOptions>;
  private parsed: ParseResult = [];

  private constructor(source: string, options: ParserOptions) {
    this.source = source;
    this.options = {
      emitUnnamedGroup: options.emitUnnamedGroup ?? false,
      resetOnParse: options.resetOnParse ?? true,
    };
  }

  /** Read a catalog file. Throws CatalogIoError if it cannot be read. */
  static fromPath(filePath: string, options: ParserOptions = {}): GroupParser {
    let content: string;
    try {
      content = fs.readFileSync(filePath, 'utf8');
    } catch (err) {
      throw new CatalogIoError(filePath, err instanceof Error ? err : undefined);
    }
    log.debug({ path: filePath, bytes: content.length }, 'Loaded tag catalog');
    return new GroupParser(content, options);
  }

  static fromText(text: string, options: ParserOptions = {}): GroupParser {
    const parser = new GroupParser(text, options);
    parser.parse();
    return parser;
  }

  get text(): string {
    return this.source;
  }

  /**
   * Parse the buffer. Replaces earlier results unless `resetOnParse` is off,
   * in which case each call appends another copy of the groups.
   * On error the stored groups are left as they were.
   */
  parse(): void {
    const stats: ParseStats = { orphans: 0 };
    const groups = parseWithStats(this.source, this.options, stats);
    this.parsed = this.options.resetOnParse ? groups : [...this.parsed, ...groups];
    log.debug({ groups: groups.length, orphans: stats.orphans }, 'Parsed tag catalog');
  }

  /** Copies of the parsed groups; changing them does not touch the parser. */
  groups(): Group[] {
    return this.parsed.map(copyGroup);
  }

  /** First group with exactly this name. */
  group(name: string): Group | undefined {
    const found = this.parsed.find((g) => g.name === name);
    return found && copyGroup(found);
  }
}
