import { Lexicon, loadLexicon } from './lexicon.js';

// -- Types ---

export type RegionKind =
  | 'code'
  | 'single'
  | 'double'
  | 'heredoc'
  | 'nowdoc'
  | 'line-comment'
  | 'block-comment'
  | 'html';

/**
 * A contiguous slice of the source, `[start, end)`. The regions of one scan
 * cover the whole text without gaps or overlaps.
 */
export interface SourceRegion {
  readonly kind: RegionKind;
  readonly start: number;
  readonly end: number;
}

export interface IdentifierToken {
  readonly name: string;
  readonly position: number;
}

export type StringKind = 'single' | 'double' | 'heredoc' | 'nowdoc';

export interface StringToken {
  readonly kind: StringKind;
  readonly content: string;
  readonly position: number;
  readonly length: number;
}

export interface CommentToken {
  readonly kind: 'line' | 'block';
  readonly content: string;
  readonly position: number;
  readonly length: number;
}

export interface TokenizedSource {
  readonly source: string;
  readonly regions: readonly SourceRegion[];
  /** `$name` tokens eligible for renaming, first occurrence of each. */
  readonly variables: readonly IdentifierToken[];
  /** Declared class properties (`public $name`); never renamed. */
  readonly properties: readonly string[];
  readonly functions: readonly IdentifierToken[];
  readonly classes: readonly IdentifierToken[];
  readonly strings: readonly StringToken[];
  readonly comments: readonly CommentToken[];
}

/**
 * Anything that can classify PHP source for the obfuscator. The bundled
 * implementation is regex based; a grammar-aware lexer can stand in for it.
 */
export interface SourceScanner {
  scan(source: string): TokenizedSource;
}

export interface CodeStatistics {
  readonly totalLines: number;
  readonly variableCount: number;
  readonly functionCount: number;
  readonly classCount: number;
  readonly stringCount: number;
  readonly commentCount: number;
  readonly codeSize: number;
  readonly codeSizeKb: number;
}

// -- Patterns ---

const IDENT = '[A-Za-z_\\u0080-\\uffff][A-Za-z0-9_\\u0080-\\uffff]*';

const OPEN_TAG = /<\?(?:php\b|=)/gi;
const PHP_TOKEN = /'|"|\/\/|#(?!\[)|\/\*|<<<|\?>/g;
const SINGLE_QUOTED = /'(?:[^'\\]|\\[\s\S])*'/y;
const DOUBLE_QUOTED = /"(?:[^"\\]|\\[\s\S])*"/y;
const LINE_COMMENT = /(?:\/\/|#)(?:[^\n?]|\?(?!>))*/y;
const HEREDOC =
  /<<<[ \t]*(["']?)([A-Za-z_][A-Za-z0-9_]*)\1\r?\n(?:[\s\S]*?\r?\n)?[ \t]*\2(?![A-Za-z0-9_])/y;

const VARIABLE = new RegExp(`\\$(${IDENT})`, 'g');
const PROPERTY_DECLARATION = new RegExp(
  `(?<![\\w$])(?:var|public|protected|private|static|readonly)\\s+(?:[?\\w\\\\|&]+\\s+)*\\$(${IDENT})`,
  'g',
);
const FUNCTION_DEFINITION = new RegExp(`\\bfunction\\s+&?\\s*(${IDENT})\\s*\\(`, 'g');
const CLASS_DEFINITION = new RegExp(
  `(?<!::\\s*)\\b(?:(?:abstract|final|readonly)\\s+)*class\\s+(${IDENT})`,
  'g',
);
const SNAKE_CASE_TABLE = /\b[a-z_]+_[a-z_]+\b/;
const MARKUP_PATTERNS: readonly RegExp[] = [
  /<[a-zA-Z][^>]*>/i,
  /<\/[a-zA-Z][^>]*>/i,
  /<[a-zA-Z][^>]*\/>/i,
  /&[a-zA-Z]+;/i,
];

const INTERPOLATING: ReadonlySet<RegionKind> = new Set(['code', 'double', 'heredoc']);

// -- Region scan ---

/**
 * Split source into code, string, comment and inline-HTML regions, left to right.
 * Text before the first `<?php` / `<?=` is HTML; a fragment with no open tag
 * at all is treated as PHP from the first character.
 */
export function scanRegions(source: string): SourceRegion[] {
  const regions: SourceRegion[] = [];
  const push = (kind: RegionKind, start: number, end: number): void => {
    if (end <= start) return;
    const last = regions[regions.length - 1];
    if (last && last.kind === kind && kind === 'code' && last.end === start) {
      regions[regions.length - 1] = { kind, start: last.start, end };
      return;
    }
    regions.push({ kind, start, end });
  };

  OPEN_TAG.lastIndex = 0;
  let inPhp = !OPEN_TAG.test(source);
  let pos = 0;

  while (pos < source.length) {
    if (!inPhp) {
      OPEN_TAG.lastIndex = pos;
      const open = OPEN_TAG.exec(source);
      if (!open) {
        push('html', pos, source.length);
        break;
      }
      const tagEnd = open.index + open[0].length;
      push('html', pos, open.index);
      push('code', open.index, tagEnd);
      pos = tagEnd;
      inPhp = true;
      continue;
    }

    PHP_TOKEN.lastIndex = pos;
    const token = PHP_TOKEN.exec(source);
    if (!token) {
      push('code', pos, source.length);
      break;
    }

    const start = token.index;
    push('code', pos, start);

    if (token[0] === '?>') {
      push('code', start, start + 2);
      pos = start + 2;
      inPhp = false;
      continue;
    }

    const { kind, end } = readToken(source, start, token[0]);
    push(kind, start, end);
    pos = end;
  }

  return regions;
}

function readToken(source: string, start: number, lead: string): { kind: RegionKind; end: number } {
  const matchAt = (pattern: RegExp): RegExpExecArray | null => {
    pattern.lastIndex = start;
    return pattern.exec(source);
  };

  switch (lead) {
    case "'": {
      const match = matchAt(SINGLE_QUOTED);
      return { kind: 'single', end: match ? start + match[0].length : source.length };
    }
    case '"': {
      const match = matchAt(DOUBLE_QUOTED);
      return { kind: 'double', end: match ? start + match[0].length : source.length };
    }
    case '/*': {
      const close = source.indexOf('*/', start + 2);
      return { kind: 'block-comment', end: close < 0 ? source.length : close + 2 };
    }
    case '<<<': {
      const match = matchAt(HEREDOC);
      if (!match) {
        return { kind: 'code', end: start + 3 };
      }
      return { kind: match[1] === "'" ? 'nowdoc' : 'heredoc', end: start + match[0].length };
    }
    default: {
      // `//` or `#`
      const match = matchAt(LINE_COMMENT);
      return { kind: 'line-comment', end: match ? start + match[0].length : source.length };
    }
  }
}

// -- Content helpers ---

function stringContent(text: string, kind: StringKind): string {
  if (kind === 'heredoc' || kind === 'nowdoc') {
    const first = text.indexOf('\n');
    const last = text.lastIndexOf('\n');
    if (last <= first) return '';
    return text.slice(first + 1, last).replace(/\r$/, '');
  }
  const quote = text[0];
  const terminated = text.length >= 2 && text.endsWith(quote ?? '');
  return terminated ? text.slice(1, -1) : text.slice(1);
}

/**
 * True when the character at `position` is escaped: an odd run of backslashes
 * sits right before it. `"\\$x"` still interpolates `$x`; `"\$x"` does not.
 */
export function isEscapedAt(text: string, position: number): boolean {
  let backslashes = 0;
  for (let i = position - 1; i >= 0 && text[i] === '\\'; i--) {
    backslashes++;
  }
  return backslashes % 2 === 1;
}

function matchesIn(
  pattern: RegExp,
  source: string,
  region: SourceRegion,
): IdentifierToken[] {
  const text = source.slice(region.start, region.end);
  const found: IdentifierToken[] = [];
  pattern.lastIndex = 0;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(text)) !== null) {
    const name = match[1];
    if (name !== undefined) {
      found.push({ name, position: region.start + match.index });
    }
  }
  return found;
}

// -- PhpTokenizer ---

/**
 * Regex-driven PHP scanner. It does not parse: it classifies regions of the
 * text and pattern-matches inside them, so identifier-shaped text in odd
 * places can be misread.
 */
export class PhpTokenizer implements SourceScanner {
  constructor(private readonly lexicon: Lexicon = loadLexicon()) {}

  scan(source: string): TokenizedSource {
    const regions = scanRegions(source);
    const codeRegions = regions.filter((r) => r.kind === 'code');
    const properties = this.extractProperties(source, codeRegions);

    return {
      source,
      regions,
      variables: this.extractVariables(source, regions, new Set(properties)),
      properties,
      functions: this.extractFunctions(source, codeRegions),
      classes: this.extractClasses(source, codeRegions),
      strings: this.extractStrings(source, regions),
      comments: this.extractComments(source, regions),
    };
  }

  /**
   * Whether a `$name` token may be renamed: not reserved, and longer than
   * one character after the sigil unless allowlisted (`$i`, `$j`, ...).
   */
  shouldRenameVariable(name: string): boolean {
    if (this.lexicon.isReserved(name)) {
      return false;
    }
    if (name.length <= 2 && !this.lexicon.shortNameAllowlist.has(name)) {
      return false;
    }
    return true;
  }

  looksLikeSql(content: string): boolean {
    const upper = content.toUpperCase();
    if (this.lexicon.sqlKeywords.some((keyword) => upper.includes(keyword))) {
      return true;
    }
    return SNAKE_CASE_TABLE.test(content);
  }

  looksLikeMarkup(content: string): boolean {
    if (MARKUP_PATTERNS.some((pattern) => pattern.test(content))) {
      return true;
    }
    const lower = content.toLowerCase();
    return this.lexicon.markupAttributes.some((attr) => lower.includes(attr));
  }

  private extractVariables(
    source: string,
    regions: readonly SourceRegion[],
    properties: ReadonlySet<string>,
  ): IdentifierToken[] {
    const seen = new Set<string>();
    const variables: IdentifierToken[] = [];

    for (const region of regions) {
      if (!INTERPOLATING.has(region.kind)) continue;

      for (const match of matchesIn(VARIABLE, source, region)) {
        if (region.kind !== 'code' && isEscapedAt(source, match.position)) continue;

        const name = `$${match.name}`;
        if (seen.has(name) || properties.has(name) || !this.shouldRenameVariable(name)) continue;
        seen.add(name);
        variables.push({ name, position: match.position });
      }
    }
    return variables;
  }

  private extractProperties(source: string, codeRegions: readonly SourceRegion[]): string[] {
    const names = new Set<string>();
    for (const region of codeRegions) {
      for (const match of matchesIn(PROPERTY_DECLARATION, source, region)) {
        names.add(`$${match.name}`);
      }
    }
    return [...names];
  }

  private extractFunctions(source: string, codeRegions: readonly SourceRegion[]): IdentifierToken[] {
    const functions: IdentifierToken[] = [];
    for (const region of codeRegions) {
      for (const match of matchesIn(FUNCTION_DEFINITION, source, region)) {
        if (match.name.startsWith('__')) continue;
        functions.push({ name: match.name, position: match.position });
      }
    }
    return functions;
  }

  private extractClasses(source: string, codeRegions: readonly SourceRegion[]): IdentifierToken[] {
    const classes: IdentifierToken[] = [];
    for (const region of codeRegions) {
      for (const match of matchesIn(CLASS_DEFINITION, source, region)) {
        // `new class extends Base` is anonymous
        if (this.lexicon.isReserved(match.name)) continue;
        classes.push({ name: match.name, position: match.position });
      }
    }
    return classes;
  }

  private extractStrings(source: string, regions: readonly SourceRegion[]): StringToken[] {
    const strings: StringToken[] = [];

    for (const region of regions) {
      if (
        region.kind !== 'single' &&
        region.kind !== 'double' &&
        region.kind !== 'heredoc' &&
        region.kind !== 'nowdoc'
      ) {
        continue;
      }

      const text = source.slice(region.start, region.end);
      const content = stringContent(text, region.kind);
      const trimmed = content.trim();

      if (trimmed.length === 0) continue;
      if (this.lexicon.literalValues.has(trimmed)) continue;
      if (this.looksLikeSql(content)) continue;
      if (this.looksLikeMarkup(content)) continue;

      strings.push({ kind: region.kind, content, position: region.start, length: text.length });
    }
    return strings;
  }

  private extractComments(source: string, regions: readonly SourceRegion[]): CommentToken[] {
    const comments: CommentToken[] = [];
    for (const region of regions) {
      if (region.kind !== 'line-comment' && region.kind !== 'block-comment') continue;
      const content = source.slice(region.start, region.end);
      comments.push({
        kind: region.kind === 'line-comment' ? 'line' : 'block',
        content,
        position: region.start,
        length: content.length,
      });
    }
    return comments;
  }
}

// -- Public API ---

const defaultTokenizer = new PhpTokenizer();

export function tokenize(source: string): TokenizedSource {
  return defaultTokenizer.scan(source);
}

export function getCodeStatistics(
  source: string,
  scanner: SourceScanner = defaultTokenizer,
): CodeStatistics {
  const tokens = scanner.scan(source);
  return {
    totalLines: source.split('\n').length,
    variableCount: tokens.variables.length,
    functionCount: tokens.functions.length,
    classCount: tokens.classes.length,
    stringCount: tokens.strings.length,
    commentCount: tokens.comments.length,
    codeSize: source.length,
    codeSizeKb: Math.round((source.length / 1024) * 100) / 100,
  };
}
