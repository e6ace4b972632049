import * as crypto from 'node:crypto';
import { Lexicon, loadLexicon } from './lexicon.js';
import { isEscapedAt } from './tokenizer.js';
import type { RegionKind, TokenizedSource } from './tokenizer.js';

// -- Types ---

export interface ObfuscateOptions {
  readonly renameVars?: boolean;
  readonly renameFunctions?: boolean;
  readonly renameClasses?: boolean;
}

export type IdentifierNamespace = 'variables' | 'functions' | 'classes';

export interface MappingSnapshot {
  readonly variables: Readonly<Record<string, string>>;
  readonly functions: Readonly<Record<string, string>>;
  readonly classes: Readonly<Record<string, string>>;
  readonly counts: Readonly<Record<IdentifierNamespace, number>>;
}

/**
 * Returns a uniformly random integer in `[0, maxExclusive)`.
 */
export type RandomInt = (maxExclusive: number) => number;

// -- Constants ---

const ALPHA = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ';
const ALPHANUMERIC = `${ALPHA}0123456789`;
const VARIABLE_ALIAS_LENGTH = { min: 8, max: 12 };
const NAME_ALIAS_LENGTH = { min: 10, max: 15 };
const MAX_ALIAS_ATTEMPTS = 1000;

const IDENT_CHAR = '[A-Za-z0-9_\\u0080-\\uffff]';

const VARIABLE_REGIONS: ReadonlySet<RegionKind> = new Set(['code', 'double', 'heredoc']);

export const DEFAULT_OBFUSCATE_OPTIONS: Required<ObfuscateOptions> = {
  renameVars: true,
  renameFunctions: false,
  renameClasses: false,
};

/**
 * Fill unset (or explicitly undefined) flags from the defaults.
 */
export function resolveObfuscateOptions(options: ObfuscateOptions = {}): Required<ObfuscateOptions> {
  return {
    renameVars: options.renameVars ?? DEFAULT_OBFUSCATE_OPTIONS.renameVars,
    renameFunctions: options.renameFunctions ?? DEFAULT_OBFUSCATE_OPTIONS.renameFunctions,
    renameClasses: options.renameClasses ?? DEFAULT_OBFUSCATE_OPTIONS.renameClasses,
  };
}

// -- Obfuscator ---

/**
 * Renames PHP variables, functions and classes to random aliases.
 *
 * One instance owns one identifier map. Aliases are assigned once per name and
 * reused on every later call, so sharing an instance across files keeps
 * aliases consistent between them; a fresh instance starts a fresh mapping.
 */
export class Obfuscator {
  private readonly maps: Record<IdentifierNamespace, Map<string, string>> = {
    variables: new Map(),
    functions: new Map(),
    classes: new Map(),
  };
  private readonly aliases: Record<IdentifierNamespace, Set<string>> = {
    variables: new Set(),
    functions: new Set(),
    classes: new Set(),
  };
  private readonly lexicon: Lexicon;
  private readonly randomInt: RandomInt;

  constructor(options: { lexicon?: Lexicon; randomInt?: RandomInt } = {}) {
    this.lexicon = options.lexicon ?? loadLexicon();
    this.randomInt = options.randomInt ?? ((max) => crypto.randomInt(max));
  }

  /**
   * Rewrite `tokens.source` with aliases for every enabled category.
   *
   * Variables are replaced in code and in interpolating strings (double-quoted,
   * heredoc). Function and class names are replaced in code only. Single-quoted
   * strings, nowdocs, comments and inline HTML are left untouched.
   */
  obfuscate(tokens: TokenizedSource, options: ObfuscateOptions = DEFAULT_OBFUSCATE_OPTIONS): string {
    const opts = resolveObfuscateOptions(options);

    const properties = new Set(tokens.properties);
    if (opts.renameVars) {
      const inUse = new Set([...tokens.variables.map((v) => v.name), ...properties]);
      for (const variable of tokens.variables) {
        this.assign('variables', variable.name, inUse);
      }
    }
    if (opts.renameFunctions) {
      const inUse = new Set(tokens.functions.map((fn) => fn.name));
      for (const fn of tokens.functions) {
        this.assign('functions', fn.name, inUse);
      }
    }
    if (opts.renameClasses) {
      const inUse = new Set(tokens.classes.map((cls) => cls.name));
      for (const cls of tokens.classes) {
        this.assign('classes', cls.name, inUse);
      }
    }

    const variableMap = opts.renameVars
      ? new Map([...this.maps.variables].filter(([name]) => !properties.has(name)))
      : new Map<string, string>();
    const functionMap = opts.renameFunctions ? this.maps.functions : new Map<string, string>();
    const classMap = opts.renameClasses ? this.maps.classes : new Map<string, string>();

    const variables = buildPattern(variableMap, '', `(?!${IDENT_CHAR})`);
    const functions = buildPattern(functionMap, `(?<!${IDENT_CHAR}|\\$)`, '(?=\\s*\\()');
    const classes = buildPattern(classMap, `(?<!${IDENT_CHAR}|\\$|->)`, `(?!${IDENT_CHAR})`);

    let result = '';
    for (const region of tokens.regions) {
      let text = tokens.source.slice(region.start, region.end);

      if (VARIABLE_REGIONS.has(region.kind)) {
        // an escaped `\$name` in a string is literal text
        const skip = region.kind === 'code' ? undefined : isEscapedAt;
        text = substitute(text, variables, variableMap, skip);
      }
      if (region.kind === 'code') {
        text = substitute(text, functions, functionMap);
        text = substitute(text, classes, classMap);
      }
      result += text;
    }
    return result;
  }

  getAlias(namespace: IdentifierNamespace, name: string): string | undefined {
    return this.maps[namespace].get(name);
  }

  /**
   * Copy of the current identifier map, for diagnostics.
   */
  getMappingSnapshot(): MappingSnapshot {
    return {
      variables: Object.fromEntries(this.maps.variables),
      functions: Object.fromEntries(this.maps.functions),
      classes: Object.fromEntries(this.maps.classes),
      counts: {
        variables: this.maps.variables.size,
        functions: this.maps.functions.size,
        classes: this.maps.classes.size,
      },
    };
  }

  private assign(namespace: IdentifierNamespace, name: string, inUse: ReadonlySet<string>): void {
    if (this.maps[namespace].has(name)) {
      return;
    }
    const alias = this.generateAlias(namespace, inUse);
    this.maps[namespace].set(name, alias);
    this.aliases[namespace].add(alias);
  }

  /**
   * Random alias that is not already an alias, a mapped name, a name in the
   * current source, or reserved.
   */
  private generateAlias(namespace: IdentifierNamespace, inUse: ReadonlySet<string>): string {
    const taken = this.aliases[namespace];
    const originals = this.maps[namespace];

    for (let attempt = 0; attempt < MAX_ALIAS_ATTEMPTS; attempt++) {
      const alias =
        namespace === 'variables'
          ? `$${this.randomString(ALPHANUMERIC, VARIABLE_ALIAS_LENGTH)}`
          : this.randomString(ALPHA, NAME_ALIAS_LENGTH);

      if (taken.has(alias) || originals.has(alias) || inUse.has(alias) || this.lexicon.isReserved(alias)) {
        continue;
      }
      return alias;
    }
    throw new Error(`Could not generate a unique ${namespace} alias after ${MAX_ALIAS_ATTEMPTS} attempts`);
  }

  private randomString(alphabet: string, length: { min: number; max: number }): string {
    const size = length.min + this.randomInt(length.max - length.min + 1);
    // PHP identifiers cannot start with a digit
    let out = ALPHA.charAt(this.randomInt(ALPHA.length));
    for (let i = 1; i < size; i++) {
      out += alphabet.charAt(this.randomInt(alphabet.length));
    }
    return out;
  }
}

// -- Internal Helpers ---

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * One alternation over every name, longest first, so a single pass replaces
 * each occurrence at most once and aliases are never rewritten again.
 */
function buildPattern(
  map: ReadonlyMap<string, string>,
  lookbehind: string,
  lookahead: string,
): RegExp | null {
  if (map.size === 0) {
    return null;
  }
  const names = [...map.keys()].sort((a, b) => b.length - a.length).map(escapeRegExp);
  return new RegExp(`${lookbehind}(?:${names.join('|')})${lookahead}`, 'g');
}

function substitute(
  text: string,
  pattern: RegExp | null,
  map: ReadonlyMap<string, string>,
  skip?: (text: string, offset: number) => boolean,
): string {
  if (pattern === null) {
    return text;
  }
  return text.replace(pattern, (match: string, offset: number) =>
    skip?.(text, offset) ? match : (map.get(match) ?? match),
  );
}
