import * as fs from 'node:fs';
import { z } from 'zod';

// -- Types ---

const lexiconFileSchema = z.object({
  reservedKeywords: z.array(z.string()),
  superglobals: z.array(z.string()),
  magicConstants: z.array(z.string()),
  shortNameAllowlist: z.array(z.string()),
  literalValues: z.array(z.string()),
  sqlKeywords: z.array(z.string()),
  markupAttributes: z.array(z.string()),
});

export type LexiconData = z.infer<typeof lexiconFileSchema>;

// -- Constants ---

const LEXICON_URL = new URL('../data/php-lexicon.json', import.meta.url);

// -- Lexicon ---

/**
 * PHP word lists the tokenizer and obfuscator consult: names that are never
 * renamed, and the vocabulary of the SQL/markup string heuristics.
 */
export class Lexicon {
  /** Lower-cased; PHP keywords are case-insensitive. */
  readonly keywords: ReadonlySet<string>;
  readonly superglobals: ReadonlySet<string>;
  readonly magicConstants: ReadonlySet<string>;
  readonly shortNameAllowlist: ReadonlySet<string>;
  readonly literalValues: ReadonlySet<string>;
  readonly sqlKeywords: readonly string[];
  readonly markupAttributes: readonly string[];

  constructor(data: LexiconData) {
    this.keywords = new Set(data.reservedKeywords.map((k) => k.toLowerCase()));
    this.superglobals = new Set(data.superglobals);
    this.magicConstants = new Set(data.magicConstants);
    this.shortNameAllowlist = new Set(data.shortNameAllowlist);
    this.literalValues = new Set(data.literalValues);
    this.sqlKeywords = [...data.sqlKeywords];
    this.markupAttributes = [...data.markupAttributes];
  }

  /**
   * True for a superglobal, magic constant or keyword, with or without the `$` sigil.
   */
  isReserved(name: string): boolean {
    const bare = name.startsWith('$') ? name.slice(1) : name;
    return (
      this.superglobals.has(name) ||
      this.superglobals.has(`$${bare}`) ||
      this.magicConstants.has(bare) ||
      this.keywords.has(bare.toLowerCase())
    );
  }
}

let defaultLexicon: Lexicon | null = null;

/**
 * The bundled lexicon, read once from `data/php-lexicon.json`.
 */
export function loadLexicon(): Lexicon {
  if (defaultLexicon === null) {
    const raw: unknown = JSON.parse(fs.readFileSync(LEXICON_URL, 'utf-8'));
    defaultLexicon = new Lexicon(lexiconFileSchema.parse(raw));
  }
  return defaultLexicon;
}
