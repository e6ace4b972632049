import { describe, it, expect } from 'vitest';
import { PhpTokenizer, getCodeStatistics, isEscapedAt, scanRegions, tokenize } from './tokenizer.js';

const names = (tokens: readonly { name: string }[]): string[] => tokens.map((t) => t.name);

describe('isEscapedAt', () => {
  it('counts the run of backslashes before a position', () => {
    expect(isEscapedAt('$a', 0)).toBe(false);
    expect(isEscapedAt('\\$a', 1)).toBe(true);
    expect(isEscapedAt('\\\\$a', 2)).toBe(false);
    expect(isEscapedAt('\\\\\\$a', 3)).toBe(true);
  });
});

describe('scanRegions', () => {
  it('splits code, strings, comments and inline HTML', () => {
    const source = "<?php $a = 'x'; // c\n?>hi";

    expect(scanRegions(source)).toEqual([
      { kind: 'code', start: 0, end: 11 },
      { kind: 'single', start: 11, end: 14 },
      { kind: 'code', start: 14, end: 16 },
      { kind: 'line-comment', start: 16, end: 20 },
      { kind: 'code', start: 20, end: 23 },
      { kind: 'html', start: 23, end: 25 },
    ]);
  });

  it('treats text before the open tag as HTML', () => {
    const regions = scanRegions('<p>x</p><?php $y;');

    expect(regions[0]).toEqual({ kind: 'html', start: 0, end: 8 });
    expect(regions[1]).toEqual({ kind: 'code', start: 8, end: 17 });
  });

  it('treats a fragment without an open tag as code', () => {
    expect(scanRegions('$value = 1;')).toEqual([{ kind: 'code', start: 0, end: 11 }]);
  });

  it('distinguishes heredoc from nowdoc', () => {
    const heredoc = scanRegions('<?php $m = <<<EOT\nHi $x\nEOT;\n');
    const nowdoc = scanRegions("<?php $m = <<<'EOT'\nHi $x\nEOT;\n");

    expect(heredoc.map((r) => r.kind)).toEqual(['code', 'heredoc', 'code']);
    expect(nowdoc.map((r) => r.kind)).toEqual(['code', 'nowdoc', 'code']);
  });

  it('does not treat #[ attributes as comments', () => {
    const regions = scanRegions('<?php\n#[Route]\n# note\n');

    expect(regions.filter((r) => r.kind === 'line-comment')).toHaveLength(1);
  });

  it('covers the whole source without gaps', () => {
    const source = '<html><?php echo "a $b"; /* c */ ?>tail<?= $d ?>';
    const regions = scanRegions(source);

    let pos = 0;
    for (const region of regions) {
      expect(region.start).toBe(pos);
      pos = region.end;
    }
    expect(pos).toBe(source.length);
  });
});

describe('PhpTokenizer', () => {
  const tokenizer = new PhpTokenizer();

  // -- Variables ---

  it('collects renameable variables from code and interpolating strings', () => {
    const tokens = tokenizer.scan(
      '<?php\n$name = "Hi $user"; $i = 1; $x = 2; $_GET[\'a\']; $this->title;\n',
    );

    expect(names(tokens.variables)).toEqual(['$name', '$user', '$i']);
  });

  it('ignores an escaped dollar sign inside a double-quoted string', () => {
    const tokens = tokenizer.scan('<?php echo "cost: \\$price and $total";');

    expect(names(tokens.variables)).toEqual(['$total']);
  });

  it('collects a variable after an escaped backslash inside a double-quoted string', () => {
    const tokens = tokenizer.scan('<?php echo "C:\\\\$path";');

    expect(names(tokens.variables)).toEqual(['$path']);
  });

  it('ignores variables in single-quoted strings, nowdocs, comments and HTML', () => {
    const tokens = tokenizer.scan(
      "<p>$markup</p><?php $kept = 'x $single'; // $comment\n$m2 = <<<'EOT'\n$nowdoc\nEOT;\n",
    );

    expect(names(tokens.variables)).toEqual(['$kept', '$m2']);
  });

  it('excludes declared properties from variables', () => {
    const tokens = tokenizer.scan(
      '<?php class Cart { private $items = []; public ?int $count = 0; function add($item) { $this->items[] = $item; } }',
    );

    expect(tokens.properties).toEqual(['$items', '$count']);
    expect(names(tokens.variables)).toEqual(['$item']);
  });

  it('reports each variable once, at its first position', () => {
    const tokens = tokenizer.scan('<?php $total = 1; $total++;');

    expect(tokens.variables).toEqual([{ name: '$total', position: 6 }]);
  });

  // -- Functions and classes ---

  it('collects user function definitions but skips magic methods', () => {
    const tokens = tokenizer.scan(
      '<?php function __construct() {} function &getRef() {} function calcTotal($a) {}',
    );

    expect(names(tokens.functions)).toEqual(['getRef', 'calcTotal']);
  });

  it('collects named classes but not anonymous classes or ::class', () => {
    const tokens = tokenizer.scan(
      '<?php final class Foo extends Bar {} $o = new class extends Base {}; $n = Foo::class;',
    );

    expect(names(tokens.classes)).toEqual(['Foo']);
  });

  // -- Strings and comments ---

  it('keeps plain strings and skips SQL, markup and literal values', () => {
    const tokens = tokenizer.scan(
      '<?php $a = \'Hello\'; $b = "SELECT * FROM users"; $c = \'<div class="x">\'; $d = \'true\'; $e = \'\';',
    );

    expect(tokens.strings).toEqual([{ kind: 'single', content: 'Hello', position: 11, length: 7 }]);
  });

  it('extracts heredoc content without the delimiters', () => {
    const tokens = tokenizer.scan('<?php\n$msg = <<<EOT\nHello $guest\nEOT;\n');

    expect(tokens.strings.map((s) => [s.kind, s.content])).toEqual([['heredoc', 'Hello $guest']]);
    expect(names(tokens.variables)).toEqual(['$msg', '$guest']);
  });

  it('collects line, hash and block comments', () => {
    const tokens = tokenizer.scan('<?php\n# hash\n// slash\n/* block */\n');

    expect(tokens.comments.map((c) => [c.kind, c.content])).toEqual([
      ['line', '# hash'],
      ['line', '// slash'],
      ['block', '/* block */'],
    ]);
  });

  // -- Heuristics ---

  it('shouldRenameVariable rejects reserved and short names', () => {
    expect(tokenizer.shouldRenameVariable('$i')).toBe(true);
    expect(tokenizer.shouldRenameVariable('$count')).toBe(true);
    expect(tokenizer.shouldRenameVariable('$x')).toBe(false);
    expect(tokenizer.shouldRenameVariable('$list')).toBe(false);
    expect(tokenizer.shouldRenameVariable('$_SERVER')).toBe(false);
  });

  it('looksLikeSql matches keywords and snake_case table names', () => {
    expect(tokenizer.looksLikeSql('select id from t')).toBe(true);
    expect(tokenizer.looksLikeSql('user_accounts')).toBe(true);
    expect(tokenizer.looksLikeSql('Hello')).toBe(false);
  });

  it('looksLikeMarkup matches tags, entities and attributes', () => {
    expect(tokenizer.looksLikeMarkup('<br/>')).toBe(true);
    expect(tokenizer.looksLikeMarkup('&amp;')).toBe(true);
    expect(tokenizer.looksLikeMarkup('href=')).toBe(true);
    expect(tokenizer.looksLikeMarkup('plain text')).toBe(false);
  });
});

describe('tokenize', () => {
  it('uses the bundled lexicon', () => {
    expect(names(tokenize('<?php $GLOBALS; $server = 1;').variables)).toEqual(['$server']);
  });
});

describe('getCodeStatistics', () => {
  it('counts lines, identifiers and size', () => {
    const source = '<?php\n$total = 0;\n';

    expect(getCodeStatistics(source)).toEqual({
      totalLines: 3,
      variableCount: 1,
      functionCount: 0,
      classCount: 0,
      stringCount: 0,
      commentCount: 0,
      codeSize: 18,
      codeSizeKb: 0.02,
    });
  });
});
