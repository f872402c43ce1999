/**
 * Tests for the item line parser and serializer.
 */

import { describe, it, expect } from 'vitest';
import { isItemLine, parseItem } from '../parser.js';
import { serializeItem } from '../serializer.js';
import { createItem } from '../../model/item.js';
import { ITEM_STATUSES, PRIORITIES, PRIORITY_SYMBOLS, STATUS_SYMBOLS } from '../../model/registry.js';
import { ParseError } from '../../errors.js';
import { ExitCode } from '../../../types/exit-codes.js';

const LEARN_PYTHON =
  '○ learn_python!! 3mo "Finally learn python" {"Programming","Education"} personal_development >>> ⊢[git_basics] ►[django_proj,flask_app]';

function parseFailure(line: string): ParseError | undefined {
  try {
    parseItem(line);
  } catch (err) {
    return err instanceof ParseError ? err : undefined;
  }
  return undefined;
}

describe('parseItem', () => {
  it('parses a full item line', () => {
    expect(parseItem(LEARN_PYTHON)).toEqual({
      id: 'learn_python',
      title: 'Finally learn python',
      description: '',
      status: 'NOT_STARTED',
      priority: 'HIGH',
      duration: { parts: [{ amount: 3, unit: 'mo' }] },
      charts: ['Programming', 'Education'],
      tags: ['personal_development'],
      relations: { REQUIRES: ['git_basics'], BLOCKS: ['django_proj', 'flask_app'] },
      timeConstraints: [],
      occlude: false,
    });
  });

  it('reads every status glyph', () => {
    for (const status of ITEM_STATUSES) {
      expect(parseItem(`${STATUS_SYMBOLS[status]} a 0s "t" {}`).status).toBe(status);
    }
  });

  it('reads every priority glyph, including none', () => {
    for (const priority of PRIORITIES) {
      expect(parseItem(`○ a${PRIORITY_SYMBOLS[priority]} 0s "t" {}`).priority).toBe(priority);
    }
  });

  it('decodes JSON escapes in titles and charts', () => {
    const item = parseItem('○ a 0s "say \\"hi\\" \\\\ \\u00e9" {"a,b", "c"}');
    expect(item.title).toBe('say "hi" \\ é');
    expect(item.charts).toEqual(['a,b', 'c']);
  });

  it('drops empty chart names', () => {
    expect(parseItem('○ a 0s "t" {""}').charts).toEqual([]);
  });

  it('merges repeated relation buckets without duplicates', () => {
    expect(parseItem('○ a 0s "t" {} >>> ⊢[b] ⊢[ c , b ] ⋲[]').relations).toEqual({ REQUIRES: ['b', 'c'] });
  });

  it('parses time constraints', () => {
    expect(parseItem('○ a 1h "t" {} @@@ due(2025-03-01,severe) every(1w,escalate:?,stack)').timeConstraints).toEqual([
      { kind: 'deadline', dueDate: '2025-03-01', consequence: { kind: 'severe' } },
      {
        kind: 'recurring',
        interval: { parts: [{ amount: 1, unit: 'w' }] },
        consequence: { kind: 'escalating', rate: 'UNSURE' },
        stack: true,
      },
    ]);
  });

  it('splits the user comment from the auto comment', () => {
    const item = parseItem('○ a 0s "t" {} # hello world ### auto note');
    expect(item.userComment).toBe('hello world');
    expect(item.autoComment).toBe('auto note');
  });

  it('reads a lone auto comment', () => {
    const item = parseItem('○ a 0s "t" {} ### auto');
    expect(item.userComment).toBeUndefined();
    expect(item.autoComment).toBe('auto');
  });

  it('keeps ### glued to a word inside the user comment', () => {
    const item = parseItem('○ a 0s "t" {} # a###b');
    expect(item.userComment).toBe('a###b');
    expect(item.autoComment).toBeUndefined();
  });

  it('applies the occlude option', () => {
    expect(parseItem('○ a 0s "t" {}', { occlude: true }).occlude).toBe(true);
  });
});

describe('parseItem errors', () => {
  it('reports an unknown status symbol', () => {
    const error = parseFailure('X a 0s "t" {}');
    expect(error?.message).toBe('Unknown status symbol \'X\' at column 1: X a 0s "t" {}');
    expect(error?.column).toBe(0);
    expect(error?.code).toBe(ExitCode.PARSE_ERROR);
  });

  it('reports an empty line', () => {
    expect(parseFailure('   ')?.message).toBe('Missing status at column 1: ');
  });

  it('reports an unknown priority symbol', () => {
    expect(parseFailure('○ a!x 0s "t" {}')?.message).toBe('Unknown priority symbol \'!x\' at column 4: ○ a!x 0s "t" {}');
  });

  it('reports an unknown relation symbol', () => {
    expect(parseFailure('○ a 0s "t" {} >>> ?[b]')?.message)
      .toBe('Unknown relation symbol \'?\' at column 19: ○ a 0s "t" {} >>> ?[b]');
  });

  it('reports a title that is not valid JSON', () => {
    expect(parseFailure('○ a 0s "bad \\q" {}')?.message).toBe('Invalid JSON in title at column 8: ○ a 0s "bad \\q" {}');
    expect(parseFailure('○ a 0s "open {}')?.message).toBe('Unterminated title at column 8: ○ a 0s "open {}');
    expect(parseFailure('○ a 0s title {}')?.message).toBe('Expected title as a JSON string at column 8: ○ a 0s title {}');
  });

  it('reports missing fields', () => {
    expect(parseFailure('○ a')?.message).toBe('Missing duration at column 4: ○ a');
    expect(parseFailure('○ a 0s')?.message).toBe('Missing title at column 7: ○ a 0s');
    expect(parseFailure('○ a 0s "t"')?.message).toBe('Expected \'{\' opening charts at column 11: ○ a 0s "t"');
  });

  it('reports text that belongs to no section', () => {
    expect(parseFailure('○ a 0s "t" {} Tag')?.message).toBe('Unexpected text at column 15: ○ a 0s "t" {} Tag');
  });
});

describe('serializeItem', () => {
  it('writes every section in grammar order', () => {
    const item = createItem({
      id: 'ship',
      title: 'Ship it',
      status: 'IN_PROGRESS',
      priority: 'CRITICAL',
      duration: { parts: [{ amount: 1, unit: 'w' }, { amount: 2, unit: 'd' }] },
      charts: ['Work'],
      tags: ['job', 'q3'],
      relations: { REQUIRES: ['design', 'build'], SUFFICIENT: ['hotfix'] },
      timeConstraints: [{
        kind: 'window',
        duration: { parts: [{ amount: 2, unit: 'h' }] },
        grace: { parts: [{ amount: 30, unit: 'min' }] },
        consequence: { kind: 'warn' },
      }],
      userComment: 'needs review',
      autoComment: 'moved from backlog',
    });
    const line = serializeItem(item);

    expect(line).toBe(
      '◑ ship!!! 1w2d "Ship it" {"Work"} job,q3 >>> ⊢[design,build] ≻[hotfix] @@@ window(2h:30min,warn) # needs review ### moved from backlog',
    );
    expect(parseItem(line)).toEqual(item);
  });

  it('writes the zero duration and empty charts', () => {
    expect(serializeItem(createItem({ id: 'a', title: 't' }))).toBe('○ a 0s "t" {}');
  });

  it('escapes titles so they read back unchanged', () => {
    const item = createItem({ id: 'a', title: 'quote " backslash \\ tab \t' });
    expect(serializeItem(item)).toBe('○ a 0s "quote \\" backslash \\\\ tab \\t" {}');
    expect(parseItem(serializeItem(item))).toEqual(item);
  });

  it('round-trips comments that pass the item checks', () => {
    const item = createItem({ id: 'a', title: 't', userComment: 'a###b', autoComment: 'x ### y' });
    expect(parseItem(serializeItem(item))).toEqual(item);
  });

  it('round-trips tiny durations', () => {
    const item = createItem({ id: 'tiny', title: 't', duration: { parts: [{ amount: 1e-7, unit: 'h' }] } });
    expect(serializeItem(item)).toBe('○ tiny 0.0000001h "t" {}');
    expect(parseItem(serializeItem(item))).toEqual(item);
  });

  it('writes canonical lines back unchanged', () => {
    for (const line of [
      LEARN_PYTHON,
      '● done... 0s "Done" {} ### 2025-01-01 closed',
      '⊘ wait? 1.5h "Wait \\"here\\"" {"A","B"} x >>> ∪[y] ⊟[z]',
      '○ habit,,, 10min "Stretch" {} @@@ every(1d:2h,escalate:!) # mornings',
      '◑ mix! 1y2mo "Mix" {} >>> ≫[a] ∴[b]',
    ]) {
      expect(serializeItem(parseItem(line))).toBe(line);
    }
  });
});

describe('isItemLine', () => {
  it('skips blank and comment lines', () => {
    expect(isItemLine('')).toBe(false);
    expect(isItemLine('   ')).toBe(false);
    expect(isItemLine('# a heading')).toBe(false);
    expect(isItemLine('  ○ a 0s "t" {}')).toBe(true);
  });
});
