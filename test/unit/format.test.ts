// test/unit/format.test.ts
import { describe, it, expect } from 'vitest';

import { Instant, describeDuration } from '../../suite/components/clock.ts';
import {
  counting,
  describeArgument,
  describeIssueKind,
  formatComments,
  issueSuffix,
  labeledArguments,
} from '../../suite/components/format.ts';
import { ANSI, PLAIN, at } from '../components/builders.ts';

describe('counting', () => {
  it.each([
    [1, 'test', '1 test'],
    [0, 'test', '0 tests'],
    [2, 'issue', '2 issues'],
    [1, 'known issue', '1 known issue'],
  ])('%i %s → %s', (n, noun, expected) => {
    expect(counting(n, noun)).toBe(expected);
  });
});

describe('issueSuffix', () => {
  it.each([
    [0, 0, ''],
    [3, 0, ' with 3 issues'],
    [1, 0, ' with 1 issue'],
    [0, 1, ' with 1 known issue'],
    [0, 2, ' with 2 known issues'],
    [2, 1, ' with 3 issues (including 1 known issue)'],
  ])('(%i, %i)', (issues, known, expected) => {
    expect(issueSuffix(issues, known)).toBe(expected);
  });
});

describe('describeDuration', () => {
  it('prints seconds with millisecond precision', () => {
    expect(describeDuration(at(0), at(1234))).toBe('1.234 seconds');
    expect(describeDuration(at(100), at(105))).toBe('0.005 seconds');
    expect(describeDuration(at(0), at(61_000))).toBe('61.000 seconds');
  });

  it('truncates below a millisecond', () => {
    expect(describeDuration(new Instant(0n), new Instant(1_999_999n))).toBe('0.001 seconds');
  });

  it('never goes negative when the end precedes the start', () => {
    expect(describeDuration(at(5000), at(1000))).toBe('0.000 seconds');
  });
});

describe('formatComments', () => {
  it('leads each comment with an arrow and indents continuation lines', () => {
    expect(formatComments(['first\nsecond', 'third'], PLAIN)).toBe('↳ first\n  second\n↳ third');
  });

  it('drops blank lines across line-ending styles', () => {
    expect(formatComments(['a\r\n\r\nb\rc'], PLAIN)).toBe('↳ a\n  b\n  c');
  });

  it('dims the whole block under ANSI', () => {
    expect(formatComments(['note'], ANSI)).toBe('\u001B[90m↳ note\u001B[0m');
  });

  it('returns undefined for no comments', () => {
    expect(formatComments([], PLAIN)).toBeUndefined();
  });
});

describe('labeledArguments', () => {
  it('labels named parameters and leaves placeholders bare', () => {
    const parameters = [
      { index: 0, firstName: 'name' },
      { index: 1, firstName: '_' },
      { index: 2, firstName: 'with', secondName: 'options' },
    ];
    expect(labeledArguments({ arguments: ['ok', 7, { deep: true }], isParameterized: true }, parameters)).toBe(
      'name → "ok", 7, options → { deep: true }',
    );
  });

  it('skips parameters without an argument', () => {
    expect(labeledArguments({ arguments: [1], isParameterized: true }, [
      { index: 0, firstName: 'a' },
      { index: 1, firstName: 'b' },
    ])).toBe('a → 1');
  });

  it('quotes strings and inspects everything else', () => {
    expect(describeArgument('x"y')).toBe('"x\\"y"');
    expect(describeArgument(null)).toBe('null');
    expect(describeArgument([1, 2])).toBe('[ 1, 2 ]');
  });
});

describe('describeIssueKind', () => {
  it('describes each kind', () => {
    expect(describeIssueKind({ type: 'errorCaught', description: 'TypeError: boom' })).toBe('Caught error: TypeError: boom');
    expect(describeIssueKind({ type: 'timeLimitExceeded', seconds: 1 })).toBe('Time limit was exceeded: 1 second');
    expect(describeIssueKind({ type: 'confirmationMiscounted', actual: 1, expected: 3 })).toBe(
      'Confirmation was confirmed 1 time, but expected to be confirmed 3 times',
    );
    expect(describeIssueKind({ type: 'knownIssueNotRecorded' })).toBe('Known issue was not recorded');
    expect(describeIssueKind({ type: 'apiMisused' })).toBe('An API was misused');
    expect(describeIssueKind({ type: 'system' })).toBe('A system failure occurred');
  });
});
