// suite/components/format.ts
// Shared, pure formatting helpers reused by the recorder and the reporter.
import { inspect } from 'node:util';

import type { IssueKind, ParameterInfo, SourceLocation, TestCaseDescriptor } from '../types/events.ts';
import type { RecorderOptions } from '../types/recorder.ts';
import { SGR, wrap } from './ansi.ts';
import { PLACEHOLDER_LABEL } from './constants.ts';
import { renderArrow } from './symbols.ts';

/** "1 test", "0 tests", "2 issues" */
export function counting(count: number, noun: string): string {
  return `${count} ${count === 1 ? noun : `${noun}s`}`;
}

/** Tail of a pass/fail line, e.g. " with 3 issues (including 1 known issue)". */
export function issueSuffix(issueCount: number, knownIssueCount: number): string {
  if (issueCount > 0 && knownIssueCount > 0) {
    return ` with ${counting(issueCount + knownIssueCount, 'issue')} (including ${counting(knownIssueCount, 'known issue')})`;
  }
  if (knownIssueCount > 0) return ` with ${counting(knownIssueCount, 'known issue')}`;
  if (issueCount > 0) return ` with ${counting(issueCount, 'issue')}`;
  return '';
}

/**
 * Arrow-prefixed comment block. Continuation lines are indented to sit under
 * the arrow; blank lines are dropped. Undefined when there is nothing to show.
 */
export function formatComments(comments: readonly string[], options: RecorderOptions): string | undefined {
  if (comments.length === 0) return undefined;

  const arrow = renderArrow(options);
  const lines = comments.flatMap((comment) => {
    const [first, ...rest] = comment.split(/\r\n|\r|\n/).filter((line) => line.length > 0);
    if (first === undefined) return [];
    return [`${arrow} ${first}`, ...rest.map((line) => `  ${line}`)];
  });
  const block = lines.join('\n');

  return options.useANSIEscapeCodes ? wrap(block, SGR.dim) : block;
}

export function describeArgument(value: unknown): string {
  if (typeof value === 'string') return JSON.stringify(value);
  return inspect(value, { depth: 2, breakLength: Infinity });
}

/** "a → 1, b → 2"; arguments are paired with parameters by index. */
export function labeledArguments(testCase: TestCaseDescriptor, parameters: readonly ParameterInfo[]): string {
  return parameters
    .filter((parameter) => parameter.index < testCase.arguments.length)
    .map((parameter) => {
      const value = describeArgument(testCase.arguments[parameter.index]);
      const label = parameter.secondName ?? parameter.firstName;
      return label === PLACEHOLDER_LABEL ? value : `${label} → ${value}`;
    })
    .join(', ');
}

export function formatSourceLocation(location: SourceLocation): string {
  return `${location.fileID}:${location.line}:${location.column}`;
}

export function describeIssueKind(kind: IssueKind): string {
  switch (kind.type) {
    case 'expectationFailed':
      return `Expectation failed: ${kind.expectation.description}`;
    case 'errorCaught':
      return `Caught error: ${kind.description}`;
    case 'unconditional':
      return 'Issue recorded';
    case 'timeLimitExceeded':
      return `Time limit was exceeded: ${counting(kind.seconds, 'second')}`;
    case 'confirmationMiscounted':
      return `Confirmation was confirmed ${counting(kind.actual, 'time')}, but expected to be confirmed ${counting(kind.expected, 'time')}`;
    case 'knownIssueNotRecorded':
      return 'Known issue was not recorded';
    case 'apiMisused':
      return 'An API was misused';
    case 'system':
      return 'A system failure occurred';
    default: {
      const unreachable: never = kind;
      return unreachable;
    }
  }
}
