// suite/reporter/event-recorder.ts

import { describeDuration } from '../components/clock.ts';
import { RESET } from '../components/ansi.ts';
import { UNKNOWN_TEST_NAME } from '../components/constants.ts';
import { collectEnvironmentInfo, environmentComments } from '../components/environment.ts';
import {
  counting,
  describeIssueKind,
  formatComments,
  formatSourceLocation,
  issueSuffix,
  labeledArguments,
} from '../components/format.ts';
import { Symbols, renderSymbol, type RecorderSymbol } from '../components/symbols.ts';
import { colorDots, mergeTagColors } from '../components/tag-colors.ts';
import type { EventContext, Issue, TestDescriptor, TestEvent } from '../types/events.ts';
import type { EnvironmentInfo, RecorderOptions, TagColorMap, WriteFn } from '../types/recorder.ts';
import { RunContext } from './core/run-context.ts';

/**
 * Event Recorder
 *
 * Turns test events into human-readable lines and hands them to a write
 * function. The wording is for people and may change; do not parse it.
 *
 * Safe to call from interleaved tests: state changes go through RunContext,
 * and text is built from snapshots after the lock is released.
 */
export class EventRecorder {
  readonly options: Readonly<RecorderOptions>;
  readonly tagColors: TagColorMap;

  private readonly context = new RunContext();
  private readonly environment: EnvironmentInfo;

  constructor(
    options: RecorderOptions,
    private readonly write: WriteFn,
  ) {
    this.options = { ...options };
    this.tagColors = mergeTagColors(options.tagColors);
    this.environment = options.environment ?? collectEnvironmentInfo();
  }

  /** Render and write. Returns whether anything was written. */
  record(event: TestEvent, eventContext: EventContext = {}): boolean {
    const output = this.render(event, eventContext);
    if (output === undefined) return false;
    this.write(output);
    return true;
  }

  /** Text for `event`, or undefined for kinds that are not worth showing. */
  render(event: TestEvent, eventContext: EventContext = {}): string | undefined {
    const { test, testCase } = eventContext;
    const testName = this.testName(test);
    const instant = event.instant;

    switch (event.kind) {
      case 'runStarted': {
        this.context.recordRunStart(instant);
        const symbol = this.symbol(Symbols.default);
        const comments = formatComments(environmentComments(this.environment), this.options);
        return comments !== undefined
          ? `${symbol} Test run started.\n${comments}\n`
          : `${symbol} Test run started.\n`;
      }

      case 'testStarted': {
        if (!test) return undefined;
        this.context.beginEntry(test.id, instant);
        this.context.incrementRunCount(test.isSuite);
        return `${this.symbol(Symbols.default)} Test ${testName} started.\n`;
      }

      case 'testEnded': {
        if (!test) return undefined;
        const subtree = this.context.readSubtree(test.id);
        const duration = describeDuration(subtree.root?.startInstant ?? instant, instant);
        const suffix = issueSuffix(subtree.issueCount, subtree.knownIssueCount);
        if (subtree.issueCount > 0) {
          const comments = formatComments(test.comments, this.options);
          const tail = comments !== undefined ? `${comments}\n` : '';
          return `${this.symbol(Symbols.fail)} Test ${testName} failed after ${duration}${suffix}.\n${tail}`;
        }
        const symbol = this.symbol(Symbols.pass(subtree.knownIssueCount > 0));
        return `${symbol} Test ${testName} passed after ${duration}${suffix}.\n`;
      }

      case 'testSkipped': {
        if (!test) return undefined;
        this.context.beginEntry(test.id, instant);
        this.context.incrementRunCount(test.isSuite);
        const symbol = this.symbol(Symbols.skip);
        const comment = event.skipInfo.comment;
        return comment !== undefined
          ? `${symbol} Test ${testName} skipped: "${comment}"\n`
          : `${symbol} Test ${testName} skipped.\n`;
      }

      case 'issueRecorded':
        this.context.incrementIssue(test?.id, event.issue.isKnown, instant);
        return this.describeIssue(event.issue, testName, eventContext);

      case 'testCaseStarted': {
        const parameters = test?.parameters;
        if (!testCase?.isParameterized || !parameters) return undefined;
        const args = labeledArguments(testCase, parameters);
        return `${this.symbol(Symbols.default)} Passing ${counting(parameters.length, 'argument')} ${args} to ${testName}\n`;
      }

      case 'runEnded': {
        const run = this.context.readAll();
        const duration = describeDuration(run.runStartInstant ?? instant, instant);
        const suffix = issueSuffix(run.issueCount, run.knownIssueCount);
        const tests = counting(run.testCount, 'test');
        if (run.issueCount > 0) {
          return `${this.symbol(Symbols.fail)} Test run with ${tests} failed after ${duration}${suffix}.\n`;
        }
        const symbol = this.symbol(Symbols.pass(run.knownIssueCount > 0));
        return `${symbol} Test run with ${tests} passed after ${duration}${suffix}.\n`;
      }

      // Not interesting to a human reader.
      case 'planStepStarted':
      case 'planStepEnded':
      case 'expectationChecked':
      case 'testCaseEnded':
      case 'testBypassed':
        return undefined;

      default: {
        const unreachable: never = event;
        return unreachable;
      }
    }
  }

  private symbol(symbol: RecorderSymbol): string {
    return renderSymbol(symbol, this.options);
  }

  private testName(test: TestDescriptor | undefined): string {
    if (!test) return UNKNOWN_TEST_NAME;
    const name = test.displayName !== undefined ? `"${test.displayName}"` : test.name;
    if (!this.options.useANSIEscapeCodes || test.tags.length === 0) return name;
    const dots = colorDots(test.tags, this.tagColors, this.options);
    return dots ? `${dots}${RESET} ${name}` : name;
  }

  private describeIssue(issue: Issue, testName: string, { test, testCase }: EventContext): string {
    const symbol = issue.isKnown ? this.symbol(Symbols.pass(true)) : this.symbol(Symbols.fail);
    const article = issue.isKnown ? 'a known' : 'an';

    let difference = '';
    if (issue.kind.type === 'expectationFailed' && issue.kind.expectation.differenceDescription !== undefined) {
      difference = `\n${this.symbol(Symbols.difference)} ${issue.kind.expectation.differenceDescription}`;
    }

    const comments = formatComments(issue.comments, this.options);
    const issueComments = comments !== undefined ? `\n${comments}` : '';
    const at = issue.sourceLocation ? ` at ${formatSourceLocation(issue.sourceLocation)}` : '';
    const detail = `${at}: ${describeIssueKind(issue.kind)}${difference}${issueComments}\n`;

    const parameters = test?.parameters ?? [];
    if (parameters.length === 0) {
      return `${symbol} Test ${testName} recorded ${article} issue${detail}`;
    }
    const args = testCase ? labeledArguments(testCase, parameters) : '';
    return `${symbol} Test ${testName} recorded ${article} issue with ${counting(parameters.length, 'argument')} ${args}${detail}`;
  }
}
