// suite/types/events.ts
import type { Instant } from '../components/clock.ts';

/** Hierarchical identity of a test: module/file, enclosing suites, then the test itself. */
export interface TestId {
  readonly keyPath: readonly string[];
}

export interface Tag {
  readonly rawValue: string;
  /** How the tag was spelled where it was declared, e.g. ".critical" */
  readonly sourceCode?: string;
}

export interface ParameterInfo {
  readonly index: number;
  readonly firstName: string;
  readonly secondName?: string;
}

export interface SourceLocation {
  readonly fileID: string;
  readonly line: number;
  readonly column: number;
}

export interface TestDescriptor {
  readonly id: TestId;
  readonly name: string;
  readonly displayName?: string;
  readonly isSuite: boolean;
  readonly tags: readonly Tag[];
  readonly comments: readonly string[];
  readonly parameters?: readonly ParameterInfo[];
}

export interface TestCaseDescriptor {
  readonly arguments: readonly unknown[];
  readonly isParameterized: boolean;
}

export interface Expectation {
  readonly description: string;
  readonly differenceDescription?: string;
}

export type IssueKind =
  | { readonly type: 'expectationFailed'; readonly expectation: Expectation }
  | { readonly type: 'errorCaught'; readonly description: string }
  | { readonly type: 'unconditional' }
  | { readonly type: 'timeLimitExceeded'; readonly seconds: number }
  | { readonly type: 'confirmationMiscounted'; readonly actual: number; readonly expected: number }
  | { readonly type: 'knownIssueNotRecorded' }
  | { readonly type: 'apiMisused' }
  | { readonly type: 'system' };

export interface Issue {
  readonly kind: IssueKind;
  readonly isKnown: boolean;
  readonly comments: readonly string[];
  readonly sourceLocation?: SourceLocation;
}

export interface SkipInfo {
  readonly comment?: string;
}

type Stamped<K extends string, P = unknown> = { readonly kind: K; readonly instant: Instant } & P;

export type TestEvent =
  | Stamped<'runStarted'>
  | Stamped<'runEnded'>
  | Stamped<'planStepStarted'>
  | Stamped<'planStepEnded'>
  | Stamped<'testStarted'>
  | Stamped<'testEnded'>
  | Stamped<'testSkipped', { readonly skipInfo: SkipInfo }>
  /** Superseded by `testSkipped`; still emitted by older engines. */
  | Stamped<'testBypassed', { readonly skipInfo: SkipInfo }>
  | Stamped<'expectationChecked', { readonly expectation: Expectation }>
  | Stamped<'issueRecorded', { readonly issue: Issue }>
  | Stamped<'testCaseStarted'>
  | Stamped<'testCaseEnded'>;

export type TestEventKind = TestEvent['kind'];

/** Engine-owned state current at the time an event is emitted. */
export interface EventContext {
  readonly test?: TestDescriptor;
  readonly testCase?: TestCaseDescriptor;
}
