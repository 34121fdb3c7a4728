// suite/reporter/core/run-context.ts

import { Instant } from '../../components/clock.ts';
import { Locked } from '../../components/locked.ts';
import type { TestId } from '../../types/events.ts';

/**
 * Run Context
 *
 * Aggregated state for one recorder:
 * - run start instant
 * - counts of tests and suites started or skipped
 * - per-test data keyed by the test's key path
 *
 * The hierarchy is kept flat: each node stores its own key path and subtree
 * queries match by prefix, so no tree has to be rebuilt as tests arrive.
 */

export interface TestData {
  startInstant: Instant;
  issueCount: number;
  knownIssueCount: number;
}

interface TestNode {
  keyPath: readonly string[];
  data: TestData;
}

interface RunState {
  runStartInstant: Instant | undefined;
  testCount: number;
  suiteCount: number;
  nodes: Map<string, TestNode>;
}

export interface IssueTotals {
  readonly issueCount: number;
  readonly knownIssueCount: number;
}

export interface SubtreeSnapshot extends IssueTotals {
  /** Data recorded for the queried id itself, if it was ever started. */
  readonly root: Readonly<TestData> | undefined;
}

export interface RunSnapshot extends IssueTotals {
  readonly runStartInstant: Instant | undefined;
  readonly testCount: number;
  readonly suiteCount: number;
}

// Unit separator; never appears in names a runner produces.
const KEY_SEPARATOR = '\u001F';

export function keyFor(id: TestId): string {
  return id.keyPath.join(KEY_SEPARATOR);
}

function isWithin(keyPath: readonly string[], prefix: readonly string[]): boolean {
  return prefix.length <= keyPath.length && prefix.every((part, i) => keyPath[i] === part);
}

function sumIssues(nodes: Iterable<TestNode>): IssueTotals {
  let issueCount = 0;
  let knownIssueCount = 0;
  for (const node of nodes) {
    issueCount += node.data.issueCount;
    knownIssueCount += node.data.knownIssueCount;
  }
  return { issueCount, knownIssueCount };
}

export class RunContext {
  private readonly state = new Locked<RunState>({
    runStartInstant: undefined,
    testCount: 0,
    suiteCount: 0,
    nodes: new Map(),
  });

  recordRunStart(instant: Instant): void {
    this.state.withLock((s) => {
      s.runStartInstant = instant;
    });
  }

  /** Start tracking `id`. A second call for the same id keeps the first entry. */
  beginEntry(id: TestId, instant: Instant = Instant.now()): void {
    const key = keyFor(id);
    this.state.withLock((s) => {
      if (s.nodes.has(key)) return;
      s.nodes.set(key, {
        keyPath: [...id.keyPath],
        data: { startInstant: instant, issueCount: 0, knownIssueCount: 0 },
      });
    });
  }

  incrementRunCount(isSuite: boolean): void {
    this.state.withLock((s) => {
      if (isSuite) s.suiteCount += 1;
      else s.testCount += 1;
    });
  }

  /**
   * Count an issue against `id`. Issues outside any test are not counted.
   * An id that was never started gets an entry starting at `instant`.
   */
  incrementIssue(id: TestId | undefined, known: boolean, instant: Instant = Instant.now()): void {
    if (!id) return;
    const key = keyFor(id);
    this.state.withLock((s) => {
      let node = s.nodes.get(key);
      if (!node) {
        node = {
          keyPath: [...id.keyPath],
          data: { startInstant: instant, issueCount: 0, knownIssueCount: 0 },
        };
        s.nodes.set(key, node);
      }
      if (known) node.data.knownIssueCount += 1;
      else node.data.issueCount += 1;
    });
  }

  readSubtree(id: TestId): SubtreeSnapshot {
    const key = keyFor(id);
    return this.state.withLock((s) => {
      const root = s.nodes.get(key);
      const within = [...s.nodes.values()].filter((node) => isWithin(node.keyPath, id.keyPath));
      return Object.freeze({
        ...sumIssues(within),
        root: root ? Object.freeze({ ...root.data }) : undefined,
      });
    });
  }

  readAll(): RunSnapshot {
    return this.state.withLock((s) =>
      Object.freeze({
        ...sumIssues(s.nodes.values()),
        runStartInstant: s.runStartInstant,
        testCount: s.testCount,
        suiteCount: s.suiteCount,
      }),
    );
  }
}
