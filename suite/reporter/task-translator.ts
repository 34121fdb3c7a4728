// suite/reporter/task-translator.ts

import { Instant } from '../components/clock.ts';
import type { EventContext, Issue, SourceLocation, TestEvent } from '../types/events.ts';
import type { CollectedTask, TaskCollector } from './collectors/task-collector.ts';

export interface StackFrameLike {
  file: string;
  line: number;
  column: number;
}

export interface TaskErrorLike {
  message?: string;
  name?: string;
  diff?: string;
  stacks?: readonly StackFrameLike[];
}

export interface TaskResultLike {
  state?: string;
  errors?: readonly TaskErrorLike[];
}

/** `[taskId, result, meta]` as Vitest reports it. */
export type TaskUpdate = readonly [id: string, result: TaskResultLike | undefined, ...rest: unknown[]];

export type EmitFn = (event: TestEvent, context: EventContext) => void;

/**
 * Task Translator
 *
 * Turns Vitest task state changes into recorder events:
 * - run          → testStarted (enclosing suites first, each once)
 * - skip / todo  → testSkipped
 * - pass / fail  → one issueRecorded per error, then testEnded
 *
 * Within a batch, tests are handled before suites and inner suites before
 * outer ones, so a suite never ends ahead of its children.
 */
export class TaskTranslator {
  private started = new Set<string>();
  private finished = new Set<string>();

  constructor(
    private readonly collector: TaskCollector,
    private readonly emit: EmitFn,
    private readonly now: () => Instant = Instant.now,
  ) {}

  updateAll(packs: readonly TaskUpdate[]): void {
    const resolved = packs
      .map(([taskId, result]) => ({ task: this.collector.get(taskId), result }))
      .filter((u): u is { task: CollectedTask; result: TaskResultLike | undefined } => u.task !== undefined);

    const tests = resolved.filter((u) => !u.task.descriptor.isSuite);
    const suites = resolved
      .filter((u) => u.task.descriptor.isSuite)
      .sort((a, b) => b.task.depth - a.task.depth);

    for (const { task, result } of [...tests, ...suites]) {
      this.update(task, result);
    }
  }

  private update(task: CollectedTask, result: TaskResultLike | undefined): void {
    if (this.finished.has(task.taskId)) return;

    const state = result?.state;
    switch (state) {
      case 'run':
        this.start(task);
        return;
      case 'skip':
      case 'todo':
        this.skip(task, state === 'todo' || task.mode === 'todo' ? 'todo' : undefined);
        return;
      case 'pass':
      case 'fail':
        this.start(task);
        for (const error of result?.errors ?? []) {
          this.emit(
            { kind: 'issueRecorded', instant: this.now(), issue: this.toIssue(error) },
            { test: task.descriptor },
          );
        }
        this.end(task);
        return;
      default:
        // queued, or no result yet
        return;
    }
  }

  /** Suites collected as skipped get their own testSkipped and are never started. */
  private startAncestors(task: CollectedTask): void {
    for (const ancestor of this.collector.ancestors(task.taskId)) {
      if (ancestor.mode === 'skip' || ancestor.mode === 'todo') continue;
      this.start(ancestor, false);
    }
  }

  private start(task: CollectedTask, withAncestors = true): void {
    if (withAncestors) this.startAncestors(task);
    if (this.started.has(task.taskId)) return;
    this.started.add(task.taskId);
    this.emit({ kind: 'testStarted', instant: this.now() }, { test: task.descriptor });
  }

  private skip(task: CollectedTask, comment: string | undefined): void {
    this.startAncestors(task);
    this.finished.add(task.taskId);
    this.emit(
      { kind: 'testSkipped', instant: this.now(), skipInfo: comment !== undefined ? { comment } : {} },
      { test: task.descriptor },
    );
  }

  private end(task: CollectedTask): void {
    this.finished.add(task.taskId);
    this.emit({ kind: 'testEnded', instant: this.now() }, { test: task.descriptor });
  }

  private toIssue(error: TaskErrorLike): Issue {
    const message = error.message ?? 'unknown error';
    const frame = error.stacks?.[0];
    const sourceLocation: SourceLocation | undefined = frame
      ? { fileID: this.collector.relativePath(frame.file), line: frame.line, column: frame.column }
      : undefined;

    // Assertion failures carry a diff (or are named as such); anything else was thrown.
    const isAssertion = error.diff !== undefined || error.name === 'AssertionError';
    return {
      kind: isAssertion
        ? { type: 'expectationFailed', expectation: { description: message, differenceDescription: error.diff } }
        : { type: 'errorCaught', description: error.name ? `${error.name}: ${message}` : message },
      isKnown: false,
      comments: [],
      sourceLocation,
    };
  }
}
