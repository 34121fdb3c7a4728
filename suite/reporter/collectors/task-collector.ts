// suite/reporter/collectors/task-collector.ts

import * as path from 'node:path';

import type { TestDescriptor } from '../../types/events.ts';

/** The parts of a Vitest task the collector reads. */
export interface TaskNode {
  id: string;
  name: string;
  type: string;
  mode?: string;
  tasks?: readonly TaskNode[];
}

export interface FileNode extends TaskNode {
  filepath: string;
}

export interface CollectedTask {
  readonly taskId: string;
  readonly parentId: string | undefined;
  readonly depth: number;
  readonly mode: string | undefined;
  readonly descriptor: TestDescriptor;
}

/**
 * Task Collector
 *
 * Builds test descriptors from Vitest's task tree:
 * - Each file is a suite keyed by its path relative to the root
 * - describe blocks are nested suites
 * - Tests are leaves whose key path runs file → suites → name
 */
export class TaskCollector {
  private byId = new Map<string, CollectedTask>();

  constructor(private readonly rootDir: string = process.cwd()) {}

  collectFiles(files: readonly FileNode[]): void {
    for (const file of files) {
      this.collectFile(file);
    }
  }

  get(taskId: string): CollectedTask | undefined {
    return this.byId.get(taskId);
  }

  /** Enclosing suites of a task, outermost first. */
  ancestors(taskId: string): CollectedTask[] {
    const chain: CollectedTask[] = [];
    let parentId = this.byId.get(taskId)?.parentId;
    while (parentId !== undefined) {
      const parent = this.byId.get(parentId);
      if (!parent) break;
      chain.unshift(parent);
      parentId = parent.parentId;
    }
    return chain;
  }

  /** File path relative to the root, POSIX style. */
  relativePath(filePathAbs: string): string {
    return path.relative(this.rootDir, path.resolve(filePathAbs)).split(path.sep).join('/');
  }

  // ============================================================================
  // Private: Tree Walk
  // ============================================================================

  private collectFile(file: FileNode): void {
    const rel = this.relativePath(file.filepath);
    const descriptor: TestDescriptor = {
      id: { keyPath: [rel] },
      name: rel,
      isSuite: true,
      tags: [],
      comments: [],
    };
    this.byId.set(file.id, { taskId: file.id, parentId: undefined, depth: 0, mode: file.mode, descriptor });

    for (const child of file.tasks ?? []) {
      this.collectTask(child, file.id, [rel], 1);
    }
  }

  private collectTask(task: TaskNode, parentId: string, parentPath: readonly string[], depth: number): void {
    const keyPath = [...parentPath, task.name];
    const isSuite = task.type === 'suite';

    this.byId.set(task.id, {
      taskId: task.id,
      parentId,
      depth,
      mode: task.mode,
      descriptor: {
        id: { keyPath },
        name: task.name,
        isSuite,
        tags: [],
        comments: [],
      },
    });

    if (isSuite) {
      for (const child of task.tasks ?? []) {
        this.collectTask(child, task.id, keyPath, depth + 1);
      }
    }
  }
}
