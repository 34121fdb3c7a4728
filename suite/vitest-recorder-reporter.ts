// suite/vitest-recorder-reporter.ts

import type { Reporter } from 'vitest/reporters';

import { Instant } from './components/clock.ts';
import { createConsoleSink, eventsLogFromEnv, teeSink } from './components/logger.ts';
import { resolveRecorderOptions } from './components/options.ts';
import { warning } from './components/symbols.ts';
import { TaskCollector, type FileNode } from './reporter/collectors/task-collector.ts';
import { EventRecorder } from './reporter/event-recorder.ts';
import { TaskTranslator, type TaskUpdate } from './reporter/task-translator.ts';
import type { OutputSink } from './types/logger.ts';
import type { EnvironmentInfo } from './types/recorder.ts';

export interface RecorderReporterOptions {
  /** Defaults to stdout, plus an events log when EVENT_RECORDER_LOG_DIR is set. */
  sink?: OutputSink;
  env?: NodeJS.ProcessEnv;
  /** Stream whose TTY-ness decides color output; defaults to stdout. */
  stream?: { isTTY?: boolean };
  rootDir?: string;
  environment?: EnvironmentInfo;
  now?: () => Instant;
}

/**
 * Recorder Reporter
 *
 * Streams a Vitest run as recorder lines:
 *   ◇ Test run started.
 *   ◇ Test math.test.ts started.
 *   ✘ Test adds failed after 0.004 seconds with 1 issue.
 *   ✘ Test run with 3 tests failed after 0.210 seconds with 1 issue.
 */
export default class RecorderReporter implements Reporter {
  private readonly sink: OutputSink;
  private readonly recorder: EventRecorder;
  private readonly collector: TaskCollector;
  private readonly translator: TaskTranslator;
  private readonly now: () => Instant;

  constructor(opts: RecorderReporterOptions = {}) {
    const env = opts.env ?? process.env;
    const { options, warnings } = resolveRecorderOptions({
      env,
      stream: opts.stream ?? process.stdout,
    });

    if (opts.sink) {
      this.sink = opts.sink;
    } else {
      const stdout = createConsoleSink();
      const log = this.openEventsLog(env, warnings, (message) => {
        stdout.write(`${warning(message, options)}\n`);
      });
      this.sink = log ? teeSink(stdout, log) : stdout;
    }

    this.now = opts.now ?? Instant.now;
    this.recorder = new EventRecorder({ ...options, environment: opts.environment }, (text) =>
      this.sink.write(text),
    );
    this.collector = new TaskCollector(opts.rootDir);
    this.translator = new TaskTranslator(
      this.collector,
      (event, context) => {
        this.recorder.record(event, context);
      },
      this.now,
    );

    for (const message of warnings) {
      this.sink.write(`${warning(message, options)}\n`);
    }
  }

  /** A log that cannot be opened or written becomes a warning; the run goes on. */
  private openEventsLog(
    env: NodeJS.ProcessEnv,
    warnings: string[],
    warn: (message: string) => void,
  ): OutputSink | undefined {
    try {
      return eventsLogFromEnv(env, (err) => warn(`Events log disabled. ${err.message}`));
    } catch (err) {
      if (!(err instanceof Error)) throw err;
      warnings.push(`Events log disabled. ${err.message}`);
      return undefined;
    }
  }

  onInit(): void {
    this.recorder.record({ kind: 'runStarted', instant: this.now() });
  }

  onCollected(files: readonly FileNode[] = []): void {
    this.collector.collectFiles(files);
  }

  onTaskUpdate(packs: readonly TaskUpdate[]): void {
    this.translator.updateAll(packs);
  }

  async onFinished(): Promise<void> {
    this.recorder.record({ kind: 'runEnded', instant: this.now() });
    await this.sink.close();
  }
}
