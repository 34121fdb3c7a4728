// suite/components/logger.ts
import path from 'node:path';

import fs from 'fs-extra';

import type { OutputSink } from '../types/logger.ts';
import { ENV_LOG_DIR, ENV_LOG_STAMP, EVENTS_LOG_FILE, LOGS_DIR } from './constants.ts';

const SGR_PATTERN = /\u001B\[[0-9;]*m/g;

export function stripAnsi(text: string): string {
  return text.replace(SGR_PATTERN, '');
}

/** Writes text unchanged to a stream (stdout by default). */
export function createConsoleSink(stream: NodeJS.WritableStream = process.stdout): OutputSink {
  return {
    write: (text) => {
      stream.write(text);
    },
    close: () => Promise.resolve(),
  };
}

/**
 * Append rendered output to a file, creating its directory first.
 * With `plain`, escape sequences are stripped so the log reads cleanly in an editor.
 * With `onError`, a failed stream is reported there and later writes are dropped;
 * without it the stream's error is left unhandled.
 */
export function createFileSink(
  filePath: string,
  opts: { plain?: boolean; onError?: (err: Error) => void } = {},
): OutputSink {
  fs.ensureDirSync(path.dirname(filePath));
  const stream = fs.createWriteStream(filePath, { flags: 'a' });

  let failed = false;
  const { onError } = opts;
  if (onError) {
    stream.on('error', (err) => {
      if (failed) return;
      failed = true;
      onError(err);
    });
  }

  return {
    filePath,
    write: (text) => {
      if (failed) return;
      stream.write(opts.plain ? stripAnsi(text) : text, 'utf8');
    },
    close: () =>
      failed
        ? Promise.resolve()
        : new Promise<void>((resolve) => {
            stream.end(resolve);
          }),
  };
}

/** Fan out to several sinks, in order. */
export function teeSink(...sinks: OutputSink[]): OutputSink {
  return {
    write: (text) => {
      for (const sink of sinks) sink.write(text);
    },
    close: async () => {
      await Promise.all(sinks.map((sink) => sink.close()));
    },
  };
}

// Generate a run stamp (e.g. 2025-09-30T09-45-12-345Z)
export function makeLogStamp(d = new Date()) {
  return d.toISOString().replace(/[:.]/g, '-');
}

// <root>/<stamp>
export function buildLogRoot(stamp: string, root = LOGS_DIR): string {
  return path.join(root, stamp);
}

// <root>/<stamp>/events.log
export function buildEventsLogPath(stamp: string, root = LOGS_DIR): string {
  return path.join(buildLogRoot(stamp, root), EVENTS_LOG_FILE);
}

/**
 * Events log sink when EVENT_RECORDER_LOG_DIR is set; the stamp comes from
 * EVENT_RECORDER_LOG_STAMP or is generated.
 */
export function eventsLogFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  onError?: (err: Error) => void,
): OutputSink | undefined {
  const root = env[ENV_LOG_DIR];
  if (!root) return undefined;
  const stamp = env[ENV_LOG_STAMP] || makeLogStamp();
  return createFileSink(buildEventsLogPath(stamp, root), { plain: true, onError });
}
