// test/unit/logger.test.ts
import * as os from 'node:os';
import * as path from 'node:path';
import { PassThrough } from 'node:stream';

import fs from 'fs-extra';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';

import {
  buildEventsLogPath,
  createConsoleSink,
  createFileSink,
  eventsLogFromEnv,
  makeLogStamp,
  stripAnsi,
  teeSink,
} from '../../suite/components/logger.ts';

describe('sinks', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'recorder-sinks-'));
  });

  afterEach(() => {
    fs.removeSync(dir);
  });

  it('appends to a file, creating its directory', async () => {
    const file = path.join(dir, 'nested', 'events.log');
    const sink = createFileSink(file);
    sink.write('◇ Test a started.\n');
    sink.write('✔ Test a passed after 0.001 seconds.\n');
    await sink.close();

    expect(fs.readFileSync(file, 'utf8')).toBe('◇ Test a started.\n✔ Test a passed after 0.001 seconds.\n');
  });

  it('strips escapes from plain file logs', async () => {
    const file = path.join(dir, 'events.log');
    const sink = createFileSink(file, { plain: true });
    sink.write('\u001B[92m✔\u001B[0m Test \u001B[38;5;67m●\u001B[0m a passed.\n');
    await sink.close();

    expect(fs.readFileSync(file, 'utf8')).toBe('✔ Test ● a passed.\n');
  });

  it('reports a stream failure and drops later writes', async () => {
    const onError = vi.fn();
    // the temp directory itself cannot be opened for appending
    const sink = createFileSink(dir, { onError });

    await vi.waitFor(() => expect(onError).toHaveBeenCalledTimes(1));
    sink.write('lost\n');
    await sink.close();

    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0][0]).toMatchObject({ code: 'EISDIR' });
  });

  it('hands the error handler through from the environment', async () => {
    const onError = vi.fn();
    const sink = eventsLogFromEnv(
      { EVENT_RECORDER_LOG_DIR: dir, EVENT_RECORDER_LOG_STAMP: 'run-1' },
      onError,
    );
    expect(sink?.filePath).toBe(path.join(dir, 'run-1', 'events.log'));
    await sink?.close();
    expect(onError).not.toHaveBeenCalled();
  });

  it('writes console output unchanged', async () => {
    const stream = new PassThrough();
    const chunks: string[] = [];
    stream.on('data', (chunk: Buffer) => chunks.push(chunk.toString('utf8')));

    createConsoleSink(stream).write('\u001B[90m◇\u001B[0m Test run started.\n');
    await new Promise((resolve) => setImmediate(resolve));
    expect(chunks.join('')).toBe('\u001B[90m◇\u001B[0m Test run started.\n');
  });

  it('fans out to every sink and closes them all', async () => {
    const a = { write: vi.fn(), close: vi.fn(async () => {}) };
    const b = { write: vi.fn(), close: vi.fn(async () => {}) };
    const tee = teeSink(a, b);

    tee.write('x\n');
    await tee.close();

    expect(a.write).toHaveBeenCalledWith('x\n');
    expect(b.write).toHaveBeenCalledWith('x\n');
    expect(a.close).toHaveBeenCalledTimes(1);
    expect(b.close).toHaveBeenCalledTimes(1);
  });
});

describe('log paths', () => {
  it('stamps runs with a filename-safe timestamp', () => {
    expect(makeLogStamp(new Date('2025-09-30T09:45:12.345Z'))).toBe('2025-09-30T09-45-12-345Z');
  });

  it('places the events log under the stamp', () => {
    expect(buildEventsLogPath('run-1', 'out')).toBe(path.join('out', 'run-1', 'events.log'));
  });

  it('only logs to a file when a log directory is configured', () => {
    expect(eventsLogFromEnv({})).toBeUndefined();
  });

  it('strips SGR sequences', () => {
    expect(stripAnsi('\u001B[91m✘\u001B[0m')).toBe('✘');
  });
});
