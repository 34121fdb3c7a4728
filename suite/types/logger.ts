// suite/types/logger.ts
import type { WriteFn } from './recorder.ts';

export type OutputSink = {
  /** Set for sinks backed by a file. */
  filePath?: string;
  write: WriteFn;
  /** Flush and release the destination. Console sinks resolve immediately. */
  close: () => Promise<void>;
};
