// suite/index.ts
export { EventRecorder } from './reporter/event-recorder.ts';
export { RunContext } from './reporter/core/run-context.ts';
export type { IssueTotals, RunSnapshot, SubtreeSnapshot, TestData } from './reporter/core/run-context.ts';
export { Instant, describeDuration } from './components/clock.ts';
export { counting, issueSuffix, formatComments, labeledArguments, describeIssueKind } from './components/format.ts';
export { Symbols, renderSymbol, warning } from './components/symbols.ts';
export type { RecorderSymbol } from './components/symbols.ts';
export {
  BUILTIN_COLORS,
  TagColorsFileError,
  colorDots,
  loadTagColors,
  mergeTagColors,
  parseColor,
} from './components/tag-colors.ts';
export { resolveRecorderOptions } from './components/options.ts';
export { collectEnvironmentInfo } from './components/environment.ts';
export { createConsoleSink, createFileSink, teeSink, makeLogStamp, buildEventsLogPath } from './components/logger.ts';
export { LockMisuseError, Locked } from './components/locked.ts';
export { default as RecorderReporter } from './vitest-recorder-reporter.ts';
export type * from './types/events.ts';
export type * from './types/recorder.ts';
export type { OutputSink } from './types/logger.ts';
