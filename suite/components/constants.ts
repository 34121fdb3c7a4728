// suite/components/constants.ts

// Environment variable names
export const ENV_NO_COLOR = 'NO_COLOR';
export const ENV_FORCE_COLOR = 'FORCE_COLOR';
export const ENV_TERM = 'TERM';
export const ENV_COLORTERM = 'COLORTERM';
export const ENV_ICON_GLYPHS = 'EVENT_RECORDER_ICON_GLYPHS';
export const ENV_TAG_COLORS = 'EVENT_RECORDER_TAG_COLORS';
export const ENV_LOG_STAMP = 'EVENT_RECORDER_LOG_STAMP';
export const ENV_LOG_DIR = 'EVENT_RECORDER_LOG_DIR';

// Tag colors file, relative to the home directory
export const TAG_COLORS_DIR = '.event-recorder';
export const TAG_COLORS_FILE = 'tag-colors.json';

// Log layout: <LOGS_DIR>/<stamp>/<EVENTS_LOG_FILE>
export const LOGS_DIR = 'logs';
export const EVENTS_LOG_FILE = 'events.log';

/** Shown when an event has no associated test. */
export const UNKNOWN_TEST_NAME = '«unknown»';

/** Parameter label that stands in for "no name". */
export const PLACEHOLDER_LABEL = '_';
