// suite/components/options.ts
import type { RecorderOptions, TagColorMap } from '../types/recorder.ts';
import {
  ENV_COLORTERM,
  ENV_FORCE_COLOR,
  ENV_ICON_GLYPHS,
  ENV_NO_COLOR,
  ENV_TAG_COLORS,
  ENV_TERM,
} from './constants.ts';
import { TagColorsFileError, defaultTagColorsPath, loadTagColors } from './tag-colors.ts';

export interface ResolveOptionsInput {
  env?: NodeJS.ProcessEnv;
  /** Where output will go; only its TTY-ness matters. */
  stream?: { isTTY?: boolean };
  platform?: NodeJS.Platform;
  /** Overrides passed in code; they take precedence over the tag colors file. */
  tagColors?: readonly TagColorMap[];
}

export interface ResolvedOptions {
  options: RecorderOptions;
  /** Problems worth telling the user about; pass each through `warning()`. */
  warnings: string[];
}

const isSet = (v: string | undefined): v is string => v !== undefined && v !== '';

export function ansiEnabled(env: NodeJS.ProcessEnv, isTTY: boolean): boolean {
  if (isSet(env[ENV_NO_COLOR])) return false;
  const term = env[ENV_TERM];
  if (term === 'dumb') return false;
  const force = env[ENV_FORCE_COLOR];
  if (isSet(force)) return force !== '0';
  return isSet(term) && isTTY;
}

export function ansi256Enabled(env: NodeJS.ProcessEnv): boolean {
  const term = env[ENV_TERM] ?? '';
  const colorterm = (env[ENV_COLORTERM] ?? '').toLowerCase();
  return term.includes('256color') || colorterm === 'truecolor' || colorterm === '24bit';
}

/**
 * Derive recorder options from the environment:
 * NO_COLOR / FORCE_COLOR / TERM / COLORTERM for escapes, the icon glyph flag,
 * and the tag colors file (EVENT_RECORDER_TAG_COLORS or ~/.event-recorder/tag-colors.json).
 */
export function resolveRecorderOptions(input: ResolveOptionsInput = {}): ResolvedOptions {
  const env = input.env ?? process.env;
  const warnings: string[] = [];

  const useANSIEscapeCodes = ansiEnabled(env, input.stream?.isTTY ?? false);
  const tagColors: TagColorMap[] = [...(input.tagColors ?? [])];

  const tagColorsPath = env[ENV_TAG_COLORS] || defaultTagColorsPath();
  try {
    tagColors.push(loadTagColors(tagColorsPath));
  } catch (err) {
    if (!(err instanceof TagColorsFileError)) throw err;
    warnings.push(`Ignoring tag colors. ${err.message}`);
  }

  return {
    options: {
      useANSIEscapeCodes,
      use256ColorANSIEscapeCodes: useANSIEscapeCodes && ansi256Enabled(env),
      useIconGlyphs: env[ENV_ICON_GLYPHS] === '1',
      tagColors,
      platform: input.platform ?? process.platform,
    },
    warnings,
  };
}
