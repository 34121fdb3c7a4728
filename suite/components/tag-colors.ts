// suite/components/tag-colors.ts
import * as os from 'node:os';
import * as path from 'node:path';

import fs from 'fs-extra';
import { z } from 'zod';

import type { Tag } from '../types/events.ts';
import {
  BUILTIN_COLOR_NAMES,
  type BuiltinColorName,
  type RecorderOptions,
  type TagColor,
  type TagColorMap,
} from '../types/recorder.ts';
import { TAG_DOT } from '../types/ui.ts';
import { ESC, colorCubeIndex } from './ansi.ts';
import { TAG_COLORS_DIR, TAG_COLORS_FILE } from './constants.ts';

export const BUILTIN_COLORS: Readonly<Record<BuiltinColorName, TagColor>> = {
  red: { red: 255, green: 0, blue: 0, name: 'red' },
  orange: { red: 255, green: 128, blue: 0, name: 'orange' },
  yellow: { red: 255, green: 204, blue: 0, name: 'yellow' },
  green: { red: 0, green: 200, blue: 0, name: 'green' },
  blue: { red: 0, green: 0, blue: 255, name: 'blue' },
  purple: { red: 192, green: 0, blue: 255, name: 'purple' },
};

/** 16-color foreground codes for the built-in colors. */
const BASIC_SGR: Readonly<Record<BuiltinColorName, number>> = {
  red: 91,
  orange: 33,
  yellow: 93,
  green: 92,
  blue: 94,
  purple: 95,
};

function isBuiltinName(value: string): value is BuiltinColorName {
  return (BUILTIN_COLOR_NAMES as readonly string[]).includes(value);
}

/**
 * Merge override sources over the built-in tags. On a key collision the
 * built-in binding wins, then the earliest source that names the key.
 */
export function mergeTagColors(sources: readonly TagColorMap[] = []): TagColorMap {
  const merged = new Map<string, TagColor>();
  for (const name of BUILTIN_COLOR_NAMES) merged.set(name, BUILTIN_COLORS[name]);
  for (const source of sources) {
    for (const [tag, color] of source) {
      if (!merged.has(tag)) merged.set(tag, color);
    }
  }
  return merged;
}

export function resolveTagColor(tag: Tag, colors: TagColorMap): TagColor | undefined {
  return colors.get(tag.rawValue) ?? (tag.sourceCode != null ? colors.get(tag.sourceCode) : undefined);
}

/** Colors are equal when their RGB values are; `name` is only a label. */
function colorKey(color: TagColor): string {
  return `${color.red},${color.green},${color.blue}`;
}

/** The built-in with the same RGB value as `color`, if any. */
export function builtinNameOf(color: TagColor): BuiltinColorName | undefined {
  const key = colorKey(color);
  return BUILTIN_COLOR_NAMES.find((name) => colorKey(BUILTIN_COLORS[name]) === key);
}

export function compareColors(a: TagColor, b: TagColor): number {
  return (
    a.red - b.red ||
    a.green - b.green ||
    a.blue - b.blue ||
    (a.name ?? '').localeCompare(b.name ?? '')
  );
}

/** Foreground escape for a color, or undefined when this mode cannot show it. */
export function colorEscape(color: TagColor, options: RecorderOptions): string | undefined {
  if (!options.useANSIEscapeCodes) return undefined;
  if (options.use256ColorANSIEscapeCodes) {
    return `${ESC}38;5;${colorCubeIndex(color.red, color.green, color.blue)}m`;
  }
  // 16 colors: only the built-ins have a code; anything else gets no dot.
  const name = builtinNameOf(color);
  return name !== undefined ? `${ESC}${BASIC_SGR[name]}m` : undefined;
}

/**
 * One colored dot per distinct color among `tags`, in color order.
 * No reset is included; callers close the sequence once.
 */
export function colorDots(tags: readonly Tag[], colors: TagColorMap, options: RecorderOptions): string {
  const distinct = new Map<string, TagColor>();
  for (const tag of tags) {
    const color = resolveTagColor(tag, colors);
    if (color) distinct.set(colorKey(color), color);
  }
  return [...distinct.values()]
    .sort(compareColors)
    .map((color) => colorEscape(color, options))
    .filter((escape): escape is string => escape !== undefined)
    .map((escape) => `${escape}${TAG_DOT}`)
    .join('');
}

// ---------------------------------------------------------------------------
// tag-colors.json
// ---------------------------------------------------------------------------

const HEX_COLOR = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i;

export function parseColor(value: string): TagColor | undefined {
  const lower = value.trim().toLowerCase();
  if (isBuiltinName(lower)) return BUILTIN_COLORS[lower];
  const m = lower.match(HEX_COLOR);
  if (!m) return undefined;
  return { red: parseInt(m[1], 16), green: parseInt(m[2], 16), blue: parseInt(m[3], 16) };
}

const tagColorsFileSchema = z.record(
  z.string().min(1),
  z.string().refine((v) => parseColor(v) !== undefined, {
    message: 'expected a built-in color name or #RRGGBB',
  }),
);

export class TagColorsFileError extends Error {
  constructor(
    readonly filePath: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${filePath}: ${message}`, options);
    this.name = 'TagColorsFileError';
  }
}

export function defaultTagColorsPath(home = os.homedir()): string {
  return path.join(home, TAG_COLORS_DIR, TAG_COLORS_FILE);
}

/**
 * Read a `{ "tag": "color" }` file. A missing file yields an empty map;
 * anything unreadable or malformed throws TagColorsFileError.
 */
export function loadTagColors(filePath: string): TagColorMap {
  if (!fs.pathExistsSync(filePath)) return new Map();

  let raw: unknown;
  try {
    raw = fs.readJsonSync(filePath);
  } catch (err) {
    throw new TagColorsFileError(filePath, 'could not read tag colors', { cause: err });
  }

  const parsed = tagColorsFileSchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first.path.length ? ` at "${first.path.join('.')}"` : '';
    throw new TagColorsFileError(filePath, `invalid tag colors${where}: ${first.message}`, {
      cause: parsed.error,
    });
  }

  const colors = new Map<string, TagColor>();
  for (const [tag, value] of Object.entries(parsed.data)) {
    const color = parseColor(value);
    if (color) colors.set(tag, color);
  }
  return colors;
}
