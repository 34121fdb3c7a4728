// suite/types/recorder.ts

export const BUILTIN_COLOR_NAMES = ['red', 'orange', 'yellow', 'green', 'blue', 'purple'] as const;
export type BuiltinColorName = (typeof BUILTIN_COLOR_NAMES)[number];

export interface TagColor {
  readonly red: number;
  readonly green: number;
  readonly blue: number;
  /** Set for the six built-in colors; drives the 16-color mapping. */
  readonly name?: BuiltinColorName;
}

/** Tag raw value (or its source spelling) to color. */
export type TagColorMap = ReadonlyMap<string, TagColor>;

export type GlyphPlatform = NodeJS.Platform;

export interface EnvironmentInfo {
  libraryVersion: string;
  runtimeVersion: string;
  osVersion: string;
}

export interface RecorderOptions {
  useANSIEscapeCodes?: boolean;
  /** Ignored unless `useANSIEscapeCodes` is also set. */
  use256ColorANSIEscapeCodes?: boolean;
  /** Private-use icon glyphs; only honoured on darwin, where the symbol font ships. */
  useIconGlyphs?: boolean;
  /**
   * Tag color overrides, one map per configuration source.
   * Earlier sources win over later ones; built-in colors win over all of them.
   */
  tagColors?: readonly TagColorMap[];
  /** Host used to pick the glyph table. Defaults to `process.platform`. */
  platform?: GlyphPlatform;
  /** Shown under "Test run started.". Defaults to the running process. */
  environment?: EnvironmentInfo;
}

/** Accepts one chunk of rendered output. May be invoked concurrently. */
export type WriteFn = (text: string) => void;
