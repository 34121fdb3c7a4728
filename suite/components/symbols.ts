// suite/components/symbols.ts
import type { RecorderOptions } from '../types/recorder.ts';
import { GLYPH_TABLES, type GlyphTableName, type SymbolName } from '../types/ui.ts';
import { SGR, wrap } from './ansi.ts';

export type RecorderSymbol =
  | { type: 'default' }
  | { type: 'skip' }
  | { type: 'pass'; knownIssues: boolean }
  | { type: 'fail' }
  | { type: 'difference' }
  | { type: 'warning' };

export const Symbols = {
  default: { type: 'default' },
  skip: { type: 'skip' },
  pass: (knownIssues = false): RecorderSymbol => ({ type: 'pass', knownIssues }),
  fail: { type: 'fail' },
  difference: { type: 'difference' },
  warning: { type: 'warning' },
} as const satisfies Record<string, RecorderSymbol | ((knownIssues?: boolean) => RecorderSymbol)>;

export function glyphTableName(options: Pick<RecorderOptions, 'useIconGlyphs' | 'platform'>): GlyphTableName {
  const platform = options.platform ?? process.platform;
  if (options.useIconGlyphs && platform === 'darwin') return 'icon';
  if (platform === 'win32') return 'windows';
  return 'unicode';
}

function tableKey(symbol: RecorderSymbol): SymbolName {
  switch (symbol.type) {
    case 'pass':
      return symbol.knownIssues ? 'passWithKnownIssues' : 'pass';
    case 'default':
    case 'skip':
    case 'fail':
    case 'difference':
    case 'warning':
      return symbol.type;
    default: {
      const unreachable: never = symbol;
      return unreachable;
    }
  }
}

function sgrFor(symbol: RecorderSymbol): string {
  switch (symbol.type) {
    case 'default':
    case 'skip':
    case 'difference':
      return SGR.dim;
    case 'pass':
      return symbol.knownIssues ? SGR.dim : SGR.brightGreen;
    case 'fail':
      return SGR.brightRed;
    case 'warning':
      return SGR.brightYellow;
    default: {
      const unreachable: never = symbol;
      return unreachable;
    }
  }
}

/**
 * A glyph from the table the options select, wrapped in its color when ANSI is on.
 * Icon glyphs render narrow in most terminals, so they get a trailing space under ANSI.
 */
export function renderSymbol(symbol: RecorderSymbol, options: RecorderOptions): string {
  const tableName = glyphTableName(options);
  let glyph = GLYPH_TABLES[tableName].symbols[tableKey(symbol)];
  if (!options.useANSIEscapeCodes) return glyph;
  if (tableName === 'icon') glyph += ' ';
  return wrap(glyph, sgrFor(symbol));
}

/** Arrow that leads comment lines, following the same table and spacing rules. */
export function renderArrow(options: RecorderOptions): string {
  const tableName = glyphTableName(options);
  const arrow = GLYPH_TABLES[tableName].arrow;
  return tableName === 'icon' && options.useANSIEscapeCodes ? `${arrow} ` : arrow;
}

/**
 * Advisory message prefixed with the warning glyph. The caller decides where it goes.
 */
export function warning(message: string, options: RecorderOptions): string {
  return `${renderSymbol(Symbols.warning, options)} ${message}`;
}
