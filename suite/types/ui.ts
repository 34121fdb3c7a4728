// suite/types/ui.ts

/** Prefix symbols used across recorder output. */
export type SymbolName = 'default' | 'skip' | 'pass' | 'passWithKnownIssues' | 'fail' | 'difference' | 'warning';

export type GlyphTableName = 'unicode' | 'windows' | 'icon';

export interface GlyphTable {
  symbols: Record<SymbolName, string>;
  /** Leads each comment line. */
  arrow: string;
}

export const GLYPH_TABLES: Record<GlyphTableName, GlyphTable> = {
  unicode: {
    symbols: {
      default: '◇', // WHITE DIAMOND
      skip: '✘', // HEAVY BALLOT X
      pass: '✔', // HEAVY CHECK MARK
      passWithKnownIssues: '✘',
      fail: '✘',
      difference: '±', // PLUS-MINUS SIGN
      warning: '⚠︎', // WARNING SIGN, text presentation
    },
    arrow: '↳', // DOWNWARDS ARROW WITH TIP RIGHTWARDS
  },
  // Consolas lacks most of the above.
  windows: {
    symbols: {
      default: '◊', // LOZENGE
      skip: '×', // MULTIPLICATION SIGN
      pass: '√', // SQUARE ROOT
      passWithKnownIssues: '×',
      fail: '×',
      difference: '±',
      warning: '!',
    },
    arrow: '↳',
  },
  // SF Symbols, private use area
  icon: {
    symbols: {
      default: '\u{1007C8}', // diamond
      skip: '\u{10065F}', // arrow.triangle.turn.up.right.diamond.fill
      pass: '\u{10105B}', // checkmark.diamond.fill
      passWithKnownIssues: '\u{100884}', // xmark.diamond.fill
      fail: '\u{100884}',
      difference: '\u{10017A}', // plus.forwardslash.minus
      warning: '\u{1001FF}', // exclamationmark.triangle.fill
    },
    arrow: '\u{100135}', // arrow.turn.down.right
  },
};

/** Drawn once per distinct tag color before a test name. */
export const TAG_DOT = '●'; // BLACK CIRCLE
