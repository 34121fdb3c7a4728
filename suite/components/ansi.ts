// suite/components/ansi.ts
// SGR escape sequences used by the recorder.

export const ESC = '\u001B[';
export const RESET = `${ESC}0m`;

export const SGR = {
  dim: `${ESC}90m`,
  brightRed: `${ESC}91m`,
  brightGreen: `${ESC}92m`,
  brightYellow: `${ESC}93m`,
} as const;

export function wrap(text: string, sgr: string): string {
  return `${sgr}${text}${RESET}`;
}

/** Index into the 6x6x6 cube of the 256-color palette. */
export function colorCubeIndex(red: number, green: number, blue: number): number {
  const q = (c: number) => Math.floor((Math.min(255, Math.max(0, c)) * 5) / 255);
  return 16 + 36 * q(red) + 6 * q(green) + q(blue);
}
