/**
 * Minimal terminal colors. Replaces chalk, zero deps.
 * Each function wraps text in ANSI escape codes with reset.
 */
export type Colorizer = (s: string) => string;

export interface Palette {
  bold: Colorizer;
  dim: Colorizer;
  red: Colorizer;
  green: Colorizer;
  yellow: Colorizer;
  cyan: Colorizer;
  magenta: Colorizer;
}

const esc = (code: string): Colorizer => (s) => `\x1b[${code}m${s}\x1b[0m`;
const plain: Colorizer = (s) => s;

export function palette(enabled: boolean): Palette {
  if (!enabled) {
    return { bold: plain, dim: plain, red: plain, green: plain, yellow: plain, cyan: plain, magenta: plain };
  }
  return {
    bold: esc("1"),
    dim: esc("2"),
    red: esc("31"),
    green: esc("32"),
    yellow: esc("33"),
    cyan: esc("36"),
    magenta: esc("35"),
  };
}
