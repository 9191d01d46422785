export const ansi = {
  bold: "\u001B[1m",
  reset: "\u001B[0m",
  red: "\u001B[31m",
  green: "\u001B[32m",
  yellow: "\u001B[33m",
  clearScreen: "\u001B[H\u001B[J",
} as const;

export type AnsiStyle = Exclude<keyof typeof ansi, "reset" | "clearScreen">;

// oxlint-disable-next-line no-control-regex
const escapeSequencePattern = /\u001B\[[0-?]*[ -/]*[@-~]/g;

export function stripAnsi(text: string): string {
  return text.replace(escapeSequencePattern, "");
}

export function visibleLength(text: string): number {
  return stripAnsi(text).length;
}

export function padVisibleStart(text: string, width: number): string {
  return " ".repeat(Math.max(0, width - visibleLength(text))) + text;
}

export function padVisibleEnd(text: string, width: number): string {
  return text + " ".repeat(Math.max(0, width - visibleLength(text)));
}

export function paint(text: string, styles: readonly AnsiStyle[], enabled: boolean): string {
  if (!enabled || styles.length === 0) {
    return text;
  }
  return `${styles.map((style) => ansi[style]).join("")}${text}${ansi.reset}`;
}
