import chalk from "chalk";

export const theme = {
  heading: chalk.bold.cyan,
  success: chalk.green,
  warn: chalk.yellow,
  error: chalk.red,
  muted: chalk.gray,
  accent: chalk.magenta,
} as const;

export type ThemeColor = (typeof theme)[keyof typeof theme];

export function isRich(stream: NodeJS.WriteStream = process.stdout): boolean {
  if (process.env.NO_COLOR) {
    return false;
  }
  return Boolean(stream.isTTY) && chalk.level > 0;
}

export function colorize(rich: boolean, color: ThemeColor, text: string): string {
  return rich ? color(text) : text;
}
