/**
 * Shared color utilities for the report writer.
 * Styles resolve to semantic color names, which map to ANSI codes for the terminal.
 */

export type MessageStyle = "success" | "warning" | "error" | "plain";

export type ColorName = "green" | "yellow" | "red" | "neutral";

const ANSI_RESET = "\x1b[0m";

/** Bold foreground colors; neutral renders unstyled */
export const ANSI_CODES: Record<ColorName, string> = {
  green: "\x1b[1;32m",
  yellow: "\x1b[1;33m",
  red: "\x1b[1;31m",
  neutral: "",
};

/** Map a message style to a semantic color */
export function getStyleColorName(style: MessageStyle): ColorName {
  switch (style) {
    case "success":
      return "green";
    case "warning":
      return "yellow";
    case "error":
      return "red";
    case "plain":
      return "neutral";
  }
}

/**
 * Wrap text in the style's ANSI sequence. The whole block is wrapped once,
 * embedded newlines included.
 */
export function paint(style: MessageStyle, text: string, colorize: boolean): string {
  const code = ANSI_CODES[getStyleColorName(style)];
  if (!colorize || code === "") return text;
  return `${code}${text}${ANSI_RESET}`;
}
