/**
 * Generic table formatting utilities for CLI output.
 *
 * Provides reusable functions for creating box-drawn tables
 * and formatting cookie names and scores consistently.
 */

// ─────────────────────────────────────────────────────────────
// Table Drawing Characters
// ─────────────────────────────────────────────────────────────

export const BOX = {
  // Single line
  topLeft: "┌",
  topRight: "┐",
  bottomLeft: "└",
  bottomRight: "┘",
  horizontal: "─",
  vertical: "│",
  teeDown: "┬",
  teeUp: "┴",
  teeRight: "├",
  teeLeft: "┤",
  cross: "┼",

  // Heavy line (for emphasis)
  heavyHorizontal: "━",
} as const;

// ─────────────────────────────────────────────────────────────
// Text Formatting Utilities
// ─────────────────────────────────────────────────────────────

/**
 * Drop the trailing " Cookie" from a catalog name.
 *
 * @example
 * ```ts
 * shortCookieName("Pure Vanilla Cookie (Ascended)"); // "Pure Vanilla (Ascended)"
 * ```
 */
export function shortCookieName(name: string): string {
  return name.replace(/ Cookie\b/, "");
}

/**
 * Short cookie name, truncated with an ellipsis if it still does
 * not fit.
 */
export function truncateCookieName(name: string, maxLen: number): string {
  const short = shortCookieName(name);
  if (short.length <= maxLen) return short;
  return short.substring(0, maxLen - 1) + "…";
}

/**
 * Pad a string to a fixed width, truncating if necessary.
 */
export function padTruncate(str: string, width: number, align: "left" | "right" = "left"): string {
  if (str.length > width) {
    return str.substring(0, width - 1) + "…";
  }
  return align === "left" ? str.padEnd(width) : str.padStart(width);
}

/**
 * Format a score with fixed decimals.
 */
export function formatScore(value: number, decimals: number = 1): string {
  return value.toFixed(decimals);
}

/**
 * Format a 0-100 value as a percentage.
 */
export function formatPercent(value: number, decimals: number = 0): string {
  return value.toFixed(decimals) + "%";
}

// ─────────────────────────────────────────────────────────────
// Table Building Utilities
// ─────────────────────────────────────────────────────────────

/**
 * Create a horizontal line for a table.
 */
export function horizontalLine(
  widths: number[],
  left: string,
  middle: string,
  right: string,
  fill: string = BOX.horizontal
): string {
  return left + widths.map((w) => fill.repeat(w)).join(middle) + right;
}

/**
 * Create a table row.
 */
export function tableRow(cells: string[], widths: number[]): string {
  const paddedCells = cells.map((cell, i) => {
    const width = widths[i] - 2; // Account for padding
    return " " + padTruncate(cell, width) + " ";
  });
  return BOX.vertical + paddedCells.join(BOX.vertical) + BOX.vertical;
}

/**
 * Options for building a simple table.
 */
export interface SimpleTableOptions {
  /** Column headers */
  headers: string[];
  /** Column widths (including padding) */
  widths: number[];
  /** Data rows */
  rows: string[][];
}

/**
 * Build a simple box-drawn table.
 */
export function buildTable(options: SimpleTableOptions): string {
  const { headers, widths, rows } = options;
  const lines: string[] = [];

  lines.push(horizontalLine(widths, BOX.topLeft, BOX.teeDown, BOX.topRight));
  lines.push(tableRow(headers, widths));
  lines.push(horizontalLine(widths, BOX.teeRight, BOX.cross, BOX.teeLeft));

  for (const row of rows) {
    lines.push(tableRow(row, widths));
  }

  lines.push(horizontalLine(widths, BOX.bottomLeft, BOX.teeUp, BOX.bottomRight));

  return lines.join("\n");
}

// ─────────────────────────────────────────────────────────────
// Decorative Headers
// ─────────────────────────────────────────────────────────────

/**
 * Create a section header with heavy line.
 */
export function sectionHeader(title: string, width: number = 68): string {
  return BOX.heavyHorizontal.repeat(width) + "\n" + title + "\n" + BOX.heavyHorizontal.repeat(width);
}
