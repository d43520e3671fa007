import { SELECTORS } from "./selectors.js";
import type { PortalElement, PortalSession } from "../core/portal-session.js";

/** Upper-case, trim and collapse inner whitespace so labels compare reliably. */
export function normalizeLabel(text: string): string {
  return text.replace(/\s+/g, " ").trim().toUpperCase();
}

function isPlaceholder(label: string): boolean {
  const normalized = normalizeLabel(label);
  // "-- Select --", "--SELECT--", "Select District"
  return normalized === "" || /^[-\s]*SELECT\b/.test(normalized);
}

function isWordChar(c: string | undefined): boolean {
  return c !== undefined && /[A-Z0-9]/.test(c);
}

// "21EB028P1" occurs in "21EB028P1 - SHOP" but not in "21EB028P10 - SHOP"
function containsToken(label: string, wanted: string): boolean {
  let idx = label.indexOf(wanted);
  while (idx >= 0) {
    if (!isWordChar(label[idx - 1]) && !isWordChar(label[idx + wanted.length])) return true;
    idx = label.indexOf(wanted, idx + 1);
  }
  return false;
}

/**
 * Pick the dropdown option that corresponds to `target`. An exact
 * (normalised) match wins; otherwise exactly one option must contain the
 * target as a whole token. Returns the option's label as rendered, or null.
 */
export function matchOption(options: string[], target: string): string | null {
  const wanted = normalizeLabel(target);
  if (!wanted) return null;
  const candidates = options.filter((label) => !isPlaceholder(label));

  const exact = candidates.find((label) => normalizeLabel(label) === wanted);
  if (exact !== undefined) return exact;

  const partial = candidates.filter((label) => containsToken(normalizeLabel(label), wanted));
  return partial.length === 1 ? partial[0] : null;
}

export async function readOptionLabels(session: PortalSession, select: PortalElement): Promise<string[]> {
  const options = await session.findAll(SELECTORS.SELECT_OPTION, select);
  const labels: string[] = [];
  for (const option of options) {
    labels.push(await session.readText(option));
  }
  return labels;
}

export async function readHeaders(session: PortalSession, table: PortalElement): Promise<string[]> {
  const cells = await session.findAll(SELECTORS.TABLE_HEADER_CELL, table);
  const headers: string[] = [];
  for (const cell of cells) {
    headers.push(normalizeLabel(await session.readText(cell)));
  }
  return headers;
}

export async function readCells(session: PortalSession, row: PortalElement): Promise<string[]> {
  const cells = await session.findAll(SELECTORS.TABLE_CELL, row);
  const values: string[] = [];
  for (const cell of cells) {
    values.push(await session.readText(cell));
  }
  return values;
}

/** Index of the first header matching one of `aliases`, or -1. */
export function columnIndex(headers: string[], aliases: readonly string[]): number {
  for (const alias of aliases) {
    const idx = headers.indexOf(alias);
    if (idx >= 0) return idx;
  }
  return -1;
}

export function cellAt(cells: string[], index: number): string {
  if (index < 0) return "";
  return cells[index] ?? "";
}
