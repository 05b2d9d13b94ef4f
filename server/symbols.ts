import { readFile } from "node:fs/promises";
import { errorMessage } from "./shared/errors.js";

export const TICKER_OK = /^[A-Z][A-Z0-9.-]{0,10}$/;

export function normalizeSymbol(raw: string): string | null {
  const s = raw.trim().toUpperCase();
  return TICKER_OK.test(s) ? s : null;
}

/** Values of the "symbol" column; quoted cells are not supported. */
export function parseSymbolsCsv(csv: string): string[] {
  const lines = csv.trim().split(/\r?\n/);
  if (!lines.length) return [];
  const idx = lines[0].split(",").map((h) => h.trim().toLowerCase()).indexOf("symbol");
  if (idx < 0) return [];

  const seen = new Set<string>();
  for (const line of lines.slice(1)) {
    const sym = normalizeSymbol(line.split(",")[idx] ?? "");
    if (sym) seen.add(sym);
  }
  return [...seen];
}

export async function readSymbols(file: string): Promise<string[]> {
  try {
    return parseSymbolsCsv(await readFile(file, "utf8"));
  } catch (e) {
    console.error("[symbols] error reading CSV:", errorMessage(e));
    return [];
  }
}
