import { afterEach, describe, expect, it, vi } from "vitest";
import { normalizeSymbol, parseSymbolsCsv, readSymbols } from "./symbols.js";

describe("normalizeSymbol", () => {
  it("upper-cases and validates tickers", () => {
    expect(normalizeSymbol(" brk.b ")).toBe("BRK.B");
    expect(normalizeSymbol("1ABC")).toBeNull();
    expect(normalizeSymbol("")).toBeNull();
  });
});

describe("parseSymbolsCsv", () => {
  it("reads the symbol column wherever it sits", () => {
    expect(parseSymbolsCsv("name,Symbol\r\nApple,aapl\r\nBad,??\r\nApple again,AAPL\r\nIBM Corp,IBM\r\n")).toEqual(["AAPL", "IBM"]);
  });

  it("returns nothing without a symbol column", () => {
    expect(parseSymbolsCsv("ticker\nAAPL")).toEqual([]);
  });
});

describe("readSymbols", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("logs and returns an empty list for a missing file", async () => {
    const err = vi.spyOn(console, "error").mockImplementation(() => {});
    await expect(readSymbols("/nonexistent/stock_symbols.csv")).resolves.toEqual([]);
    expect(err).toHaveBeenCalledTimes(1);
  });
});
