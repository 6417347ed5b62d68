// Stock table — the fixed set of tickers the service knows about.

import {
  Found,
  NotFound,
  type LookupResult,
  type TickerRecord,
} from "./domain.js";

// --- Sample data ---

const records: readonly TickerRecord[] = [
  {
    symbol: "NVDA",
    company: "NVIDIA Corporation",
    price: 180.05,
    change: "+1.06%",
    marketCap: "4.4T",
    peRatio: 44.31,
    week52High: 212.19,
    week52Low: 86.62,
    description: "AI infrastructure and GPU computing company",
  },
  {
    symbol: "AAPL",
    company: "Apple Inc.",
    price: 189.5,
    change: "+0.5%",
    marketCap: "3.0T",
  },
  {
    symbol: "MSFT",
    company: "Microsoft Corporation",
    price: 378.2,
    change: "+0.8%",
    marketCap: "2.8T",
  },
];

const table: ReadonlyMap<string, TickerRecord> = new Map(
  records.map((r) => [r.symbol, Object.freeze(r)] as const),
);

export const knownSymbols: readonly string[] = records.map((r) => r.symbol);

// "NVDA, AAPL, or MSFT"
function suggestionList(symbols: readonly string[]): string {
  if (symbols.length <= 1) return symbols.join("");
  return `${symbols.slice(0, -1).join(", ")}, or ${symbols[symbols.length - 1]}`;
}

// --- Lookup ---

export function lookup(symbol: string): LookupResult {
  const record = table.get(symbol.toUpperCase());
  return record !== undefined
    ? Found(record)
    : NotFound(
        symbol,
        `Stock symbol '${symbol}' not found. Try ${suggestionList(knownSymbols)}.`,
      );
}
