// Pure domain types — no framework dependency, no I/O.

export interface TickerRecord {
  readonly symbol: string;
  readonly company: string;
  readonly price: number;
  readonly change: string; // signed percent, e.g. "+1.06%"
  readonly marketCap: string; // human-readable, e.g. "4.4T"
  readonly peRatio?: number;
  readonly week52High?: number;
  readonly week52Low?: number;
  readonly description?: string;
}

// --- Lookup result ---

export type Found = { readonly _tag: "Found"; readonly record: TickerRecord };
export type NotFound = {
  readonly _tag: "NotFound";
  readonly symbol: string;
  readonly message: string;
};

export type LookupResult = Found | NotFound;

export const Found = (record: TickerRecord): Found => ({
  _tag: "Found",
  record,
});

export const NotFound = (symbol: string, message: string): NotFound => ({
  _tag: "NotFound",
  symbol,
  message,
});

// --- Chat ---

// The wire schema is the single definition.
export type { ChatResponse } from "./protocol.js";
