// Query handler — keyword matching over a closed alias set. No I/O.

import type { ChatResponse, TickerRecord } from "./domain.js";
import { lookup } from "./stock-table.js";

// --- Aliases ---

interface SymbolAliases {
  readonly symbol: string;
  readonly aliases: readonly string[]; // lowercase
}

/** Checked in order; the first entry with a matching alias wins. */
const aliasTable: readonly SymbolAliases[] = [
  { symbol: "NVDA", aliases: ["nvda", "nvidia"] },
];

export const SYMBOL_PROMPT =
  "Please specify a stock symbol (e.g., NVDA, AAPL, MSFT)";

export function matchSymbol(userText: string): string | undefined {
  const text = userText.toLowerCase();
  return aliasTable.find((entry) =>
    entry.aliases.some((alias) => text.includes(alias)),
  )?.symbol;
}

// --- Rendering ---

export function describeRecord(record: TickerRecord): string[] {
  const lines = [
    `Stock: ${record.company} (${record.symbol})`,
    `Current Price: $${record.price}`,
    `Change: ${record.change}`,
    `Market Cap: ${record.marketCap}`,
  ];
  if (record.peRatio !== undefined) {
    lines.push(`P/E Ratio: ${record.peRatio}`);
  }
  return lines;
}

function answerLines(userText: string): string[] {
  const symbol = matchSymbol(userText);
  if (symbol === undefined) return [SYMBOL_PROMPT];

  const result = lookup(symbol);
  switch (result._tag) {
    case "Found":
      return describeRecord(result.record);
    case "NotFound":
      return [result.message];
  }
}

// --- Operations ---

export function answer(userText: string): string {
  return answerLines(userText).join("\n");
}

/** Success envelope for a reply, echoing the session id. */
export function toChatResponse(reply: string, sessionId: string): ChatResponse {
  return { status: "success", response: reply, session_id: sessionId };
}

export function handle(userText: string, sessionId: string): ChatResponse {
  return toChatResponse(answer(userText), sessionId);
}

/** Fragments for the streaming endpoint, each terminated by a newline. */
export function streamFragments(userText: string): string[] {
  return [
    `Processing query: ${userText}\n`,
    ...answerLines(userText).map((line) => `${line}\n`),
  ];
}
