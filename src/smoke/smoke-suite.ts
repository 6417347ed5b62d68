// Smoke suite — runs the checks in order and prints each outcome. A failed
// check is recorded and the suite moves on.

import type { HttpClient } from "@effect/platform";
import { Console, Effect } from "effect";
import {
  formatFail,
  formatLoadReport,
  formatLookup,
  formatPass,
  formatStep,
  formatWarning,
} from "../format.js";
import { lookup } from "../stock-table.js";
import {
  checkHealth,
  runLoadTest,
  sendChat,
  streamChat,
  type LoadTestReport,
  type SmokeError,
} from "./smoke-client.js";

export type TargetMode = "local" | "remote";

export interface SmokeReport {
  readonly health: boolean;
  readonly chat: boolean;
  readonly stream: boolean;
  readonly load?: LoadTestReport;
}

export const LOOKUP_SYMBOLS = ["NVDA", "AAPL", "MSFT", "UNKNOWN"] as const;

const recordFailure = (label: string) => (e: SmokeError) =>
  Console.log(formatFail(`${label}: ${e.message}`)).pipe(Effect.as(false));

const healthStep = (baseUrl: string) =>
  checkHealth(baseUrl).pipe(
    Effect.flatMap((status) =>
      status === 200
        ? Console.log(formatPass("Service is healthy")).pipe(Effect.as(true))
        : Console.log(formatWarning(`Health check returned ${status}`)).pipe(
            Effect.as(false),
          ),
    ),
    Effect.catchTag("SmokeError", recordFailure("Health check failed")),
  );

const chatStep = (baseUrl: string) =>
  sendChat(baseUrl, "What is NVIDIA current stock price?", "test123").pipe(
    Effect.flatMap((reply) =>
      Console.log(formatPass(`Response: ${JSON.stringify(reply, null, 2)}`)),
    ),
    Effect.as(true),
    Effect.catchTag("SmokeError", recordFailure("Query failed")),
  );

const streamStep = (baseUrl: string) =>
  Console.log(formatPass("Streaming response:")).pipe(
    Effect.zipRight(
      streamChat(baseUrl, "Tell me about NVDA stock", "test456", (line) =>
        Console.log(`      ${line}`),
      ),
    ),
    Effect.as(true),
    Effect.catchTag("SmokeError", recordFailure("Stream failed")),
  );

const lookupStep = Effect.forEach(LOOKUP_SYMBOLS, (symbol) =>
  Console.log(formatLookup(lookup(symbol))),
  { discard: true },
);

export function runSmokeSuite(
  baseUrl: string,
  mode: TargetMode,
): Effect.Effect<SmokeReport, never, HttpClient.HttpClient> {
  return Effect.gen(function* () {
    yield* Console.log(`Testing stock agent at ${baseUrl} (${mode})`);

    yield* Console.log(formatStep(1, "Health Check"));
    const health = yield* healthStep(baseUrl);

    yield* Console.log(formatStep(2, "Query NVIDIA Stock"));
    const chat = yield* chatStep(baseUrl);

    yield* Console.log(formatStep(3, "Streaming Query"));
    const stream = yield* streamStep(baseUrl);

    yield* Console.log(formatStep(4, "Direct Lookup"));
    yield* lookupStep;

    if (mode === "local") {
      yield* Console.log("\nTesting complete");
      return { health, chat, stream };
    }

    yield* Console.log(formatStep(5, "Load Test (Multiple Requests)"));
    const load = yield* runLoadTest(baseUrl, {
      workers: 10,
      requests: 20,
      timeout: "5 seconds",
    });
    yield* Console.log(formatLoadReport(load));

    yield* Console.log("\nTesting complete");
    return { health, chat, stream, load };
  });
}
