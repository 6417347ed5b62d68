// Smoke client — calls a running service over HTTP. Every call reports
// failure as a SmokeError; the suite turns those into booleans.

import {
  HttpClient,
  HttpClientRequest,
  HttpClientResponse,
} from "@effect/platform";
import {
  Chunk,
  Data,
  Duration,
  Effect,
  type Scope,
  Stream,
} from "effect";
import { chatRequest, ChatResponse } from "../protocol.js";

// --- Types ---

export class SmokeError extends Data.TaggedError("SmokeError")<{
  readonly message: string;
}> {}

export interface LoadTestReport {
  readonly successes: number;
  readonly total: number;
  readonly percentage: number;
}

export interface LoadTestOptions {
  readonly workers: number;
  readonly requests: number;
  readonly timeout: Duration.DurationInput;
}

// --- Pure ---

export function successRate(results: readonly boolean[]): LoadTestReport {
  const total = results.length;
  const successes = results.filter((ok) => ok).length;
  return {
    successes,
    total,
    percentage: total === 0 ? 0 : (successes / total) * 100,
  };
}

// --- Calls ---

/** Runs one call in its own scope, which releases the response when done. */
function withTimeout<A, E extends { readonly message: string }, R>(
  effect: Effect.Effect<A, E, R>,
  timeout: Duration.DurationInput,
): Effect.Effect<A, SmokeError, Exclude<R, Scope.Scope>> {
  return effect.pipe(
    Effect.scoped,
    Effect.mapError((e) => new SmokeError({ message: e.message })),
    Effect.timeoutFail({
      duration: timeout,
      onTimeout: () => new SmokeError({ message: "Request timed out" }),
    }),
  );
}

function requireOk(response: HttpClientResponse.HttpClientResponse) {
  return response.status === 200
    ? Effect.succeed(response)
    : Effect.fail(
        new SmokeError({ message: `Request returned ${response.status}` }),
      );
}

function postChat(
  baseUrl: string,
  path: string,
  text: string,
  sessionId: string,
) {
  return Effect.gen(function* () {
    const client = yield* HttpClient.HttpClient;
    const request = HttpClientRequest.post(`${baseUrl}${path}`).pipe(
      HttpClientRequest.bodyUnsafeJson(chatRequest(text, sessionId)),
    );
    return yield* client.execute(request);
  });
}

/** HTTP status of `GET /health`. */
export function checkHealth(
  baseUrl: string,
  timeout: Duration.DurationInput = "5 seconds",
): Effect.Effect<number, SmokeError, HttpClient.HttpClient> {
  return withTimeout(
    Effect.gen(function* () {
      const client = yield* HttpClient.HttpClient;
      const response = yield* client.get(`${baseUrl}/health`);
      return response.status;
    }),
    timeout,
  );
}

export function sendChat(
  baseUrl: string,
  text: string,
  sessionId: string,
  timeout: Duration.DurationInput = "10 seconds",
): Effect.Effect<ChatResponse, SmokeError, HttpClient.HttpClient> {
  return withTimeout(
    postChat(baseUrl, "/chat", text, sessionId).pipe(
      Effect.flatMap(requireOk),
      Effect.flatMap(HttpClientResponse.schemaBodyJson(ChatResponse)),
    ),
    timeout,
  );
}

/** Non-empty lines of the `/stream_chat` body, in arrival order. Each line
 *  goes to `onLine` as soon as it arrives. */
export function streamChat(
  baseUrl: string,
  text: string,
  sessionId: string,
  onLine: (line: string) => Effect.Effect<void> = () => Effect.void,
  timeout: Duration.DurationInput = "10 seconds",
): Effect.Effect<readonly string[], SmokeError, HttpClient.HttpClient> {
  return withTimeout(
    postChat(baseUrl, "/stream_chat", text, sessionId).pipe(
      Effect.flatMap(requireOk),
      Effect.flatMap((response) =>
        response.stream.pipe(
          Stream.decodeText(),
          Stream.splitLines,
          Stream.filter((line) => line.length > 0),
          Stream.tap(onLine),
          Stream.runCollect,
        ),
      ),
      Effect.map(Chunk.toReadonlyArray),
    ),
    timeout,
  );
}

/** `requests` chat calls, at most `workers` in flight at once. */
export function runLoadTest(
  baseUrl: string,
  options: LoadTestOptions,
): Effect.Effect<LoadTestReport, never, HttpClient.HttpClient> {
  const indices = Array.from({ length: options.requests }, (_, i) => i);
  return Effect.forEach(
    indices,
    (i) =>
      sendChat(baseUrl, `NVDA stock request ${i}`, `load-test-${i}`, options.timeout).pipe(
        Effect.as(true),
        Effect.orElseSucceed(() => false),
      ),
    { concurrency: options.workers },
  ).pipe(Effect.map(successRate));
}
