import { FetchHttpClient, HttpApp, type HttpClient } from "@effect/platform";
import { Effect, Either } from "effect";
import { expect, test } from "vitest";
import { KeywordAssistantLive } from "../assistant.js";
import { router } from "../http/routes.js";
import {
  checkHealth,
  runLoadTest,
  sendChat,
  streamChat,
  successRate,
} from "./smoke-client.js";
import { runSmokeSuite } from "./smoke-suite.js";

// --- Helpers ---

type Fetch = (input: RequestInfo | URL, init?: RequestInit) => Promise<Response>;

const BASE_URL = "http://stock-agent.test:8080";

const handler = HttpApp.toWebHandler(
  router.pipe(Effect.provide(KeywordAssistantLive)),
);

/** Serves requests from the service's own router, in process. */
const routerFetch: Fetch = (input, init) => handler(new Request(input, init));

const statusFetch = (status: number): Fetch => () =>
  Promise.resolve(new Response("unavailable", { status }));

const rejectingFetch: Fetch = () =>
  Promise.reject(new TypeError("fetch failed"));

function run<A, E>(
  effect: Effect.Effect<A, E, HttpClient.HttpClient>,
  fetch: Fetch = routerFetch,
): Promise<A> {
  return Effect.runPromise(
    effect.pipe(
      Effect.provide(FetchHttpClient.layer),
      Effect.provideService(FetchHttpClient.Fetch, fetch),
    ),
  );
}

// --- successRate ---

test("successRate: percentage is successes over total", () => {
  expect(successRate([true, false, true, true])).toEqual({
    successes: 3,
    total: 4,
    percentage: 75,
  });
});

test("successRate: empty run is zero percent", () => {
  expect(successRate([])).toEqual({ successes: 0, total: 0, percentage: 0 });
});

test("successRate: matches successes / total * 100 exactly", () => {
  const results = Array.from({ length: 20 }, (_, i) => i % 3 === 0);
  const report = successRate(results);
  expect(report.successes).toBe(7);
  expect(report.percentage).toBe((7 / 20) * 100);
});

// --- Calls ---

test("checkHealth: returns the status code", async () => {
  expect(await run(checkHealth(BASE_URL))).toBe(200);
  expect(await run(checkHealth(BASE_URL), statusFetch(503))).toBe(503);
});

test("sendChat: decodes the chat response", async () => {
  const reply = await run(
    sendChat(BASE_URL, "What is NVIDIA current stock price?", "test123"),
  );
  expect(reply.status).toBe("success");
  expect(reply.session_id).toBe("test123");
  expect(reply.response).toContain("180.05");
});

test("sendChat: non-200 status is a SmokeError", async () => {
  const result = await run(
    Effect.either(sendChat(BASE_URL, "hi", "s1")),
    statusFetch(503),
  );
  if (Either.isRight(result)) throw new Error("Expected failure but got success");
  expect(result.left._tag).toBe("SmokeError");
  expect(result.left.message).toBe("Request returned 503");
});

test("sendChat: transport failure is a SmokeError", async () => {
  const result = await run(
    Effect.either(sendChat(BASE_URL, "hi", "s1")),
    rejectingFetch,
  );
  if (Either.isRight(result)) throw new Error("Expected failure but got success");
  expect(result.left._tag).toBe("SmokeError");
});

test("streamChat: collects the streamed lines in order", async () => {
  const lines = await run(streamChat(BASE_URL, "Tell me about NVDA stock", "test456"));
  expect(lines).toEqual([
    "Processing query: Tell me about NVDA stock",
    "Stock: NVIDIA Corporation (NVDA)",
    "Current Price: $180.05",
    "Change: +1.06%",
    "Market Cap: 4.4T",
    "P/E Ratio: 44.31",
  ]);
});

test("streamChat: prints each line as it arrives, even when the body is cut off", async () => {
  let pulls = 0;
  const cutOff: Fetch = () => {
    const body = new ReadableStream<Uint8Array>({
      pull(controller) {
        pulls += 1;
        if (pulls === 1) {
          controller.enqueue(new TextEncoder().encode("Processing query: x\nStock: A\n"));
        } else {
          controller.error(new Error("connection reset"));
        }
      },
    });
    return Promise.resolve(new Response(body, { status: 200 }));
  };
  const seen: string[] = [];
  const result = await run(
    Effect.either(
      streamChat(BASE_URL, "x", "s1", (line) =>
        Effect.sync(() => {
          seen.push(line);
        }),
      ),
    ),
    cutOff,
  );
  expect(seen).toEqual(["Processing query: x", "Stock: A"]);
  if (Either.isRight(result)) throw new Error("Expected failure but got success");
  expect(result.left._tag).toBe("SmokeError");
});

test("checkHealth: a request that never answers times out as a SmokeError", async () => {
  const hanging: Fetch = (_input, init) =>
    new Promise((_resolve, reject) => {
      init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
    });
  const result = await run(Effect.either(checkHealth(BASE_URL, "20 millis")), hanging);
  if (Either.isRight(result)) throw new Error("Expected failure but got success");
  expect(result.left.message).toBe("Request timed out");
});

// --- runLoadTest ---

const loadOptions = { workers: 10, requests: 20, timeout: "5 seconds" } as const;

test("runLoadTest: healthy service succeeds every request", async () => {
  expect(await run(runLoadTest(BASE_URL, loadOptions))).toEqual({
    successes: 20,
    total: 20,
    percentage: 100,
  });
});

test("runLoadTest: failed requests are counted, not thrown", async () => {
  let calls = 0;
  const flaky: Fetch = (input, init) => {
    calls += 1;
    return calls % 2 === 0
      ? Promise.resolve(new Response("busy", { status: 503 }))
      : routerFetch(input, init);
  };
  expect(await run(runLoadTest(BASE_URL, loadOptions), flaky)).toEqual({
    successes: 10,
    total: 20,
    percentage: 50,
  });
});

test("runLoadTest: never more requests in flight than workers", async () => {
  let inFlight = 0;
  let maxInFlight = 0;
  const slow: Fetch = async (input, init) => {
    inFlight += 1;
    maxInFlight = Math.max(maxInFlight, inFlight);
    await new Promise((resolve) => setTimeout(resolve, 5));
    inFlight -= 1;
    return routerFetch(input, init);
  };
  const report = await run(
    runLoadTest(BASE_URL, { workers: 3, requests: 9, timeout: "5 seconds" }),
    slow,
  );
  expect(report.successes).toBe(9);
  expect(maxInFlight).toBe(3);
});

// --- runSmokeSuite ---

test("runSmokeSuite: healthy remote service passes every step", async () => {
  expect(await run(runSmokeSuite(BASE_URL, "remote"))).toEqual({
    health: true,
    chat: true,
    stream: true,
    load: { successes: 20, total: 20, percentage: 100 },
  });
});

test("runSmokeSuite: local mode skips the load test", async () => {
  expect(await run(runSmokeSuite(BASE_URL, "local"))).toEqual({
    health: true,
    chat: true,
    stream: true,
  });
});

test("runSmokeSuite: unreachable service records failures and finishes", async () => {
  expect(await run(runSmokeSuite(BASE_URL, "remote"), rejectingFetch)).toEqual({
    health: false,
    chat: false,
    stream: false,
    load: { successes: 0, total: 20, percentage: 0 },
  });
});
