// HTTP routes — thin adapters from the wire protocol to the query handler.

import {
  HttpRouter,
  HttpServerRequest,
  HttpServerResponse,
} from "@effect/platform";
import { Effect, Stream } from "effect";
import { Assistant } from "../assistant.js";
import {
  ChatRequest,
  type ChatResponse,
  InvalidRequest,
  firstUserText,
} from "../protocol.js";
import { streamFragments, toChatResponse } from "../query-handler.js";

export const HEALTH_PATH = "/health";
export const DEFAULT_PORT = 8080;

export const endpoints = [
  `GET ${HEALTH_PATH}`,
  "POST /stock_query",
  "POST /chat",
  "POST /stream_chat",
] as const;

// --- Helpers ---

const decodeChatRequest = HttpServerRequest.schemaBodyJson(ChatRequest).pipe(
  Effect.catchTags({
    ParseError: (e) =>
      Effect.fail(new InvalidRequest({ message: `Invalid chat request: ${e.message}` })),
    RequestError: () =>
      Effect.fail(new InvalidRequest({ message: "Request body is not valid JSON" })),
  }),
);

const badRequest = (e: InvalidRequest) =>
  Effect.logDebug(`rejected request: ${e.message}`).pipe(
    Effect.zipRight(
      HttpServerResponse.json(
        { status: "error", response: e.message, session_id: "" } satisfies ChatResponse,
        { status: 400 },
      ),
    ),
  );

// --- Handlers ---

const health = HttpServerResponse.json({ status: "healthy" });

const stockQuery = Effect.gen(function* () {
  const request = yield* HttpServerRequest.HttpServerRequest;
  const payload = yield* request.json.pipe(
    Effect.mapError(
      () => new InvalidRequest({ message: "Request body is not valid JSON" }),
    ),
  );
  return yield* HttpServerResponse.json({
    status: "ok",
    payload,
    message: "Use /chat for interactive queries",
  });
}).pipe(Effect.catchTag("InvalidRequest", badRequest));

const chat = Effect.gen(function* () {
  const request = yield* decodeChatRequest;
  const assistant = yield* Assistant;
  const reply = yield* assistant.reply(firstUserText(request, "Hello"));
  return yield* HttpServerResponse.json(toChatResponse(reply, request.session_id));
}).pipe(Effect.catchTag("InvalidRequest", badRequest));

const streamChat = Effect.gen(function* () {
  const request = yield* decodeChatRequest;
  const fragments = streamFragments(firstUserText(request, ""));
  yield* Effect.logDebug(
    `streaming ${fragments.length} fragments for session '${request.session_id}'`,
  );
  return HttpServerResponse.stream(
    Stream.fromIterable(fragments).pipe(Stream.encodeText),
    { contentType: "text/plain; charset=utf-8" },
  );
}).pipe(Effect.catchTag("InvalidRequest", badRequest));

// --- Router ---

export const router = HttpRouter.empty.pipe(
  HttpRouter.get(HEALTH_PATH, health),
  HttpRouter.post("/stock_query", stockQuery),
  HttpRouter.post("/chat", chat),
  HttpRouter.post("/stream_chat", streamChat),
);
