import { HttpMiddleware, HttpServer } from "@effect/platform";
import { NodeHttpServer, NodeRuntime } from "@effect/platform-node";
import { createServer } from "node:http";
import { Config, Effect, Layer, LogLevel, Logger, Option } from "effect";
import { KeywordAssistantLive } from "./src/assistant.js";
import { DEFAULT_PORT, endpoints, router } from "./src/http/routes.js";

// --- Config ---
// PORT (default 8080), LOG_LEVEL (default Info), DASHSCOPE_API_KEY (optional).

const ServerLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const port = yield* Config.integer("PORT").pipe(Config.withDefault(DEFAULT_PORT));
    return NodeHttpServer.layer(createServer, { port });
  }),
);

const LoggerLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const level = yield* Config.logLevel("LOG_LEVEL").pipe(
      Config.withDefault(LogLevel.Info),
    );
    return Logger.minimumLogLevel(level);
  }),
);

// The model credential is only needed by a model-backed Assistant.
const StartupCheck = Layer.effectDiscard(
  Effect.gen(function* () {
    const apiKey = yield* Config.option(Config.redacted("DASHSCOPE_API_KEY"));
    if (Option.isNone(apiKey)) {
      yield* Effect.logWarning(
        "DASHSCOPE_API_KEY is not set; chat replies come from the stock table only",
      );
    }
    yield* Effect.logInfo(`Available endpoints: ${endpoints.join(", ")}`);
  }),
);

// --- App ---

const ServeLive = router.pipe(
  HttpServer.serve(HttpMiddleware.logger),
  HttpServer.withLogAddress,
  Layer.provide(KeywordAssistantLive),
  Layer.provide(ServerLive),
);

Layer.mergeAll(ServeLive, StartupCheck).pipe(
  Layer.launch,
  Effect.provide(LoggerLive),
  NodeRuntime.runMain,
);
