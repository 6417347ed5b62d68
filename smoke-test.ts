#!/usr/bin/env node
import { Args, Command } from "@effect/cli";
import { FetchHttpClient } from "@effect/platform";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import process from "node:process";
import { Effect, Option } from "effect";
import { DEFAULT_PORT } from "./src/http/routes.js";
import { runSmokeSuite } from "./src/smoke/smoke-suite.js";

// --- CLI ---
// No argument tests a local service; a base URL tests a remote one and adds
// the load test.

const baseUrl = Args.text({ name: "base-url" }).pipe(
  Args.withDescription("Service base URL (e.g. http://stock-agent:8080)"),
  Args.optional,
);

const command = Command.make("stock-agent-smoke", { baseUrl }).pipe(
  Command.withHandler(({ baseUrl }) =>
    Option.match(baseUrl, {
      onNone: () => runSmokeSuite(`http://localhost:${DEFAULT_PORT}`, "local"),
      onSome: (url) => runSmokeSuite(url.replace(/\/+$/, ""), "remote"),
    }).pipe(Effect.asVoid),
  ),
);

// --- Run ---

const cli = Command.run(command, {
  name: "stock-agent-smoke",
  version: "0.1.0",
});

cli(process.argv).pipe(
  Effect.provide(FetchHttpClient.layer),
  Effect.provide(NodeContext.layer),
  NodeRuntime.runMain,
);
