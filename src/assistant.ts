// Assistant — the service the chat endpoint consults for a reply.

import { Context, Effect, Layer } from "effect";
import { answer } from "./query-handler.js";

export class Assistant extends Context.Tag("Assistant")<
  Assistant,
  {
    readonly reply: (userText: string) => Effect.Effect<string>;
  }
>() {}

/** Answers from the stock table only; never calls a model. */
export const KeywordAssistantLive = Layer.succeed(
  Assistant,
  Assistant.of({
    reply: (userText: string) => Effect.sync(() => answer(userText)),
  }),
);
