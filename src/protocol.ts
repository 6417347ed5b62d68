// Wire protocol — request/response schemas shared by the server and the
// smoke test client.

import { Data, Schema } from "effect";

// --- Request ---

export const ContentPart = Schema.Struct({
  type: Schema.String,
  text: Schema.optional(Schema.String),
});

export const Message = Schema.Struct({
  role: Schema.String,
  content: Schema.optionalWith(Schema.Array(ContentPart), {
    default: () => [],
  }),
});

export const ChatRequest = Schema.Struct({
  input: Schema.optionalWith(Schema.Array(Message), { default: () => [] }),
  session_id: Schema.optionalWith(Schema.String, { default: () => "" }),
});

export type ChatRequest = typeof ChatRequest.Type;

/** The first text part of the first turn, or `fallback` when there is none. */
export function firstUserText(request: ChatRequest, fallback: string): string {
  const [first] = request.input;
  if (first === undefined) return fallback;
  const part = first.content.find(
    (p) => p.type === "text" && p.text !== undefined,
  );
  return part?.text ?? fallback;
}

export function chatRequest(text: string, sessionId: string) {
  return {
    input: [{ role: "user", content: [{ type: "text", text }] }],
    session_id: sessionId,
  };
}

// --- Response ---

export const ChatResponse = Schema.Struct({
  status: Schema.Literal("success", "error"),
  response: Schema.String,
  session_id: Schema.String,
});

export type ChatResponse = typeof ChatResponse.Type;

// --- Errors ---

export class InvalidRequest extends Data.TaggedError("InvalidRequest")<{
  readonly message: string;
}> {}
