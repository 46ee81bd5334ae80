import { setLogLevel } from "../../logger.js";
import { createSession } from "../../sessionStore.js";
import type { ComposerSession, SessionMode } from "../../types.js";
import { createAction } from "../actionState.js";
import { CompletionRequest, CompletionStreamer, ProviderRequestError } from "../aiService.js";
import {
  ActionNotPendingError,
  appendResponseChunk,
  applyAction,
  endsWithForbiddenLine,
  GenerationDeps,
  GenerationEvent,
  runGeneration,
  SessionBusyError,
  stopGeneration
} from "../composerService.js";
import { DEFAULT_SANITIZER_POLICY } from "../contentSanitizer.js";
import type { MentionEnvironment } from "../mentionContextService.js";

function streamerOf(chunks: string[], pulled: string[] = [], requests: CompletionRequest[] = []): CompletionStreamer {
  return (request) => {
    requests.push(request);
    return (async function* () {
      for (const chunk of chunks) {
        pulled.push(chunk);
        yield chunk;
      }
    })();
  };
}

function depsWith(streamCompletion: CompletionStreamer, environment: MentionEnvironment = {}): GenerationDeps {
  return { streamCompletion, sanitizerPolicy: DEFAULT_SANITIZER_POLICY, environment };
}

function newSession(mode: SessionMode = "edit"): ComposerSession {
  return createSession({ projectRoot: "/tmp/project", mode });
}

beforeAll(() => {
  setLogLevel("error");
});

describe("appendResponseChunk", () => {
  const policy = DEFAULT_SANITIZER_POLICY;

  test("accepts anything in chat mode", () => {
    expect(appendResponseChunk("", "Here's what I changed\n", "chat", policy)).toEqual({
      buffer: "Here's what I changed\n",
      malformed: false
    });
  });

  test("accepts code lines in edit mode", () => {
    expect(appendResponseChunk("`a.ts`\n", "```ts\nconst a = 1;\n", "edit", policy)).toEqual({
      buffer: "`a.ts`\n```ts\nconst a = 1;\n",
      malformed: false
    });
  });

  test("refuses a chunk completing a forbidden line outside fences", () => {
    expect(appendResponseChunk("x\n", "Summary: done\n", "edit", policy)).toEqual({ buffer: "x\n", malformed: true });
  });

  test("allows forbidden phrases inside fences", () => {
    expect(appendResponseChunk("```\n", "// i will rename this\n", "edit", policy).malformed).toBe(false);
  });

  test("judges a partial line only once it is complete", () => {
    const first = appendResponseChunk("", "Here's wh", "edit", policy);

    expect(first).toEqual({ buffer: "Here's wh", malformed: false });
    expect(appendResponseChunk(first.buffer, "at\n", "edit", policy)).toEqual({ buffer: "Here's wh", malformed: true });
  });

  test("refuses a response that opens with a plan", () => {
    expect(appendResponseChunk("", "## PLAN\n1. Refactor the parser\n", "edit", policy)).toEqual({
      buffer: "",
      malformed: true
    });
    expect(appendResponseChunk("Sure.\n", "## Plan\n", "edit", policy).malformed).toBe(true);
  });

  test("accepts a heading-style file header", () => {
    expect(appendResponseChunk("", "### src/a.ts\n```ts\n", "edit", policy)).toEqual({
      buffer: "### src/a.ts\n```ts\n",
      malformed: false
    });
  });
});

describe("endsWithForbiddenLine", () => {
  const policy = DEFAULT_SANITIZER_POLICY;

  test("judges the unterminated last line", () => {
    expect(endsWithForbiddenLine("x\nI will rename it", "edit", policy)).toBe(true);
    expect(endsWithForbiddenLine("x\nconst a = 1;", "edit", policy)).toBe(false);
    expect(endsWithForbiddenLine("x\nI will rename it", "chat", policy)).toBe(false);
  });
});

describe("runGeneration", () => {
  test("streams files and creates one write action per file", async () => {
    const session = newSession();
    const requests: CompletionRequest[] = [];
    const events: GenerationEvent[] = [];
    const streamer = streamerOf(["`src/a.ts`\n```ts\n", "const a = 1;\n", "```\n"], [], requests);

    const state = await runGeneration(
      session,
      { prompt: "Refactor this @selection", provider: "anthropic" },
      depsWith(streamer, { selectedText: "let y = 2" }),
      (event) => events.push(event)
    );

    expect(state.status).toBe("success");
    expect(requests[0].prompt).toBe("Refactor this\n\nContext:\n\n--- Selected Code ---\nlet y = 2");
    expect(session.mentions.size).toBe(0);
    expect(session.files["src/a.ts"].state).toEqual({ phase: "frozen", snapshot: "const a = 1;" });
    expect(session.actions).toHaveLength(1);
    expect(session.actions[0]).toMatchObject({
      name: "Write src/a.ts",
      filePath: "src/a.ts",
      fileContent: "const a = 1;",
      status: "pending"
    });
    expect(events.filter((event) => event.type === "delta")).toHaveLength(3);
    expect(events[events.length - 1]).toMatchObject({ type: "done", state: { status: "success" } });
    expect(session.abortController).toBeNull();
  });

  test("stops on narrative output and never reads further chunks", async () => {
    const session = newSession();
    const pulled: string[] = [];
    const streamer = streamerOf(["`a.ts`\n```\nx\n```\n", "Here's what I changed:\n", "never"], pulled);

    const state = await runGeneration(session, { prompt: "go", provider: "gemini" }, depsWith(streamer));

    expect(state).toMatchObject({
      status: "failed",
      failure: { category: "malformed_output", detail: "Narrative text was streamed into code output." }
    });
    expect(pulled).toEqual(["`a.ts`\n```\nx\n```\n", "Here's what I changed:\n"]);
    expect(session.response).toBe("`a.ts`\n```\nx\n```\n");
    expect(session.malformed).toBe(true);
    expect(session.actions).toEqual([]);
  });

  test("stops on a planning preamble before any code", async () => {
    const session = newSession();
    const pulled: string[] = [];
    const streamer = streamerOf(["## PLAN\n1. Refactor the parser\n", "`a.ts`\n```\nx\n```\n"], pulled);

    const state = await runGeneration(session, { prompt: "go", provider: "anthropic" }, depsWith(streamer));

    expect(state).toMatchObject({ status: "failed", failure: { category: "malformed_output" } });
    expect(pulled).toEqual(["## PLAN\n1. Refactor the parser\n"]);
    expect(session.response).toBe("");
    expect(session.actions).toEqual([]);
  });

  test("checks the last line when the stream ends without a newline", async () => {
    const session = newSession();
    const streamer = streamerOf(["`a.ts`\n```\nx\n```\n", "Here's what I changed"]);

    const state = await runGeneration(session, { prompt: "go", provider: "anthropic" }, depsWith(streamer));

    expect(state).toMatchObject({
      status: "failed",
      failure: { category: "malformed_output", detail: "Narrative text was streamed into code output." }
    });
    expect(session.response).toBe("`a.ts`\n```\nx\n```\n");
    expect(session.malformed).toBe(true);
    expect(session.files["a.ts"].state).toEqual({ phase: "frozen", snapshot: "x" });
    expect(session.actions).toEqual([]);
  });

  test("fails a file block cut off before its closing fence", async () => {
    const session = newSession();
    const streamer = streamerOf(["`a.ts`\n```ts\nexport function f() {\n", "  return 1"]);

    const state = await runGeneration(session, { prompt: "go", provider: "anthropic" }, depsWith(streamer));

    expect(state).toMatchObject({
      status: "failed",
      failure: { category: "malformed_output", detail: "File block ended before its closing fence: a.ts." }
    });
    expect(session.files["a.ts"].state).toEqual({ phase: "frozen", snapshot: "export function f() {\n  return 1" });
    expect(session.actions).toEqual([]);
  });

  test("cancels when stopped mid-stream and freezes partial files", async () => {
    const session = newSession();
    const streamer = streamerOf(["`a.ts`\n```\nlet a", " = 1\n```\n"]);

    const state = await runGeneration(session, { prompt: "go", provider: "anthropic" }, depsWith(streamer), (event) => {
      if (event.type === "delta") {
        stopGeneration(session);
      }
    });

    expect(state.status).toBe("cancelled");
    expect(session.files["a.ts"].state).toEqual({ phase: "frozen", snapshot: "let a" });
    expect(session.actions).toEqual([]);
  });

  test("classifies provider errors", async () => {
    const session = newSession();
    const failing: CompletionStreamer = () =>
      (async function* (): AsyncGenerator<string> {
        throw new ProviderRequestError("anthropic", 429, "Too many requests");
      })();

    const state = await runGeneration(session, { prompt: "go", provider: "anthropic" }, depsWith(failing));

    expect(state).toMatchObject({
      status: "failed",
      failure: { category: "rate_limited", retryable: true, detail: "Too many requests" }
    });
    expect(session.responseState).toBe(state);
  });

  test("refuses to start while another generation is streaming", async () => {
    const session = newSession();
    session.responseState = { status: "streaming", startedAt: "2026-01-01T00:00:00.000Z" };

    await expect(
      runGeneration(session, { prompt: "go", provider: "anthropic" }, depsWith(streamerOf([])))
    ).rejects.toBeInstanceOf(SessionBusyError);
  });

  test("fails an edit response without files as a no-op", async () => {
    const session = newSession();

    const state = await runGeneration(
      session,
      { prompt: "go", provider: "anthropic" },
      depsWith(streamerOf(["Nothing to change here."]))
    );

    expect(state).toMatchObject({ status: "failed", failure: { category: "no_op" } });
  });

  test("fails an empty chat response", async () => {
    const session = newSession("chat");

    const state = await runGeneration(session, { prompt: "hi", provider: "openrouter" }, depsWith(streamerOf([])));

    expect(state).toMatchObject({ status: "failed", failure: { category: "empty_response" } });
  });
});

describe("stopGeneration", () => {
  test("does nothing when idle", () => {
    expect(stopGeneration(newSession())).toBe(false);
  });
});

describe("applyAction", () => {
  test("writes the file and completes the action", async () => {
    const session = newSession();
    const action = createAction("Write a.ts", "a.ts", "x\ny");
    session.actions = [action];
    const writer = { writeText: jest.fn(async () => undefined) };

    const applied = await applyAction(session, action.id, writer);

    expect(writer.writeText).toHaveBeenCalledWith("a.ts", "x\ny");
    expect(applied).toMatchObject({ status: "completed", result: "Wrote 2 lines to a.ts" });
    expect(session.actions[0]).toBe(applied);
    await expect(applyAction(session, action.id, writer)).rejects.toBeInstanceOf(ActionNotPendingError);
  });

  test("records write failures on the action", async () => {
    const session = newSession();
    const action = createAction("Write a.ts", "a.ts", "x");
    session.actions = [action];
    const writer = {
      writeText: async () => {
        throw new Error("disk full");
      }
    };

    expect(await applyAction(session, action.id, writer)).toMatchObject({ status: "failed", error: "disk full" });
  });

  test("returns undefined for unknown actions", async () => {
    const writer = { writeText: async () => undefined };

    expect(await applyAction(newSession(), "missing", writer)).toBeUndefined();
  });
});
