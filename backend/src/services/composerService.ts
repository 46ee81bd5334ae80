import { createLogger } from "../logger.js";
import { AIAction, ComposerSession, GenerationFailure, ResponseState, SessionMode } from "../types.js";
import { createAction, reduceAction } from "./actionState.js";
import { buildSystemPrompt, CompletionStreamer, Provider } from "./aiService.js";
import { isFenceLine } from "./contentBlockParser.js";
import { containsForbiddenPhrase, sanitizeContent, SanitizerPolicy, startsWithPlanning } from "./contentSanitizer.js";
import { buildMentionContextAsync, MentionEnvironment } from "./mentionContextService.js";
import { removeMentions } from "./mentionParser.js";
import { classifyGenerationError, createFailure, failureForVerdict, validateEditOutput } from "./responseState.js";
import {
  createStreamingContent,
  displayFileContent,
  extractStreamingFiles,
  freezeFileContent,
  replaceStreamingContent,
  Sanitizer
} from "./streamingFileService.js";
import { pluralizeLines, splitLines } from "./textLines.js";

const log = createLogger("Composer");

export class SessionBusyError extends Error {
  constructor(sessionId: string) {
    super(`Session ${sessionId} is already generating.`);
    this.name = "SessionBusyError";
  }
}

export class ActionNotPendingError extends Error {
  constructor(action: AIAction) {
    super(`Action ${action.id} is ${action.status}.`);
    this.name = "ActionNotPendingError";
  }
}

export type GenerationRequest = {
  prompt: string;
  provider: Provider;
  model?: string;
  apiKey?: string;
};

export type GenerationDeps = {
  streamCompletion: CompletionStreamer;
  sanitizerPolicy: SanitizerPolicy;
  environment: MentionEnvironment;
};

export type FileProgress = {
  path: string;
  language: string;
  isStreaming: boolean;
  content: string;
};

export type GenerationEvent =
  | { type: "delta"; text: string }
  | { type: "files"; files: FileProgress[] }
  | { type: "done"; state: ResponseState; actions: AIAction[] };

export type AppendResult = {
  buffer: string;
  malformed: boolean;
};

export interface FileWriter {
  writeText(relativePath: string, content: string): Promise<void>;
}

/**
 * Appends one streamed chunk. In edit mode a chunk is refused when it would
 * open the response with a plan, or complete a line outside fences containing
 * a forbidden phrase: the buffer is returned as it was and the stream is
 * flagged malformed.
 */
export function appendResponseChunk(
  buffer: string,
  chunk: string,
  mode: SessionMode,
  policy: SanitizerPolicy
): AppendResult {
  const candidate = buffer + chunk;
  if (mode === "chat") {
    return { buffer: candidate, malformed: false };
  }

  if (startsWithPlanning(candidate, policy)) {
    return { buffer, malformed: true };
  }

  const previouslyComplete = splitLines(buffer).length - 1;
  const lines = splitLines(candidate);
  let inFence = false;

  for (let index = 0; index < lines.length - 1; index += 1) {
    const line = lines[index];
    if (isFenceLine(line)) {
      inFence = !inFence;
      continue;
    }
    if (index >= previouslyComplete && !inFence && containsForbiddenPhrase(line, policy)) {
      return { buffer, malformed: true };
    }
  }

  return { buffer: candidate, malformed: false };
}

/** Checks the trailing line of a finished response, which no newline completed. */
export function endsWithForbiddenLine(buffer: string, mode: SessionMode, policy: SanitizerPolicy): boolean {
  return appendResponseChunk(buffer, "\n", mode, policy).malformed;
}

/** Drops a trailing line that no newline completed. */
function withoutPartialLine(buffer: string): string {
  const lastBreak = Math.max(buffer.lastIndexOf("\n"), buffer.lastIndexOf("\r"));
  return buffer.slice(0, lastBreak + 1);
}

export function sanitizerFor(policy: SanitizerPolicy): Sanitizer {
  return (content) => sanitizeContent(content, policy);
}

/** Re-derives file blocks from the response; closed blocks freeze for good. */
export function trackStreamingFiles(session: ComposerSession, isLoading: boolean, sanitize: Sanitizer): void {
  for (const extracted of extractStreamingFiles(session.response, isLoading)) {
    const existing = session.files[extracted.path];
    if (existing?.state.phase === "frozen") {
      continue;
    }

    let state = existing
      ? replaceStreamingContent(existing.state, extracted.content)
      : createStreamingContent(extracted.content);
    if (!extracted.isStreaming) {
      state = freezeFileContent(state, sanitize);
    }
    session.files[extracted.path] = { path: extracted.path, language: extracted.language, state };
  }
}

export function listFileProgress(session: ComposerSession, sanitize: Sanitizer): FileProgress[] {
  return Object.values(session.files).map((file) => ({
    path: file.path,
    language: file.language,
    isStreaming: file.state.phase === "streaming",
    content: displayFileContent(file.state, sanitize)
  }));
}

function freezeAllFiles(session: ComposerSession, sanitize: Sanitizer): void {
  for (const file of Object.values(session.files)) {
    file.state = freezeFileContent(file.state, sanitize);
  }
}

function frozenContents(session: ComposerSession): Array<{ path: string; content: string }> {
  return Object.values(session.files).map((file) => ({
    path: file.path,
    content: file.state.phase === "frozen" ? file.state.snapshot : file.state.buffer
  }));
}

function buildPrompt(userText: string, context: string): string {
  return context ? `${userText}\n\nContext:${context}` : userText;
}

function finishedAt(): string {
  return new Date().toISOString();
}

function failedState(failure: GenerationFailure): ResponseState {
  return { status: "failed", finishedAt: finishedAt(), failure };
}

function completeGeneration(session: ComposerSession, sanitize: Sanitizer): ResponseState {
  trackStreamingFiles(session, false, sanitize);
  const unterminated = Object.values(session.files)
    .filter((file) => file.state.phase === "streaming")
    .map((file) => file.path);
  freezeAllFiles(session, sanitize);
  if (unterminated.length > 0) {
    return failedState(
      createFailure("malformed_output", `File block ended before its closing fence: ${unterminated.join(", ")}.`)
    );
  }

  const files = frozenContents(session);

  const failure =
    session.mode === "edit"
      ? failureForVerdict(validateEditOutput(session.response, files.map((file) => file.content)))
      : session.response.trim()
        ? null
        : createFailure("empty_response");
  if (failure) {
    return failedState(failure);
  }

  session.actions = files.map((file) => createAction(`Write ${file.path}`, file.path, file.content));
  return { status: "success", finishedAt: finishedAt() };
}

/**
 * Runs one generation for the session: expands mentions, streams the model
 * response into the session and settles it in a terminal state. Files are
 * frozen whatever the outcome. Events are delivered in stream order.
 */
export async function runGeneration(
  session: ComposerSession,
  request: GenerationRequest,
  deps: GenerationDeps,
  onEvent: (event: GenerationEvent) => void = () => undefined
): Promise<ResponseState> {
  if (session.responseState.status === "streaming") {
    throw new SessionBusyError(session.id);
  }

  const controller = new AbortController();
  const signal = controller.signal;
  const sanitize = sanitizerFor(deps.sanitizerPolicy);

  session.abortController = controller;
  session.prompt = request.prompt;
  session.response = "";
  session.malformed = false;
  session.files = {};
  session.actions = [];
  session.responseState = { status: "streaming", startedAt: new Date().toISOString() };

  session.mentions.addFromText(request.prompt);
  const mentions = session.mentions.clear();
  log.info(`Generation started for session ${session.id} (${request.provider}, ${mentions.length} mentions)`);

  let state: ResponseState;
  try {
    const context = await buildMentionContextAsync(mentions, deps.environment, signal);
    const stream = signal.aborted
      ? []
      : deps.streamCompletion({
          provider: request.provider,
          model: request.model,
          apiKey: request.apiKey,
          systemPrompt: buildSystemPrompt(session.mode),
          prompt: buildPrompt(removeMentions(request.prompt).trim(), context),
          signal
        });

    for await (const chunk of stream) {
      if (signal.aborted) {
        break;
      }

      const appended = appendResponseChunk(session.response, chunk, session.mode, deps.sanitizerPolicy);
      if (appended.malformed) {
        session.malformed = true;
        controller.abort();
        break;
      }

      session.response = appended.buffer;
      onEvent({ type: "delta", text: chunk });
      trackStreamingFiles(session, true, sanitize);
      onEvent({ type: "files", files: listFileProgress(session, sanitize) });
    }

    if (!signal.aborted && endsWithForbiddenLine(session.response, session.mode, deps.sanitizerPolicy)) {
      session.malformed = true;
      session.response = withoutPartialLine(session.response);
    }

    if (session.malformed) {
      freezeAllFiles(session, sanitize);
      state = failedState(createFailure("malformed_output", "Narrative text was streamed into code output."));
    } else if (signal.aborted) {
      freezeAllFiles(session, sanitize);
      state = { status: "cancelled", finishedAt: finishedAt() };
    } else {
      state = completeGeneration(session, sanitize);
    }
  } catch (error) {
    freezeAllFiles(session, sanitize);
    if (signal.aborted) {
      state = { status: "cancelled", finishedAt: finishedAt() };
    } else {
      state = failedState(classifyGenerationError(error));
      log.warn(`Generation failed for session ${session.id}`, error);
    }
  } finally {
    session.abortController = null;
  }

  session.responseState = state;
  log.info(`Generation for session ${session.id} finished: ${state.status}`);
  onEvent({ type: "done", state, actions: session.actions.map((action) => ({ ...action })) });
  return state;
}

export function stopGeneration(session: ComposerSession): boolean {
  if (!session.abortController) {
    return false;
  }
  session.abortController.abort();
  log.info(`Stop requested for session ${session.id}`);
  return true;
}

function replaceAction(session: ComposerSession, action: AIAction): AIAction {
  session.actions = session.actions.map((item) => (item.id === action.id ? action : item));
  return action;
}

/** Writes a pending action's file to disk, moving the action to completed or failed. */
export async function applyAction(
  session: ComposerSession,
  actionId: string,
  writer: FileWriter
): Promise<AIAction | undefined> {
  const action = session.actions.find((item) => item.id === actionId);
  if (!action) {
    return undefined;
  }
  if (action.status !== "pending") {
    throw new ActionNotPendingError(action);
  }

  const executing = replaceAction(session, reduceAction(action, { type: "start" }));
  try {
    await writer.writeText(executing.filePath, executing.fileContent);
    const lineCount = splitLines(executing.fileContent).length;
    return replaceAction(
      session,
      reduceAction(executing, { type: "complete", result: `Wrote ${pluralizeLines(lineCount)} to ${executing.filePath}` })
    );
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.warn(`Action ${executing.id} failed`, error);
    return replaceAction(session, reduceAction(executing, { type: "fail", error: message }));
  }
}
