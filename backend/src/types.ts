import type { MentionSet } from "./services/mentionParser.js";

export type ContentBlock = {
  id: string;
  content: string;
  isCode: boolean;
  language: string | null;
  isTerminalCommand: boolean;
};

export const MENTION_TYPES = [
  "file",
  "folder",
  "codebase",
  "selection",
  "terminal",
  "web",
  "docs",
  "notepad"
] as const;

export type MentionType = (typeof MENTION_TYPES)[number];

export type Mention = {
  id: string;
  type: MentionType;
  value: string;
  displayName: string;
};

export type DiffLineType = "added" | "removed" | "unchanged";

export type UnifiedDiffLine = {
  content: string;
  type: DiffLineType;
  originalLineNumber: number | null;
  newLineNumber: number | null;
};

/**
 * Content of one generated file. Streaming content is re-sanitized on every
 * render; once frozen, the snapshot is the only thing ever shown again.
 */
export type FileContentState =
  | { phase: "streaming"; buffer: string }
  | { phase: "frozen"; snapshot: string };

export type TrackedFile = {
  path: string;
  language: string;
  state: FileContentState;
};

export type StreamingFileInfo = {
  path: string;
  name: string;
  content: string;
  language: string;
  isStreaming: boolean;
  addedLines: number;
  removedLines: number;
  changeSummary: string | null;
};

export type ActionStatus = "pending" | "executing" | "completed" | "failed";

export type AIAction = {
  id: string;
  name: string;
  status: ActionStatus;
  filePath: string;
  fileContent: string;
  result: string | null;
  error: string | null;
};

export type FailureCategory =
  | "rate_limited"
  | "service_unavailable"
  | "auth_failed"
  | "network_failure"
  | "empty_response"
  | "malformed_output"
  | "no_op"
  | "unknown";

export type GenerationFailure = {
  category: FailureCategory;
  message: string;
  retryable: boolean;
  detail?: string;
};

export type ResponseState =
  | { status: "idle" }
  | { status: "streaming"; startedAt: string }
  | { status: "success"; finishedAt: string }
  | { status: "cancelled"; finishedAt: string }
  | { status: "failed"; finishedAt: string; failure: GenerationFailure };

export type SessionMode = "chat" | "edit";

export type ComposerSession = {
  id: string;
  createdAt: string;
  projectRoot: string;
  mode: SessionMode;
  mentions: MentionSet;
  selectedText: string | null;
  terminalOutput: string | null;
  prompt: string | null;
  response: string;
  responseState: ResponseState;
  malformed: boolean;
  files: Record<string, TrackedFile>;
  actions: AIAction[];
  abortController: AbortController | null;
};
