import { v4 as uuidv4 } from "uuid";
import { MentionSet } from "./services/mentionParser.js";
import { ComposerSession, SessionMode } from "./types.js";

const sessions = new Map<string, ComposerSession>();

export function createSession(options: { projectRoot: string; mode?: SessionMode }): ComposerSession {
  const id = uuidv4();
  const session: ComposerSession = {
    id,
    createdAt: new Date().toISOString(),
    projectRoot: options.projectRoot,
    mode: options.mode || "edit",
    mentions: new MentionSet(),
    selectedText: null,
    terminalOutput: null,
    prompt: null,
    response: "",
    responseState: { status: "idle" },
    malformed: false,
    files: {},
    actions: [],
    abortController: null
  };
  sessions.set(id, session);
  return session;
}

export function getSession(id: string): ComposerSession | undefined {
  return sessions.get(id);
}

export function deleteSession(id: string): boolean {
  const session = sessions.get(id);
  session?.abortController?.abort();
  return sessions.delete(id);
}

export function listSessionIds(): string[] {
  return Array.from(sessions.keys());
}
