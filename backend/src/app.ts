import cors from "cors";
import express, { Response } from "express";
import { z } from "zod";
import type { ProviderSettings } from "./config.js";
import { createLogger } from "./logger.js";
import { createSession, deleteSession, getSession } from "./sessionStore.js";
import { CompletionStreamer, listProviderModels, PROVIDERS } from "./services/aiService.js";
import {
  ActionNotPendingError,
  applyAction,
  GenerationEvent,
  listFileProgress,
  runGeneration,
  sanitizerFor,
  SessionBusyError,
  stopGeneration
} from "./services/composerService.js";
import { parseContentBlocks } from "./services/contentBlockParser.js";
import { sanitizeContent, SanitizerPolicy } from "./services/contentSanitizer.js";
import { computeUnifiedDiff, summarizeChanges } from "./services/diffService.js";
import {
  buildMentionContext,
  buildMentionContextAsync,
  DocumentFetcher,
  MentionEnvironment,
  WebSearcher
} from "./services/mentionContextService.js";
import { createMention, parseMentions, removeMentions } from "./services/mentionParser.js";
import { NotepadService } from "./services/notepadService.js";
import { ProjectWorkspaceRegistry } from "./services/projectWorkspace.js";
import { describeStreamingFile, displayFileContent } from "./services/streamingFileService.js";
import type { CommandRunner } from "./services/terminalService.js";
import { splitLines } from "./services/textLines.js";
import { ComposerSession, Mention, MENTION_TYPES } from "./types.js";

const log = createLogger("HTTP");

export type AppDeps = {
  defaultProjectRoot: string;
  providers: ProviderSettings;
  workspaces: ProjectWorkspaceRegistry;
  notepads: NotepadService;
  web: WebSearcher & DocumentFetcher;
  terminal: CommandRunner;
  streamCompletion: CompletionStreamer;
  sanitizerPolicy: SanitizerPolicy;
};

const providerSchema = z.enum(["anthropic", "gemini", "openrouter"]);

const listModelsSchema = z.object({
  provider: providerSchema,
  apiKey: z.string().min(1).optional()
});

const textSchema = z.object({
  text: z.string().max(500_000)
});

const sanitizeSchema = z.object({
  content: z.string().max(500_000)
});

const diffSchema = z.object({
  original: z.string().nullable(),
  updated: z.string(),
  strategy: z.enum(["greedy", "lcs"]).optional()
});

const createSessionSchema = z.object({
  projectRoot: z.string().min(1).optional(),
  mode: z.enum(["chat", "edit"]).optional()
});

const addMentionSchema = z.union([
  z.object({
    type: z.enum(MENTION_TYPES),
    value: z.string().max(2000).optional()
  }),
  z.object({
    text: z.string().min(1)
  })
]);

const editorStateSchema = z.object({
  selectedText: z.string().nullable().optional(),
  terminalOutput: z.string().nullable().optional()
});

const contextPreviewSchema = z.object({
  resolve: z.boolean().optional()
});

const generateSchema = z.object({
  prompt: z.string().min(1).max(100_000),
  provider: providerSchema.optional(),
  model: z.string().optional(),
  apiKey: z.string().min(1).optional()
});

const terminalSchema = z.object({
  command: z.string().min(1).max(10_000)
});

const createNotepadSchema = z.object({
  name: z.string().max(200).optional(),
  content: z.string().max(200_000).optional(),
  isPinned: z.boolean().optional(),
  tags: z.array(z.string().max(100)).max(50).optional()
});

const updateNotepadSchema = createNotepadSchema.extend({
  name: z.string().min(1).max(200).optional()
});

function readRouteParam(value: string | string[] | undefined): string {
  if (!value) {
    return "";
  }
  if (Array.isArray(value)) {
    return value[0] || "";
  }
  return value;
}

function sendRouteError(res: Response, error: unknown, fallback: string): Response {
  if (error instanceof z.ZodError) {
    return res.status(400).json({
      error: "Invalid request body.",
      issues: error.issues
    });
  }
  log.error(fallback, error);
  return res.status(500).json({
    error: error instanceof Error ? error.message : fallback
  });
}

function writeLine(res: Response, payload: unknown): void {
  res.write(`${JSON.stringify(payload)}\n`);
}

function serializeSession(session: ComposerSession, policy: SanitizerPolicy) {
  return {
    id: session.id,
    createdAt: session.createdAt,
    projectRoot: session.projectRoot,
    mode: session.mode,
    mentions: session.mentions.list(),
    selectedText: session.selectedText,
    terminalOutput: session.terminalOutput,
    prompt: session.prompt,
    response: session.response,
    responseState: session.responseState,
    malformed: session.malformed,
    files: listFileProgress(session, sanitizerFor(policy)),
    actions: session.actions
  };
}

export function createApp(deps: AppDeps) {
  const app = express();
  const sanitize = sanitizerFor(deps.sanitizerPolicy);

  const mentionEnvironment = (session: ComposerSession): MentionEnvironment => {
    const workspace = deps.workspaces.get(session.projectRoot);
    return {
      files: workspace.files,
      index: workspace.index,
      search: deps.web,
      documents: deps.web,
      notepads: deps.notepads,
      selectedText: session.selectedText,
      terminalOutput: session.terminalOutput
    };
  };

  app.use(cors());
  app.use(express.json({ limit: "2mb" }));

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true, now: new Date().toISOString() });
  });

  app.post("/api/models", async (req, res) => {
    try {
      const payload = listModelsSchema.parse(req.body);
      const result = await listProviderModels(payload, deps.providers);
      return res.json(result);
    } catch (error) {
      return sendRouteError(res, error, "Failed to fetch model list.");
    }
  });

  app.post("/api/blocks/parse", (req, res) => {
    try {
      const payload = textSchema.parse(req.body);
      return res.json({ blocks: parseContentBlocks(payload.text) });
    } catch (error) {
      return sendRouteError(res, error, "Failed to parse content.");
    }
  });

  app.post("/api/sanitize", (req, res) => {
    try {
      const payload = sanitizeSchema.parse(req.body);
      return res.json({ content: sanitizeContent(payload.content, deps.sanitizerPolicy) });
    } catch (error) {
      return sendRouteError(res, error, "Failed to sanitize content.");
    }
  });

  app.post("/api/diff", (req, res) => {
    try {
      const payload = diffSchema.parse(req.body);
      const original = payload.original === null ? null : splitLines(payload.original);
      const lines = computeUnifiedDiff(original, splitLines(payload.updated), { strategy: payload.strategy });
      return res.json({ lines, ...summarizeChanges(lines, original === null) });
    } catch (error) {
      return sendRouteError(res, error, "Failed to compute diff.");
    }
  });

  app.post("/api/mentions/parse", (req, res) => {
    try {
      const payload = textSchema.parse(req.body);
      return res.json({ mentions: parseMentions(payload.text), text: removeMentions(payload.text) });
    } catch (error) {
      return sendRouteError(res, error, "Failed to parse mentions.");
    }
  });

  app.post("/api/session", (req, res) => {
    try {
      const payload = createSessionSchema.parse(req.body ?? {});
      const session = createSession({
        projectRoot: payload.projectRoot || deps.defaultProjectRoot,
        mode: payload.mode
      });
      return res.status(201).json({
        id: session.id,
        createdAt: session.createdAt,
        projectRoot: session.projectRoot,
        mode: session.mode
      });
    } catch (error) {
      return sendRouteError(res, error, "Failed to create session.");
    }
  });

  app.delete("/api/session/:id", (req, res) => {
    const removed = deleteSession(readRouteParam(req.params.id));
    if (!removed) {
      return res.status(404).json({ error: "Session not found." });
    }
    return res.json({ ok: true });
  });

  app.get("/api/session/:id/state", (req, res) => {
    const session = getSession(readRouteParam(req.params.id));
    if (!session) {
      return res.status(404).json({ error: "Session not found." });
    }
    return res.json(serializeSession(session, deps.sanitizerPolicy));
  });

  app.post("/api/session/:id/mentions", (req, res) => {
    try {
      const session = getSession(readRouteParam(req.params.id));
      if (!session) {
        return res.status(404).json({ error: "Session not found." });
      }

      const payload = addMentionSchema.parse(req.body);
      let added: Mention[];
      if ("text" in payload) {
        added = session.mentions.addFromText(payload.text);
      } else {
        const mention = createMention(payload.type, payload.value || "");
        added = session.mentions.add(mention) ? [mention] : [];
      }
      return res.json({ added, mentions: session.mentions.list() });
    } catch (error) {
      return sendRouteError(res, error, "Failed to add mention.");
    }
  });

  app.delete("/api/session/:id/mentions/:mentionId", (req, res) => {
    const session = getSession(readRouteParam(req.params.id));
    if (!session) {
      return res.status(404).json({ error: "Session not found." });
    }
    if (!session.mentions.remove(readRouteParam(req.params.mentionId))) {
      return res.status(404).json({ error: "Mention not found." });
    }
    return res.json({ mentions: session.mentions.list() });
  });

  app.put("/api/session/:id/editor", (req, res) => {
    try {
      const session = getSession(readRouteParam(req.params.id));
      if (!session) {
        return res.status(404).json({ error: "Session not found." });
      }

      const payload = editorStateSchema.parse(req.body);
      if (payload.selectedText !== undefined) {
        session.selectedText = payload.selectedText;
      }
      if (payload.terminalOutput !== undefined) {
        session.terminalOutput = payload.terminalOutput;
      }
      return res.json({ selectedText: session.selectedText, terminalOutput: session.terminalOutput });
    } catch (error) {
      return sendRouteError(res, error, "Failed to update editor state.");
    }
  });

  app.post("/api/session/:id/context", async (req, res) => {
    try {
      const session = getSession(readRouteParam(req.params.id));
      if (!session) {
        return res.status(404).json({ error: "Session not found." });
      }

      const payload = contextPreviewSchema.parse(req.body ?? {});
      const mentions = session.mentions.list();
      if (payload.resolve) {
        return res.json({ context: await buildMentionContextAsync(mentions, mentionEnvironment(session)) });
      }

      const workspace = deps.workspaces.get(session.projectRoot);
      const cachedFiles = new Map(
        Object.values(session.files).map((file) => [file.path, displayFileContent(file.state, sanitize)])
      );
      const context = buildMentionContext(mentions, {
        cachedFiles,
        index: workspace.index,
        notepads: deps.notepads,
        selectedText: session.selectedText,
        terminalOutput: session.terminalOutput
      });
      return res.json({ context });
    } catch (error) {
      return sendRouteError(res, error, "Failed to build context.");
    }
  });

  app.post("/api/session/:id/index", async (req, res) => {
    try {
      const session = getSession(readRouteParam(req.params.id));
      if (!session) {
        return res.status(404).json({ error: "Session not found." });
      }
      const stats = await deps.workspaces.get(session.projectRoot).index.indexProject();
      return res.json(stats);
    } catch (error) {
      return sendRouteError(res, error, "Failed to index project.");
    }
  });

  app.get("/api/session/:id/symbols", (req, res) => {
    const session = getSession(readRouteParam(req.params.id));
    if (!session) {
      return res.status(404).json({ error: "Session not found." });
    }
    const query = typeof req.query.q === "string" ? req.query.q : "";
    const index = deps.workspaces.get(session.projectRoot).index;
    return res.json({ lastIndexedAt: index.lastIndexedAt, symbols: index.searchSymbols(query).slice(0, 50) });
  });

  app.post("/api/session/:id/generate", async (req, res) => {
    const session = getSession(readRouteParam(req.params.id));
    if (!session) {
      return res.status(404).json({ error: "Session not found." });
    }

    let payload: z.infer<typeof generateSchema>;
    try {
      payload = generateSchema.parse(req.body);
    } catch (error) {
      return sendRouteError(res, error, "Failed to start generation.");
    }
    if (session.responseState.status === "streaming") {
      return res.status(409).json({ error: "Session is already generating." });
    }

    res.status(200);
    res.setHeader("Content-Type", "application/x-ndjson");
    res.setHeader("Cache-Control", "no-store");
    res.on("close", () => {
      if (!res.writableFinished) {
        stopGeneration(session);
      }
    });

    try {
      await runGeneration(
        session,
        {
          prompt: payload.prompt,
          provider: payload.provider || PROVIDERS[0],
          model: payload.model,
          apiKey: payload.apiKey
        },
        {
          streamCompletion: deps.streamCompletion,
          sanitizerPolicy: deps.sanitizerPolicy,
          environment: mentionEnvironment(session)
        },
        (event: GenerationEvent) => writeLine(res, event)
      );
    } catch (error) {
      if (error instanceof SessionBusyError) {
        writeLine(res, { type: "error", error: error.message });
      } else {
        log.error("Generation crashed", error);
        writeLine(res, { type: "error", error: error instanceof Error ? error.message : "Generation failed." });
      }
    }
    return res.end();
  });

  app.post("/api/session/:id/stop", (req, res) => {
    const session = getSession(readRouteParam(req.params.id));
    if (!session) {
      return res.status(404).json({ error: "Session not found." });
    }
    return res.json({ stopped: stopGeneration(session) });
  });

  app.get("/api/session/:id/files", async (req, res) => {
    try {
      const session = getSession(readRouteParam(req.params.id));
      if (!session) {
        return res.status(404).json({ error: "Session not found." });
      }

      const filePath = typeof req.query.path === "string" ? req.query.path : "";
      const file = session.files[filePath];
      if (!file) {
        return res.status(404).json({ error: "File not found in this session." });
      }

      const strategy = req.query.strategy === "lcs" ? "lcs" : "greedy";
      const description = await describeStreamingFile(file, deps.workspaces.get(session.projectRoot).files, {
        sanitize,
        strategy
      });
      return res.json(description);
    } catch (error) {
      return sendRouteError(res, error, "Failed to describe file.");
    }
  });

  app.post("/api/session/:id/actions/:actionId/apply", async (req, res) => {
    try {
      const session = getSession(readRouteParam(req.params.id));
      if (!session) {
        return res.status(404).json({ error: "Session not found." });
      }

      const action = await applyAction(
        session,
        readRouteParam(req.params.actionId),
        deps.workspaces.get(session.projectRoot).files
      );
      if (!action) {
        return res.status(404).json({ error: "Action not found." });
      }
      return res.json({ action });
    } catch (error) {
      if (error instanceof ActionNotPendingError) {
        return res.status(409).json({ error: error.message });
      }
      return sendRouteError(res, error, "Failed to apply action.");
    }
  });

  app.post("/api/session/:id/terminal", async (req, res) => {
    const session = getSession(readRouteParam(req.params.id));
    if (!session) {
      return res.status(404).json({ error: "Session not found." });
    }

    let payload: z.infer<typeof terminalSchema>;
    try {
      payload = terminalSchema.parse(req.body);
    } catch (error) {
      return sendRouteError(res, error, "Failed to run command.");
    }

    res.status(200);
    res.setHeader("Content-Type", "application/x-ndjson");
    res.setHeader("Cache-Control", "no-store");

    let output = "";
    let detached = false;
    const record = (text: string): void => {
      output += text;
      if (detached) {
        session.terminalOutput = output;
      }
    };

    // Resolves with null once a server or watcher is detached from the response.
    const exitCode = await new Promise<number | null>((resolve) => {
      const handle = deps.terminal.execute(payload.command, {
        cwd: session.projectRoot,
        onOutput: (text) => {
          record(text);
          if (!detached) {
            writeLine(res, { type: "output", text });
          }
        },
        onError: (text) => {
          record(text);
          if (!detached) {
            writeLine(res, { type: "error", text });
          }
        },
        onComplete: resolve,
        onLongRunning: () => {
          detached = true;
          resolve(null);
        }
      });
      res.on("close", () => {
        if (!res.writableFinished && !detached) {
          handle.cancel();
        }
      });
    });

    session.terminalOutput = output;
    writeLine(res, exitCode === null ? { type: "running" } : { type: "exit", exitCode });
    return res.end();
  });

  app.post("/api/terminal/stop", (_req, res) => {
    return res.json({ stopped: deps.terminal.cancelCurrent() });
  });

  app.get("/api/notepads", (req, res) => {
    const query = typeof req.query.q === "string" ? req.query.q.trim() : "";
    return res.json({
      notepads: query ? deps.notepads.search(query) : deps.notepads.list(),
      activeNotepadId: deps.notepads.activeNotepadId
    });
  });

  app.post("/api/notepads", async (req, res) => {
    try {
      const payload = createNotepadSchema.parse(req.body ?? {});
      const notepad = await deps.notepads.create(payload);
      return res.status(201).json({ notepad });
    } catch (error) {
      return sendRouteError(res, error, "Failed to create notepad.");
    }
  });

  app.put("/api/notepads/:id", async (req, res) => {
    try {
      const payload = updateNotepadSchema.parse(req.body);
      const notepad = await deps.notepads.update(readRouteParam(req.params.id), payload);
      if (!notepad) {
        return res.status(404).json({ error: "Notepad not found." });
      }
      return res.json({ notepad });
    } catch (error) {
      return sendRouteError(res, error, "Failed to update notepad.");
    }
  });

  app.delete("/api/notepads/:id", async (req, res) => {
    try {
      const removed = await deps.notepads.remove(readRouteParam(req.params.id));
      if (!removed) {
        return res.status(404).json({ error: "Notepad not found." });
      }
      return res.json({ ok: true });
    } catch (error) {
      return sendRouteError(res, error, "Failed to delete notepad.");
    }
  });

  return app;
}
