import { promises as fs } from "node:fs";
import path from "node:path";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { createLogger } from "../logger.js";
import { isMissingFileError } from "./fileSystemService.js";

const log = createLogger("Notepads");

const STORAGE_FILENAME = "notepads.json";

export type Notepad = {
  id: string;
  name: string;
  content: string;
  createdAt: string;
  updatedAt: string;
  isPinned: boolean;
  tags: string[];
};

export type NotepadUpdate = Partial<Pick<Notepad, "name" | "content" | "isPinned" | "tags">>;

const notepadSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  content: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
  isPinned: z.boolean().default(false),
  tags: z.array(z.string()).default([])
});

const persistedFileSchema = z.object({
  version: z.literal(1),
  savedAt: z.string(),
  activeNotepadId: z.string().nullable(),
  notepads: z.array(notepadSchema)
});

type PersistedNotepadFile = z.infer<typeof persistedFileSchema>;

function cloneNotepad(notepad: Notepad): Notepad {
  return { ...notepad, tags: [...notepad.tags] };
}

function parseNotepadFile(raw: string): PersistedNotepadFile {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new Error("Notepad file is invalid JSON.");
  }

  const version = z.object({ version: z.unknown() }).safeParse(parsed);
  if (!version.success || version.data.version !== 1) {
    throw new Error("Notepad file version is unsupported.");
  }

  const result = persistedFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error("Notepad file is missing notepads.");
  }
  return result.data;
}

export function formatNotepadContext(notepad: Notepad): string {
  return `## Notepad: ${notepad.name}\nLast updated: ${notepad.updatedAt}\n\n${notepad.content}`;
}

type NotepadState = {
  notepads: Notepad[];
  activeId: string | null;
};

type NotepadChange<T> = {
  next?: NotepadState;
  result: T;
};

/**
 * Notepads kept in memory and written through to `<dataDir>/notepads.json`.
 * Changes run one at a time: each is written first and only then becomes the
 * in-memory state, so a failed write leaves the notepads as they were.
 */
export class NotepadService {
  private notepads: Notepad[] = [];
  private activeId: string | null = null;
  private writeQueue: Promise<void> = Promise.resolve();

  private constructor(
    private readonly storageFile: string,
    private readonly now: () => Date
  ) {}

  static async load(dataDir: string, now: () => Date = () => new Date()): Promise<NotepadService> {
    const service = new NotepadService(path.join(dataDir, STORAGE_FILENAME), now);

    let raw = "";
    try {
      raw = await fs.readFile(service.storageFile, "utf8");
    } catch (error) {
      if (isMissingFileError(error)) {
        return service;
      }
      throw new Error("Failed to read notepad file.");
    }

    const persisted = parseNotepadFile(raw);
    service.notepads = persisted.notepads.map(cloneNotepad);
    service.activeId = persisted.activeNotepadId;
    log.info(`Loaded ${service.notepads.length} notepads`);
    return service;
  }

  list(): Notepad[] {
    return [...this.notepads]
      .sort((left, right) => {
        if (left.isPinned !== right.isPinned) {
          return left.isPinned ? -1 : 1;
        }
        return right.updatedAt.localeCompare(left.updatedAt);
      })
      .map(cloneNotepad);
  }

  get activeNotepadId(): string | null {
    return this.activeId;
  }

  getById(id: string): Notepad | undefined {
    const notepad = this.notepads.find((item) => item.id === id);
    return notepad ? cloneNotepad(notepad) : undefined;
  }

  getByName(name: string): Notepad | undefined {
    const lowered = name.toLowerCase();
    const notepad = this.notepads.find((item) => item.name.toLowerCase() === lowered);
    return notepad ? cloneNotepad(notepad) : undefined;
  }

  search(query: string): Notepad[] {
    const lowered = query.toLowerCase();
    return this.notepads
      .filter(
        (notepad) =>
          notepad.name.toLowerCase().includes(lowered) ||
          notepad.content.toLowerCase().includes(lowered) ||
          notepad.tags.some((tag) => tag.toLowerCase().includes(lowered))
      )
      .map(cloneNotepad);
  }

  create(input: { name?: string; content?: string; isPinned?: boolean; tags?: string[] } = {}): Promise<Notepad> {
    return this.applyChange((state) => {
      const timestamp = this.now().toISOString();
      const notepad: Notepad = {
        id: uuidv4(),
        name: input.name || "Untitled",
        content: input.content || "",
        createdAt: timestamp,
        updatedAt: timestamp,
        isPinned: input.isPinned ?? false,
        tags: input.tags ? [...input.tags] : []
      };
      return {
        next: { notepads: [notepad, ...state.notepads], activeId: notepad.id },
        result: cloneNotepad(notepad)
      };
    });
  }

  update(id: string, changes: NotepadUpdate): Promise<Notepad | undefined> {
    return this.applyChange((state): NotepadChange<Notepad | undefined> => {
      const existing = state.notepads.find((item) => item.id === id);
      if (!existing) {
        return { result: undefined };
      }

      const updated: Notepad = {
        ...existing,
        name: changes.name ?? existing.name,
        content: changes.content ?? existing.content,
        isPinned: changes.isPinned ?? existing.isPinned,
        tags: [...(changes.tags ?? existing.tags)],
        updatedAt: this.now().toISOString()
      };
      return {
        next: {
          notepads: state.notepads.map((item) => (item.id === id ? updated : item)),
          activeId: state.activeId
        },
        result: cloneNotepad(updated)
      };
    });
  }

  remove(id: string): Promise<boolean> {
    return this.applyChange((state) => {
      const notepads = state.notepads.filter((item) => item.id !== id);
      if (notepads.length === state.notepads.length) {
        return { result: false };
      }
      const activeId = state.activeId === id ? (notepads[0]?.id ?? null) : state.activeId;
      return { next: { notepads, activeId }, result: true };
    });
  }

  /** Context text for a named notepad, or the active one when no name is given. */
  buildContext(name?: string): string {
    const notepad = name ? this.getByName(name) : this.activeId ? this.getById(this.activeId) : undefined;
    return notepad ? formatNotepadContext(notepad) : "No notepad found.";
  }

  private applyChange<T>(change: (state: NotepadState) => NotepadChange<T>): Promise<T> {
    const run = this.writeQueue.then(async () => {
      const { next, result } = change({ notepads: this.notepads, activeId: this.activeId });
      if (next) {
        await this.write(next);
        this.notepads = next.notepads;
        this.activeId = next.activeId;
      }
      return result;
    });
    this.writeQueue = run.then(
      () => undefined,
      (error: unknown) => {
        log.error("Failed to write notepad file", error);
      }
    );
    return run;
  }

  private async write(state: NotepadState): Promise<void> {
    const payload: PersistedNotepadFile = {
      version: 1,
      savedAt: this.now().toISOString(),
      activeNotepadId: state.activeId,
      notepads: state.notepads.map(cloneNotepad)
    };
    await fs.mkdir(path.dirname(this.storageFile), { recursive: true });
    await fs.writeFile(this.storageFile, JSON.stringify(payload, null, 2), "utf8");
  }
}
