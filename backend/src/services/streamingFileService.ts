import path from "node:path";
import { FileContentState, StreamingFileInfo, TrackedFile, UnifiedDiffLine } from "../types.js";
import { isFenceLine, FENCE_MARKER } from "./contentBlockParser.js";
import { sanitizeContent } from "./contentSanitizer.js";
import { computeUnifiedDiff, DiffStrategy, summarizeChanges } from "./diffService.js";
import { splitLines } from "./textLines.js";

export type Sanitizer = (content: string) => string;

export type ExtractedFile = {
  path: string;
  language: string;
  content: string;
  isStreaming: boolean;
};

export type FileDescription = {
  info: StreamingFileInfo;
  diff: UnifiedDiffLine[];
};

export interface FileReader {
  exists(relativePath: string): Promise<boolean>;
  readText(relativePath: string): Promise<string>;
}

const FILE_HEADER_PATTERNS = [
  /`([^`]+\.[a-zA-Z0-9]+)`[:\s]*$/,
  /\*\*([^*]+\.[a-zA-Z0-9]+)\*\*[:\s]*$/,
  /^###\s+(.+\.[a-zA-Z0-9]+)\s*$/
];

const LANGUAGE_BY_EXTENSION: Record<string, string> = {
  swift: "swift",
  js: "javascript",
  jsx: "javascript",
  ts: "typescript",
  tsx: "typescript",
  py: "python",
  json: "json",
  html: "html",
  css: "css",
  md: "markdown"
};

export function detectLanguage(filePath: string): string {
  const extension = path.extname(filePath).slice(1).toLowerCase();
  return LANGUAGE_BY_EXTENSION[extension] ?? "text";
}

function matchFileHeader(line: string): string | null {
  const trimmed = line.trim();
  for (const pattern of FILE_HEADER_PATTERNS) {
    const match = trimmed.match(pattern);
    if (match?.[1]) {
      return match[1].trim();
    }
  }
  return null;
}

/**
 * Finds code blocks announced by a file-name line (`` `a.ts` ``, `**a.ts**`
 * or `### a.ts`) right before the opening fence. The first block for a path
 * wins. An unclosed block is reported only while the response is still
 * loading.
 */
export function extractStreamingFiles(response: string, isLoading: boolean): ExtractedFile[] {
  const lines = splitLines(response);
  const files: ExtractedFile[] = [];
  const seen = new Set<string>();

  let index = 0;
  while (index < lines.length) {
    if (!isFenceLine(lines[index])) {
      index += 1;
      continue;
    }

    const filePath = index > 0 ? matchFileHeader(lines[index - 1]) : null;
    const fenceLanguage = lines[index].slice(FENCE_MARKER.length).trim();
    const body: string[] = [];
    let cursor = index + 1;
    while (cursor < lines.length && !isFenceLine(lines[cursor])) {
      body.push(lines[cursor]);
      cursor += 1;
    }
    const closed = cursor < lines.length;

    if (filePath && !seen.has(filePath) && (closed || isLoading)) {
      seen.add(filePath);
      files.push({
        path: filePath,
        language: fenceLanguage || detectLanguage(filePath),
        content: body.join("\n"),
        isStreaming: !closed
      });
    }

    index = closed ? cursor + 1 : cursor;
  }

  return files;
}

export function createStreamingContent(buffer = ""): FileContentState {
  return { phase: "streaming", buffer };
}

export function appendStreamingContent(state: FileContentState, chunk: string): FileContentState {
  return state.phase === "streaming" ? { phase: "streaming", buffer: state.buffer + chunk } : state;
}

export function replaceStreamingContent(state: FileContentState, buffer: string): FileContentState {
  return state.phase === "streaming" ? { phase: "streaming", buffer } : state;
}

/** Takes the final sanitize pass. Freezing a frozen state returns it unchanged. */
export function freezeFileContent(state: FileContentState, sanitize: Sanitizer = sanitizeContent): FileContentState {
  return state.phase === "streaming" ? { phase: "frozen", snapshot: sanitize(state.buffer) } : state;
}

export function displayFileContent(state: FileContentState, sanitize: Sanitizer = sanitizeContent): string {
  return state.phase === "streaming" ? sanitize(state.buffer) : state.snapshot;
}

export async function describeStreamingFile(
  file: TrackedFile,
  reader: FileReader,
  options: { sanitize?: Sanitizer; strategy?: DiffStrategy } = {}
): Promise<FileDescription> {
  const content = displayFileContent(file.state, options.sanitize);
  const original = (await reader.exists(file.path)) ? splitLines(await reader.readText(file.path)) : null;
  const diff = computeUnifiedDiff(original, splitLines(content), { strategy: options.strategy });
  const changes = summarizeChanges(diff, original === null);

  return {
    info: {
      path: file.path,
      name: path.posix.basename(file.path),
      content,
      language: file.language,
      isStreaming: file.state.phase === "streaming",
      addedLines: changes.addedLines,
      removedLines: changes.removedLines,
      changeSummary: changes.summary
    },
    diff
  };
}
