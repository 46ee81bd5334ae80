import path from "node:path";
import { createLogger } from "../logger.js";
import { Mention } from "../types.js";
import type { IndexedFile, IndexedSymbol } from "./codebaseIndexService.js";
import type { ListFilesOptions } from "./fileSystemService.js";
import { SearchResult, stripHtml } from "./webSearchService.js";

const log = createLogger("MentionContext");

const FOLDER_SCAN_LIMIT = 20;
const FOLDER_RENDER_LIMIT = 10;
const FOLDER_ENTRY_CHARS = 1000;
const SYMBOL_LIMIT = 5;
const RELEVANT_FILE_QUERY_LIMIT = 10;
const RELEVANT_FILE_RENDER_LIMIT = 5;
const KEY_SYMBOL_LIMIT = 3;
const WEB_RESULT_LIMIT = 5;
const DOCS_CHAR_LIMIT = 5000;

export interface ProjectFiles {
  readText(relativePath: string): Promise<string>;
  listFiles(relativeDir?: string, options?: ListFilesOptions): Promise<string[]>;
}

export interface CodebaseIndex {
  readonly lastIndexedAt: string | null;
  findSymbol(name: string): IndexedSymbol[];
  getRelevantFiles(query: string, limit?: number): IndexedFile[];
}

export interface BuildableCodebaseIndex extends CodebaseIndex {
  indexProject(): Promise<unknown>;
}

export interface WebSearcher {
  search(query: string, signal?: AbortSignal): Promise<SearchResult[]>;
}

export interface DocumentFetcher {
  fetchText(url: string, signal?: AbortSignal): Promise<string>;
}

export interface NotepadSource {
  buildContext(name?: string): string;
}

/** Data already in memory; the synchronous builder reads nothing else. */
export type MentionSnapshot = {
  cachedFiles?: ReadonlyMap<string, string>;
  index?: CodebaseIndex;
  notepads?: NotepadSource;
  selectedText?: string | null;
  terminalOutput?: string | null;
};

export type MentionEnvironment = {
  files?: ProjectFiles;
  index?: BuildableCodebaseIndex;
  search?: WebSearcher;
  documents?: DocumentFetcher;
  notepads?: NotepadSource;
  selectedText?: string | null;
  terminalOutput?: string | null;
};

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function fileSection(name: string, content: string): string {
  return `\n\n--- File: ${name} ---\n${content}`;
}

function folderSection(name: string, entries: Array<{ path: string; content: string }>): string {
  let section = `\n\n--- Folder: ${name || "root"} ---\n`;
  for (const entry of entries.slice(0, FOLDER_RENDER_LIMIT)) {
    section += `\n--- ${path.posix.basename(entry.path)} ---\n${entry.content.slice(0, FOLDER_ENTRY_CHARS)}`;
  }
  return section;
}

function codebaseSection(query: string, index: CodebaseIndex): string {
  const symbols = index.findSymbol(query);
  const files = index.getRelevantFiles(query, RELEVANT_FILE_QUERY_LIMIT);
  let section = `\n\n--- Codebase Context: ${query} ---\n`;

  if (symbols.length > 0) {
    section += "\n### Matching Symbols:\n";
    for (const symbol of symbols.slice(0, SYMBOL_LIMIT)) {
      section += `- ${symbol.kind} ${symbol.name} in ${symbol.filePath}:${symbol.line}\n`;
      if (symbol.signature) {
        section += `  ${symbol.signature}\n`;
      }
    }
  }

  if (files.length > 0) {
    section += "\n### Relevant Files:\n";
    for (const file of files.slice(0, RELEVANT_FILE_RENDER_LIMIT)) {
      section += `\n${file.relativePath}:\n`;
      if (file.summary) {
        section += `Summary: ${file.summary}\n`;
      }
      section += `Symbols: ${file.symbols.length}, Lines: ${file.lineCount}\n`;
      const keySymbols = file.symbols.slice(0, KEY_SYMBOL_LIMIT).map((symbol) => symbol.name);
      if (keySymbols.length > 0) {
        section += `Key symbols: ${keySymbols.join(", ")}\n`;
      }
    }
  }

  return section;
}

function selectionSection(selectedText: string | null | undefined): string {
  return selectedText ? `\n\n--- Selected Code ---\n${selectedText}` : "";
}

function terminalSection(terminalOutput: string | null | undefined): string {
  return terminalOutput === null || terminalOutput === undefined
    ? ""
    : `\n\n--- Terminal Output ---\n${terminalOutput}`;
}

function notepadSection(name: string, notepads: NotepadSource | undefined): string {
  if (!notepads) {
    return "";
  }
  const heading = name ? `Notepad: ${name}` : "Notepad";
  return `\n\n--- ${heading} ---\n${notepads.buildContext(name || undefined)}`;
}

function isInFolder(filePath: string, folder: string): boolean {
  if (!folder) {
    return true;
  }
  const prefix = folder.endsWith("/") ? folder : `${folder}/`;
  return filePath.startsWith(prefix);
}

function isHiddenPath(filePath: string): boolean {
  return filePath.split("/").some((segment) => segment.startsWith("."));
}

/**
 * Expands mentions into prompt context using only in-memory data. Web and docs
 * mentions need network access and leave a bracketed placeholder.
 */
export function buildMentionContext(mentions: Mention[], snapshot: MentionSnapshot): string {
  let context = "";

  for (const mention of mentions) {
    switch (mention.type) {
      case "file": {
        const content = mention.value ? snapshot.cachedFiles?.get(mention.value) : undefined;
        if (content !== undefined) {
          context += fileSection(mention.value, content);
        }
        break;
      }
      case "folder": {
        if (!snapshot.cachedFiles) {
          break;
        }
        const entries = Array.from(snapshot.cachedFiles.entries())
          .filter(([filePath]) => isInFolder(filePath, mention.value) && !isHiddenPath(filePath))
          .sort(([left], [right]) => left.localeCompare(right))
          .slice(0, FOLDER_SCAN_LIMIT)
          .map(([filePath, content]) => ({ path: filePath, content }));
        context += folderSection(mention.value, entries);
        break;
      }
      case "codebase":
        if (snapshot.index && snapshot.index.lastIndexedAt !== null) {
          context += codebaseSection(mention.value, snapshot.index);
        }
        break;
      case "selection":
        context += selectionSection(snapshot.selectedText);
        break;
      case "terminal":
        context += terminalSection(snapshot.terminalOutput);
        break;
      case "web":
        context += `\n\n[Web search for: ${mention.value}]`;
        break;
      case "docs":
        context += `\n\n[Documentation for: ${mention.value}]`;
        break;
      case "notepad":
        context += notepadSection(mention.value, snapshot.notepads);
        break;
    }
  }

  return context;
}

async function buildFileSection(value: string, files: ProjectFiles | undefined): Promise<string> {
  if (!files || !value) {
    return "";
  }
  try {
    return fileSection(value, await files.readText(value));
  } catch (error) {
    log.debug(`Skipping @file:${value}`, error);
    return "";
  }
}

async function buildFolderSection(value: string, files: ProjectFiles | undefined): Promise<string> {
  if (!files) {
    return "";
  }

  let paths: string[];
  try {
    paths = await files.listFiles(value, { limit: FOLDER_SCAN_LIMIT });
  } catch (error) {
    log.debug(`Skipping @folder:${value}`, error);
    return "";
  }

  const entries: Array<{ path: string; content: string }> = [];
  for (const filePath of paths.slice(0, FOLDER_RENDER_LIMIT)) {
    try {
      entries.push({ path: filePath, content: await files.readText(filePath) });
    } catch (error) {
      log.debug(`Skipping unreadable folder entry ${filePath}`, error);
    }
  }
  return folderSection(value, entries);
}

async function buildCodebaseSection(value: string, index: BuildableCodebaseIndex | undefined): Promise<string> {
  if (!index) {
    return "";
  }
  if (index.lastIndexedAt === null) {
    try {
      await index.indexProject();
    } catch (error) {
      log.warn("Codebase index build failed", error);
    }
  }
  return codebaseSection(value, index);
}

async function buildWebSection(value: string, search: WebSearcher | undefined, signal?: AbortSignal): Promise<string> {
  if (!search) {
    return `\n\n[Web search unavailable for: ${value}]`;
  }

  try {
    const results = await search.search(value, signal);
    let section = `\n\n--- Web Search: ${value} ---\n`;
    if (results.length === 0) {
      return `${section}No results found for "${value}".`;
    }
    results.slice(0, WEB_RESULT_LIMIT).forEach((result, position) => {
      section += `\n${position + 1}. ${result.title}\n${result.url}\n${result.snippet}\n`;
    });
    return section;
  } catch (error) {
    return `\n\n[Web search failed for "${value}": ${errorMessage(error)}]`;
  }
}

function isAbsoluteUrl(value: string): boolean {
  return /^https?:\/\/\S+$/i.test(value);
}

function isRepositorySlug(value: string): boolean {
  return /^[\w.-]+\/[\w.-]+$/.test(value);
}

async function fetchReadme(slug: string, documents: DocumentFetcher, signal?: AbortSignal): Promise<string> {
  try {
    return await documents.fetchText(`https://raw.githubusercontent.com/${slug}/main/README.md`, signal);
  } catch (error) {
    log.debug(`README not found on main for ${slug}, trying master`, error);
    return documents.fetchText(`https://raw.githubusercontent.com/${slug}/master/README.md`, signal);
  }
}

async function buildDocsSection(
  value: string,
  env: MentionEnvironment,
  signal?: AbortSignal
): Promise<string> {
  try {
    if (isAbsoluteUrl(value)) {
      if (!env.documents) {
        return `\n\n[Documentation unavailable for: ${value}]`;
      }
      const text = stripHtml(await env.documents.fetchText(value, signal));
      return `\n\n--- Documentation: ${value} ---\n${text.slice(0, DOCS_CHAR_LIMIT)}`;
    }

    if (isRepositorySlug(value)) {
      if (!env.documents) {
        return `\n\n[Documentation unavailable for: ${value}]`;
      }
      const readme = await fetchReadme(value, env.documents, signal);
      return `\n\n--- Documentation: ${value} (README) ---\n${readme.slice(0, DOCS_CHAR_LIMIT)}`;
    }

    if (!env.search) {
      return `\n\n[Documentation unavailable for: ${value}]`;
    }
    const [first] = await env.search.search(`${value} documentation`, signal);
    if (!first) {
      return `\n\n--- Documentation: ${value} ---\nNo documentation found for "${value}".`;
    }
    return `\n\n--- Documentation: ${value} ---\n${first.title}\n${first.url}\n${first.snippet}`;
  } catch (error) {
    return `\n\n[Failed to fetch documentation for "${value}": ${errorMessage(error)}]`;
  }
}

async function buildSection(mention: Mention, env: MentionEnvironment, signal?: AbortSignal): Promise<string> {
  switch (mention.type) {
    case "file":
      return buildFileSection(mention.value, env.files);
    case "folder":
      return buildFolderSection(mention.value, env.files);
    case "codebase":
      return buildCodebaseSection(mention.value, env.index);
    case "selection":
      return selectionSection(env.selectedText);
    case "terminal":
      return terminalSection(env.terminalOutput);
    case "web":
      return buildWebSection(mention.value, env.search, signal);
    case "docs":
      return buildDocsSection(mention.value, env, signal);
    case "notepad":
      return notepadSection(mention.value, env.notepads);
  }
}

/**
 * Expands mentions one at a time, in order, performing whatever I/O each one
 * needs. A failing mention degrades to a bracketed note or nothing. Once
 * `signal` is aborted no further mentions are started and the context built
 * so far is returned.
 */
export async function buildMentionContextAsync(
  mentions: Mention[],
  env: MentionEnvironment,
  signal?: AbortSignal
): Promise<string> {
  let context = "";
  for (const mention of mentions) {
    if (signal?.aborted) {
      log.debug(`Context build stopped before ${mention.displayName}`);
      break;
    }
    context += await buildSection(mention, env, signal);
  }
  return context;
}
