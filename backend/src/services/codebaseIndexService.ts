import path from "node:path";
import { createLogger } from "../logger.js";
import { FileSystemService } from "./fileSystemService.js";
import { splitLines } from "./textLines.js";

const log = createLogger("CodebaseIndex");

export type SymbolKind =
  | "class"
  | "struct"
  | "enum"
  | "protocol"
  | "interface"
  | "type"
  | "function"
  | "variable"
  | "extension";

export type IndexedSymbol = {
  name: string;
  kind: SymbolKind;
  filePath: string;
  line: number;
  signature: string | null;
};

export type IndexedFile = {
  relativePath: string;
  language: string;
  lineCount: number;
  symbols: IndexedSymbol[];
  imports: string[];
  summary: string | null;
};

export type IndexStats = {
  fileCount: number;
  symbolCount: number;
  indexedAt: string;
};

const MAX_INDEXED_FILES = 5000;

const INDEX_IGNORED_DIRECTORIES = [
  "node_modules",
  "build",
  "dist",
  "DerivedData",
  "Pods",
  "__pycache__",
  "venv",
  "target"
];

const LANGUAGE_BY_EXTENSION: Record<string, string> = {
  swift: "swift",
  py: "python",
  js: "javascript",
  jsx: "javascript",
  mjs: "javascript",
  cjs: "javascript",
  ts: "typescript",
  tsx: "typescript",
  java: "java",
  kt: "kotlin",
  go: "go",
  rs: "rust",
  c: "c",
  h: "c",
  cpp: "cpp",
  hpp: "cpp",
  cc: "cpp",
  m: "objc",
  mm: "objc"
};

type SymbolPattern = [RegExp, SymbolKind];

const SCRIPT_PATTERNS: SymbolPattern[] = [
  [/^(?:export\s+)?(?:default\s+)?(?:async\s+)?function\s*\*?\s*(\w+)/, "function"],
  [/^(?:export\s+)?(?:const|let|var)\s+(\w+)\s*=\s*(?:async\s+)?(?:\([^)]*\)|\w+)\s*(?::[^=]+)?=>/, "function"],
  [/^(?:export\s+)?(?:default\s+)?(?:abstract\s+)?class\s+(\w+)/, "class"],
  [/^(?:export\s+)?interface\s+(\w+)/, "interface"],
  [/^(?:export\s+)?type\s+(\w+)\s*(?:<[^>]*>)?\s*=/, "type"],
  [/^(?:export\s+)?(?:const\s+)?enum\s+(\w+)/, "enum"],
  [/^(?:export\s+)?(?:const|let|var)\s+(\w+)/, "variable"]
];

const SYMBOL_PATTERNS: Record<string, SymbolPattern[]> = {
  swift: [
    [/^(?:public |private |internal |fileprivate |open |final )*class\s+(\w+)/, "class"],
    [/^(?:public |private |internal |fileprivate )*struct\s+(\w+)/, "struct"],
    [/^(?:public |private |internal |fileprivate )*enum\s+(\w+)/, "enum"],
    [/^(?:public |private |internal |fileprivate )*protocol\s+(\w+)/, "protocol"],
    [/^(?:public |private |internal |fileprivate |open )*(?:static |class )?func\s+(\w+)/, "function"],
    [/^extension\s+(\w+)/, "extension"]
  ],
  javascript: SCRIPT_PATTERNS,
  typescript: SCRIPT_PATTERNS,
  python: [
    [/^(?:async\s+)?def\s+(\w+)/, "function"],
    [/^class\s+(\w+)/, "class"]
  ]
};

export function detectIndexLanguage(relativePath: string): string | null {
  const extension = path.extname(relativePath).slice(1).toLowerCase();
  return LANGUAGE_BY_EXTENSION[extension] ?? null;
}

export function extractSymbols(content: string, language: string, filePath: string): IndexedSymbol[] {
  const patterns = SYMBOL_PATTERNS[language];
  if (!patterns) {
    return [];
  }

  const symbols: IndexedSymbol[] = [];
  splitLines(content).forEach((rawLine, index) => {
    const line = rawLine.trim();
    for (const [pattern, kind] of patterns) {
      const match = line.match(pattern);
      if (match?.[1]) {
        symbols.push({ name: match[1], kind, filePath, line: index + 1, signature: line });
        break;
      }
    }
  });
  return symbols;
}

export function extractImports(content: string, language: string): string[] {
  const imports: string[] = [];
  for (const rawLine of splitLines(content)) {
    const line = rawLine.trim();
    if (language === "javascript" || language === "typescript") {
      const match = line.match(/from\s+['"]([^'"]+)['"]/) ?? line.match(/^import\s+['"]([^'"]+)['"]/);
      if (match?.[1]) {
        imports.push(match[1]);
      }
    } else if (language === "python") {
      if (line.startsWith("import ") || line.startsWith("from ")) {
        imports.push(line);
      }
    } else if (language === "swift" && line.startsWith("import ")) {
      imports.push(line.slice("import ".length).trim());
    }
  }
  return imports;
}

function countLabel(count: number, singular: string, plural: string): string {
  return `${count} ${count === 1 ? singular : plural}`;
}

export function summarizeSymbols(symbols: IndexedSymbol[]): string | null {
  const parts: string[] = [];
  const count = (kinds: SymbolKind[]): number => symbols.filter((symbol) => kinds.includes(symbol.kind)).length;

  const classes = count(["class"]);
  const structs = count(["struct"]);
  const interfaces = count(["protocol", "interface"]);
  const functions = count(["function"]);

  if (classes > 0) {
    parts.push(countLabel(classes, "class", "classes"));
  }
  if (structs > 0) {
    parts.push(countLabel(structs, "struct", "structs"));
  }
  if (interfaces > 0) {
    parts.push(countLabel(interfaces, "interface", "interfaces"));
  }
  if (functions > 0) {
    parts.push(countLabel(functions, "function", "functions"));
  }
  return parts.length > 0 ? parts.join(", ") : null;
}

/**
 * In-memory symbol index of one project. Built on demand; queries only read
 * what the last build collected.
 */
export class CodebaseIndexService {
  private files = new Map<string, IndexedFile>();
  private symbolsByName = new Map<string, IndexedSymbol[]>();
  private indexedAt: string | null = null;
  private building: Promise<IndexStats> | null = null;

  constructor(private readonly fileSystem: FileSystemService) {}

  get lastIndexedAt(): string | null {
    return this.indexedAt;
  }

  indexProject(): Promise<IndexStats> {
    if (!this.building) {
      this.building = this.buildIndex().finally(() => {
        this.building = null;
      });
    }
    return this.building;
  }

  private async buildIndex(): Promise<IndexStats> {
    const paths = await this.fileSystem.listFiles("", {
      limit: MAX_INDEXED_FILES,
      ignoredDirectories: INDEX_IGNORED_DIRECTORIES
    });

    const files = new Map<string, IndexedFile>();
    const symbolsByName = new Map<string, IndexedSymbol[]>();

    for (const relativePath of paths) {
      const language = detectIndexLanguage(relativePath);
      if (!language) {
        continue;
      }

      let content = "";
      try {
        content = await this.fileSystem.readText(relativePath);
      } catch (error) {
        log.debug(`Skipping unreadable file ${relativePath}`, error);
        continue;
      }

      const symbols = extractSymbols(content, language, relativePath);
      files.set(relativePath, {
        relativePath,
        language,
        lineCount: splitLines(content).length,
        symbols,
        imports: extractImports(content, language),
        summary: summarizeSymbols(symbols)
      });
      for (const symbol of symbols) {
        const list = symbolsByName.get(symbol.name) || [];
        list.push(symbol);
        symbolsByName.set(symbol.name, list);
      }
    }

    this.files = files;
    this.symbolsByName = symbolsByName;
    this.indexedAt = new Date().toISOString();

    const symbolCount = Array.from(files.values()).reduce((total, file) => total + file.symbols.length, 0);
    log.info(`Indexed ${files.size} files (${symbolCount} symbols) in ${this.fileSystem.projectRoot}`);
    return { fileCount: files.size, symbolCount, indexedAt: this.indexedAt };
  }

  findSymbol(name: string): IndexedSymbol[] {
    if (!name) {
      return [];
    }
    const exact = this.symbolsByName.get(name);
    if (exact) {
      return [...exact];
    }
    const lowered = name.toLowerCase();
    return Array.from(this.symbolsByName.entries())
      .filter(([key]) => key.toLowerCase() === lowered)
      .flatMap(([, symbols]) => symbols);
  }

  searchSymbols(prefix: string): IndexedSymbol[] {
    const lowered = prefix.toLowerCase();
    return Array.from(this.symbolsByName.entries())
      .filter(([key]) => key.toLowerCase().startsWith(lowered))
      .flatMap(([, symbols]) => symbols);
  }

  getRelevantFiles(query: string, limit = 10): IndexedFile[] {
    const words = query
      .toLowerCase()
      .split(/\s+/)
      .filter((word) => word.length > 0);
    if (words.length === 0) {
      return [];
    }

    return Array.from(this.files.values())
      .map((file) => {
        let score = 0;
        const filePath = file.relativePath.toLowerCase();
        for (const word of words) {
          if (filePath.includes(word)) {
            score += 5;
          }
          for (const symbol of file.symbols) {
            if (symbol.name.toLowerCase().includes(word)) {
              score += 3;
            }
          }
          for (const entry of file.imports) {
            if (entry.toLowerCase().includes(word)) {
              score += 1;
            }
          }
        }
        return { file, score };
      })
      .filter((entry) => entry.score > 0)
      .sort((left, right) => right.score - left.score || left.file.relativePath.localeCompare(right.file.relativePath))
      .slice(0, limit)
      .map((entry) => entry.file);
  }
}
