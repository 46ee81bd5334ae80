import type { IndexedFile, IndexedSymbol } from "../codebaseIndexService.js";
import {
  buildMentionContext,
  buildMentionContextAsync,
  BuildableCodebaseIndex,
  DocumentFetcher,
  ProjectFiles,
  WebSearcher
} from "../mentionContextService.js";
import { createMention } from "../mentionParser.js";
import type { SearchResult } from "../webSearchService.js";

const loginSymbol: IndexedSymbol = {
  name: "login",
  kind: "function",
  filePath: "src/auth.ts",
  line: 3,
  signature: "export function login() {"
};

const authFile: IndexedFile = {
  relativePath: "src/auth.ts",
  language: "typescript",
  lineCount: 10,
  symbols: [loginSymbol],
  imports: [],
  summary: "1 function"
};

const CODEBASE_SECTION =
  "\n\n--- Codebase Context: login ---\n" +
  "\n### Matching Symbols:\n" +
  "- function login in src/auth.ts:3\n" +
  "  export function login() {\n" +
  "\n### Relevant Files:\n" +
  "\nsrc/auth.ts:\n" +
  "Summary: 1 function\n" +
  "Symbols: 1, Lines: 10\n" +
  "Key symbols: login\n";

class FakeIndex implements BuildableCodebaseIndex {
  lastIndexedAt: string | null;
  readonly indexProject = jest.fn(async () => {
    this.lastIndexedAt = "2026-01-01T00:00:00.000Z";
  });

  constructor(indexed: boolean) {
    this.lastIndexedAt = indexed ? "2026-01-01T00:00:00.000Z" : null;
  }

  findSymbol(name: string): IndexedSymbol[] {
    return name === "login" && this.lastIndexedAt ? [loginSymbol] : [];
  }

  getRelevantFiles(query: string): IndexedFile[] {
    return query === "login" && this.lastIndexedAt ? [authFile] : [];
  }
}

function fakeFiles(contents: Record<string, string>, listing: string[] = []): ProjectFiles & {
  listFiles: jest.Mock;
} {
  return {
    readText: jest.fn(async (relativePath: string) => {
      const content = contents[relativePath];
      if (content === undefined) {
        throw new Error(`ENOENT: ${relativePath}`);
      }
      return content;
    }),
    listFiles: jest.fn(async () => listing)
  };
}

function fakeSearch(results: SearchResult[] | Error): WebSearcher & { search: jest.Mock } {
  return {
    search: jest.fn(async () => {
      if (results instanceof Error) {
        throw results;
      }
      return results;
    })
  };
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("buildMentionContext", () => {
  test("uses only in-memory data and defers network mentions", () => {
    const context = buildMentionContext(
      [
        createMention("file", "src/a.ts"),
        createMention("selection"),
        createMention("terminal"),
        createMention("web", "react hooks"),
        createMention("docs", "x")
      ],
      {
        cachedFiles: new Map([["src/a.ts", "const a = 1;"]]),
        selectedText: "sel",
        terminalOutput: "out"
      }
    );

    expect(context).toBe(
      "\n\n--- File: src/a.ts ---\nconst a = 1;" +
        "\n\n--- Selected Code ---\nsel" +
        "\n\n--- Terminal Output ---\nout" +
        "\n\n[Web search for: react hooks]" +
        "\n\n[Documentation for: x]"
    );
  });

  test("omits missing files and empty selections", () => {
    const context = buildMentionContext([createMention("file", "missing.ts"), createMention("selection")], {
      cachedFiles: new Map(),
      selectedText: ""
    });

    expect(context).toBe("");
  });

  test("includes provided terminal output even when empty", () => {
    expect(buildMentionContext([createMention("terminal")], { terminalOutput: "" })).toBe(
      "\n\n--- Terminal Output ---\n"
    );
  });

  test("renders cached files under a folder and skips hidden paths", () => {
    const context = buildMentionContext([createMention("folder", "src")], {
      cachedFiles: new Map([
        ["src/a.ts", "A"],
        ["src/.hidden/x.ts", "H"],
        ["lib/b.ts", "B"]
      ])
    });

    expect(context).toBe("\n\n--- Folder: src ---\n\n--- a.ts ---\nA");
  });

  test("reads an already built index but never builds one", () => {
    const unbuilt = new FakeIndex(false);

    expect(buildMentionContext([createMention("codebase", "login")], { index: unbuilt })).toBe("");
    expect(unbuilt.indexProject).not.toHaveBeenCalled();
    expect(buildMentionContext([createMention("codebase", "login")], { index: new FakeIndex(true) })).toBe(
      CODEBASE_SECTION
    );
  });

  test("delegates notepads by name or to the active notepad", () => {
    const notepads = { buildContext: jest.fn((name?: string) => `notes for ${name ?? "active"}`) };

    expect(buildMentionContext([createMention("notepad", "ideas")], { notepads })).toBe(
      "\n\n--- Notepad: ideas ---\nnotes for ideas"
    );
    expect(buildMentionContext([createMention("notepad")], { notepads })).toBe(
      "\n\n--- Notepad ---\nnotes for active"
    );
    expect(notepads.buildContext).toHaveBeenLastCalledWith(undefined);
  });
});

describe("buildMentionContextAsync", () => {
  test("keeps mention order regardless of latency", async () => {
    const files: ProjectFiles = {
      readText: async () => {
        await delay(20);
        return "slow content";
      },
      listFiles: async () => []
    };
    const search = fakeSearch([{ title: "T", url: "https://example.test", snippet: "S" }]);

    const context = await buildMentionContextAsync([createMention("file", "a.ts"), createMention("web", "q")], {
      files,
      search
    });

    expect(context).toBe(
      "\n\n--- File: a.ts ---\nslow content" + "\n\n--- Web Search: q ---\n" + "\n1. T\nhttps://example.test\nS\n"
    );
  });

  test("skips unreadable files and carries on", async () => {
    const context = await buildMentionContextAsync([createMention("file", "gone.ts"), createMention("selection")], {
      files: fakeFiles({}),
      selectedText: "let y = 2"
    });

    expect(context).toBe("\n\n--- Selected Code ---\nlet y = 2");
  });

  test("walks a folder with the scan limit and truncates entries", async () => {
    const files = fakeFiles({ "src/a.ts": "x".repeat(1500), "src/b.ts": "B" }, ["src/a.ts", "src/b.ts"]);

    const context = await buildMentionContextAsync([createMention("folder", "src")], { files });

    expect(files.listFiles).toHaveBeenCalledWith("src", { limit: 20 });
    expect(context).toBe(`\n\n--- Folder: src ---\n\n--- a.ts ---\n${"x".repeat(1000)}\n--- b.ts ---\nB`);
  });

  test("builds the codebase index before the first query", async () => {
    const index = new FakeIndex(false);

    const context = await buildMentionContextAsync([createMention("codebase", "login")], { index });

    expect(index.indexProject).toHaveBeenCalledTimes(1);
    expect(context).toBe(CODEBASE_SECTION);
  });

  test("states explicitly when a web search has no results", async () => {
    const context = await buildMentionContextAsync([createMention("web", "q")], { search: fakeSearch([]) });

    expect(context).toBe('\n\n--- Web Search: q ---\nNo results found for "q".');
  });

  test("caps web results at five", async () => {
    const results = Array.from({ length: 7 }, (_, index) => ({
      title: `T${index + 1}`,
      url: `https://example.test/${index + 1}`,
      snippet: `S${index + 1}`
    }));

    const context = await buildMentionContextAsync([createMention("web", "q")], { search: fakeSearch(results) });

    expect(context).toContain("\n5. T5\n");
    expect(context).not.toContain("6. T6");
  });

  test("reports web search failures inline", async () => {
    const context = await buildMentionContextAsync(
      [createMention("web", "q"), createMention("terminal")],
      { search: fakeSearch(new Error("offline")), terminalOutput: "done" }
    );

    expect(context).toBe('\n\n[Web search failed for "q": offline]' + "\n\n--- Terminal Output ---\ndone");
  });

  test("fetches and strips documentation URLs", async () => {
    const documents: DocumentFetcher = {
      fetchText: async () => "<html><body><h1>Hi</h1><script>x()</script><p>A &amp; B</p></body></html>"
    };

    const context = await buildMentionContextAsync([createMention("docs", "https://docs.example.test/x")], {
      documents
    });

    expect(context).toBe("\n\n--- Documentation: https://docs.example.test/x ---\nHi A & B");
  });

  test("falls back from main to master for repository READMEs", async () => {
    const fetchText = jest.fn(async (url: string) => {
      if (url.includes("/main/")) {
        throw new Error("404");
      }
      return "# Widgets";
    });

    const context = await buildMentionContextAsync([createMention("docs", "acme/widgets")], {
      documents: { fetchText }
    });

    expect(fetchText.mock.calls.map(([url]) => url)).toEqual([
      "https://raw.githubusercontent.com/acme/widgets/main/README.md",
      "https://raw.githubusercontent.com/acme/widgets/master/README.md"
    ]);
    expect(context).toBe("\n\n--- Documentation: acme/widgets (README) ---\n# Widgets");
  });

  test("reports README failures inline", async () => {
    const documents: DocumentFetcher = {
      fetchText: async () => {
        throw new Error("Request failed: 404");
      }
    };

    const context = await buildMentionContextAsync([createMention("docs", "acme/widgets")], { documents });

    expect(context).toBe('\n\n[Failed to fetch documentation for "acme/widgets": Request failed: 404]');
  });

  test("searches for documentation of anything else", async () => {
    const search = fakeSearch([{ title: "Zod", url: "https://zod.example.test", snippet: "Schema validation" }]);

    const context = await buildMentionContextAsync([createMention("docs", "zod")], { search });

    expect(search.search).toHaveBeenCalledWith("zod documentation", undefined);
    expect(context).toBe("\n\n--- Documentation: zod ---\nZod\nhttps://zod.example.test\nSchema validation");
  });

  test("stops before the next mention once aborted", async () => {
    const controller = new AbortController();
    const files: ProjectFiles = {
      readText: async (relativePath: string) => {
        controller.abort();
        return `content of ${relativePath}`;
      },
      listFiles: async () => []
    };

    const context = await buildMentionContextAsync(
      [createMention("file", "a.ts"), createMention("file", "b.ts")],
      { files },
      controller.signal
    );

    expect(context).toBe("\n\n--- File: a.ts ---\ncontent of a.ts");
  });
});
