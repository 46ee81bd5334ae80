import { v4 as uuidv4 } from "uuid";
import { ContentBlock } from "../types.js";
import { splitLines, trimBlankLines } from "./textLines.js";

export const FENCE_MARKER = "```";

const TERMINAL_LANGUAGES = new Set([
  "bash",
  "shell",
  "sh",
  "zsh",
  "terminal",
  "console",
  "cmd",
  "powershell"
]);

export function isFenceLine(line: string): boolean {
  return line.startsWith(FENCE_MARKER);
}

export function isTerminalLanguage(language: string): boolean {
  return TERMINAL_LANGUAGES.has(language.toLowerCase());
}

/**
 * Splits an assistant response into text and code blocks in document order.
 * Stateless: callers re-run it on the whole buffer as a stream grows, and an
 * unterminated fence is emitted as a code block so partial output renders.
 */
export function parseContentBlocks(text: string): ContentBlock[] {
  const blocks: ContentBlock[] = [];
  let textLines: string[] = [];
  let codeLines: string[] = [];
  let language = "";
  let inCodeBlock = false;

  const pushBlock = (lines: string[], isCode: boolean, blockLanguage: string | null): void => {
    const content = trimBlankLines(lines).join("\n");
    if (!content) {
      return;
    }
    blocks.push({
      id: uuidv4(),
      content,
      isCode,
      language: blockLanguage,
      isTerminalCommand: isCode && blockLanguage !== null && isTerminalLanguage(blockLanguage)
    });
  };

  for (const line of splitLines(text)) {
    if (isFenceLine(line)) {
      if (inCodeBlock) {
        pushBlock(codeLines, true, language);
        codeLines = [];
        language = "";
        inCodeBlock = false;
      } else {
        pushBlock(textLines, false, null);
        textLines = [];
        language = line.slice(FENCE_MARKER.length).trim();
        inCodeBlock = true;
      }
      continue;
    }

    if (inCodeBlock) {
      codeLines.push(line);
    } else {
      textLines.push(line);
    }
  }

  if (inCodeBlock) {
    pushBlock(codeLines, true, language);
  }
  pushBlock(textLines, false, null);

  return blocks;
}
