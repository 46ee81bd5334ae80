import { readFileSync } from "node:fs";
import { z } from "zod";
import bundledPolicy from "../policies/sanitizer-policy.json";
import { isFenceLine } from "./contentBlockParser.js";
import { isBlankLine, splitLines } from "./textLines.js";

const phraseList = z.array(z.string().min(1));

export const sanitizerPolicySchema = z.object({
  headingPrefixes: phraseList,
  reasoningPrefixes: phraseList,
  workflowMarkers: phraseList,
  forbiddenPhrases: phraseList,
  planningHeaders: phraseList.default([]),
  planningMarkers: phraseList.default([])
});

export type SanitizerPolicy = z.infer<typeof sanitizerPolicySchema>;

export const DEFAULT_SANITIZER_POLICY: SanitizerPolicy = sanitizerPolicySchema.parse(bundledPolicy);

export function loadSanitizerPolicy(filePath?: string): SanitizerPolicy {
  if (!filePath) {
    return DEFAULT_SANITIZER_POLICY;
  }

  let raw = "";
  try {
    raw = readFileSync(filePath, "utf8");
  } catch {
    throw new Error(`Failed to read sanitizer policy file "${filePath}".`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new Error("Sanitizer policy file is invalid JSON.");
  }

  const result = sanitizerPolicySchema.safeParse(parsed);
  if (!result.success) {
    throw new Error("Sanitizer policy file does not match the expected shape.");
  }
  return result.data;
}

export function isNarrativeLine(line: string, policy: SanitizerPolicy = DEFAULT_SANITIZER_POLICY): boolean {
  const trimmed = line.trim();
  if (!trimmed) {
    return false;
  }
  if (policy.headingPrefixes.some((prefix) => trimmed.startsWith(prefix))) {
    return true;
  }

  const lowered = trimmed.toLowerCase();
  if (policy.reasoningPrefixes.some((prefix) => lowered.startsWith(prefix))) {
    return true;
  }
  return policy.workflowMarkers.some((marker) => lowered.includes(marker));
}

export function containsForbiddenPhrase(
  line: string,
  policy: SanitizerPolicy = DEFAULT_SANITIZER_POLICY
): boolean {
  const lowered = line.trim().toLowerCase();
  if (!lowered) {
    return false;
  }
  return policy.forbiddenPhrases.some((phrase) => lowered.includes(phrase));
}

/** How much of the start of a response is checked for a planning preamble. */
export const PLANNING_WINDOW = 500;

/**
 * True when the start of a response is a plan rather than code: it opens with
 * a planning header, or a line within the window starts with a planning marker.
 */
export function startsWithPlanning(response: string, policy: SanitizerPolicy = DEFAULT_SANITIZER_POLICY): boolean {
  const head = response.trimStart().slice(0, PLANNING_WINDOW).toLowerCase();
  if (!head) {
    return false;
  }
  if (policy.planningHeaders.some((header) => head.startsWith(header))) {
    return true;
  }
  return splitLines(head).some((line) => {
    const trimmed = line.trim();
    return policy.planningMarkers.some((marker) => trimmed.startsWith(marker));
  });
}

type KeptLine = {
  text: string;
  fenced: boolean;
};

/**
 * Strips narrative lines (headings, reasoning and workflow chatter) from a
 * streamed code buffer. Fence lines and everything between them pass through
 * untouched, and surviving lines keep their order. Blank runs outside fences
 * collapse to one line and blank edges outside fences are dropped.
 */
export function sanitizeContent(content: string, policy: SanitizerPolicy = DEFAULT_SANITIZER_POLICY): string {
  const kept: KeptLine[] = [];
  let inFence = false;
  let previousBlank = false;

  for (const line of splitLines(content)) {
    if (isFenceLine(line)) {
      inFence = !inFence;
      kept.push({ text: line, fenced: true });
      previousBlank = false;
      continue;
    }

    if (inFence) {
      kept.push({ text: line, fenced: true });
      previousBlank = false;
      continue;
    }

    if (isNarrativeLine(line, policy)) {
      continue;
    }

    const blank = isBlankLine(line);
    if (blank && previousBlank) {
      continue;
    }
    kept.push({ text: blank ? "" : line, fenced: false });
    previousBlank = blank;
  }

  let start = 0;
  let end = kept.length;
  while (start < end && !kept[start].fenced && isBlankLine(kept[start].text)) {
    start += 1;
  }
  while (end > start && !kept[end - 1].fenced && isBlankLine(kept[end - 1].text)) {
    end -= 1;
  }

  return kept
    .slice(start, end)
    .map((line) => line.text)
    .join("\n");
}
