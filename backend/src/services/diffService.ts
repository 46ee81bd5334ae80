import { diffArrays } from "diff";
import { UnifiedDiffLine } from "../types.js";
import { pluralizeLines } from "./textLines.js";

export type DiffStrategy = "greedy" | "lcs";

export type ChangeSummary = {
  addedLines: number;
  removedLines: number;
  summary: string;
};

function addedLine(content: string, newLineNumber: number): UnifiedDiffLine {
  return { content, type: "added", originalLineNumber: null, newLineNumber };
}

function removedLine(content: string, originalLineNumber: number): UnifiedDiffLine {
  return { content, type: "removed", originalLineNumber, newLineNumber: null };
}

function greedyDiff(original: string[], updated: string[]): UnifiedDiffLine[] {
  const lines: UnifiedDiffLine[] = [];
  let oldIndex = 0;
  let newIndex = 0;

  while (oldIndex < original.length || newIndex < updated.length) {
    if (oldIndex < original.length && newIndex < updated.length) {
      const oldLine = original[oldIndex];
      const newLine = updated[newIndex];

      if (oldLine === newLine) {
        lines.push({
          content: newLine,
          type: "unchanged",
          originalLineNumber: oldIndex + 1,
          newLineNumber: newIndex + 1
        });
        oldIndex += 1;
        newIndex += 1;
      } else if (oldIndex + 1 < original.length && original[oldIndex + 1] === newLine) {
        lines.push(removedLine(oldLine, oldIndex + 1));
        oldIndex += 1;
      } else if (newIndex + 1 < updated.length && updated[newIndex + 1] === oldLine) {
        lines.push(addedLine(newLine, newIndex + 1));
        newIndex += 1;
      } else {
        lines.push(removedLine(oldLine, oldIndex + 1));
        lines.push(addedLine(newLine, newIndex + 1));
        oldIndex += 1;
        newIndex += 1;
      }
    } else if (oldIndex < original.length) {
      lines.push(removedLine(original[oldIndex], oldIndex + 1));
      oldIndex += 1;
    } else {
      lines.push(addedLine(updated[newIndex], newIndex + 1));
      newIndex += 1;
    }
  }

  return lines;
}

function lcsDiff(original: string[], updated: string[]): UnifiedDiffLine[] {
  const lines: UnifiedDiffLine[] = [];
  let oldNumber = 0;
  let newNumber = 0;

  for (const part of diffArrays(original, updated)) {
    for (const value of part.value) {
      if (part.added) {
        newNumber += 1;
        lines.push(addedLine(value, newNumber));
      } else if (part.removed) {
        oldNumber += 1;
        lines.push(removedLine(value, oldNumber));
      } else {
        oldNumber += 1;
        newNumber += 1;
        lines.push({
          content: value,
          type: "unchanged",
          originalLineNumber: oldNumber,
          newLineNumber: newNumber
        });
      }
    }
  }

  return lines;
}

/**
 * Merged line view of an on-disk file and newly generated content.
 *
 * The default `greedy` strategy walks both sides with a single line of
 * lookahead; it can produce non-minimal output for moved blocks. `lcs` gives a
 * minimal diff at higher cost. A `null` original means the file is new.
 */
export function computeUnifiedDiff(
  original: string[] | null,
  updated: string[],
  options: { strategy?: DiffStrategy } = {}
): UnifiedDiffLine[] {
  if (original === null) {
    return updated.map((line, index) => addedLine(line, index + 1));
  }
  return options.strategy === "lcs" ? lcsDiff(original, updated) : greedyDiff(original, updated);
}

export function summarizeChanges(lines: UnifiedDiffLine[], isNewFile: boolean): ChangeSummary {
  const addedLines = lines.filter((line) => line.type === "added").length;
  const removedLines = lines.filter((line) => line.type === "removed").length;

  if (isNewFile) {
    return { addedLines, removedLines, summary: `New file: ${pluralizeLines(addedLines)}` };
  }
  if (addedLines > 0 && removedLines > 0) {
    return { addedLines, removedLines, summary: `Modified: +${addedLines} -${removedLines} lines` };
  }
  if (addedLines > 0) {
    return { addedLines, removedLines, summary: `Added ${pluralizeLines(addedLines)}` };
  }
  if (removedLines > 0) {
    return { addedLines, removedLines, summary: `Removed ${pluralizeLines(removedLines)}` };
  }
  return { addedLines, removedLines, summary: "No changes" };
}
