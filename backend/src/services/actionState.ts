import { v4 as uuidv4 } from "uuid";
import { AIAction } from "../types.js";

export type ActionEvent =
  | { type: "start" }
  | { type: "complete"; result: string }
  | { type: "fail"; error: string };

export function createAction(name: string, filePath: string, fileContent: string): AIAction {
  return {
    id: uuidv4(),
    name,
    status: "pending",
    filePath,
    fileContent,
    result: null,
    error: null
  };
}

/**
 * pending -> executing -> completed | failed, and pending -> failed.
 * Any other event leaves the action as it was.
 */
export function reduceAction(action: AIAction, event: ActionEvent): AIAction {
  switch (event.type) {
    case "start":
      return action.status === "pending" ? { ...action, status: "executing" } : action;
    case "complete":
      return action.status === "executing"
        ? { ...action, status: "completed", result: event.result, error: null }
        : action;
    case "fail":
      return action.status === "pending" || action.status === "executing"
        ? { ...action, status: "failed", error: event.error }
        : action;
  }
}

export function isTerminalStatus(action: AIAction): boolean {
  return action.status === "completed" || action.status === "failed";
}
