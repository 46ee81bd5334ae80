import { FailureCategory, GenerationFailure } from "../types.js";

export const FAILURE_MESSAGES: Record<FailureCategory, { message: string; retryable: boolean }> = {
  rate_limited: { message: "Rate limited by the AI provider. Wait a moment, then retry.", retryable: true },
  service_unavailable: { message: "The AI service is unavailable. Please retry shortly.", retryable: true },
  auth_failed: { message: "The AI provider rejected the credentials. Check the API key.", retryable: false },
  network_failure: { message: "Could not reach the AI provider. Check the connection and retry.", retryable: true },
  empty_response: { message: "AI service returned an empty response. Please retry.", retryable: true },
  malformed_output: { message: "The model mixed explanations into code output. Please retry.", retryable: true },
  no_op: { message: "The response did not contain any file changes.", retryable: true },
  unknown: { message: "Generation failed.", retryable: true }
};

const NETWORK_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "ETIMEDOUT",
  "EAI_AGAIN",
  "EPIPE",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_SOCKET"
]);

export type EditOutputVerdict = "valid" | "empty" | "no_op" | "invalid_format";

export function createFailure(category: FailureCategory, detail?: string): GenerationFailure {
  const entry = FAILURE_MESSAGES[category];
  return detail === undefined
    ? { category, message: entry.message, retryable: entry.retryable }
    : { category, message: entry.message, retryable: entry.retryable, detail };
}

function readStatus(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
}

function readCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null) {
    return undefined;
  }
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  if ("cause" in error) {
    return readCode(error.cause);
  }
  return undefined;
}

function isNetworkError(error: unknown): boolean {
  const code = readCode(error);
  if (code && NETWORK_ERROR_CODES.has(code)) {
    return true;
  }
  return error instanceof TypeError && error.message === "fetch failed";
}

/** Maps a provider or transport error to the category shown to the user. */
export function classifyGenerationError(error: unknown): GenerationFailure {
  const detail = error instanceof Error ? error.message : String(error);
  const status = readStatus(error);

  if (status === 429 || status === 402) {
    return createFailure("rate_limited", detail);
  }
  if (status !== undefined && status >= 500) {
    return createFailure("service_unavailable", detail);
  }
  if (status === 401 || status === 403 || detail.startsWith("Missing API key")) {
    return createFailure("auth_failed", detail);
  }
  if (isNetworkError(error)) {
    return createFailure("network_failure", detail);
  }
  return createFailure("unknown", detail);
}

/**
 * Checks a finished edit-mode response: it must be non-empty, announce at
 * least one file, and every announced file must have content.
 */
export function validateEditOutput(response: string, fileContents: string[]): EditOutputVerdict {
  if (!response.trim()) {
    return "empty";
  }
  if (fileContents.length === 0) {
    return "no_op";
  }
  if (fileContents.some((content) => !content.trim())) {
    return "invalid_format";
  }
  return "valid";
}

export function failureForVerdict(verdict: EditOutputVerdict): GenerationFailure | null {
  switch (verdict) {
    case "valid":
      return null;
    case "empty":
      return createFailure("empty_response");
    case "no_op":
      return createFailure("no_op");
    case "invalid_format":
      return createFailure("malformed_output", "A generated file has no content.");
  }
}
