import Anthropic from "@anthropic-ai/sdk";
import { GoogleGenerativeAI } from "@google/generative-ai";
import { z } from "zod";
import type { ProviderSettings } from "../config.js";
import { createLogger } from "../logger.js";
import type { FetchLike } from "./webSearchService.js";
import { SessionMode } from "../types.js";

const log = createLogger("AI");

export type Provider = "anthropic" | "gemini" | "openrouter";

export const PROVIDERS: readonly Provider[] = ["anthropic", "gemini", "openrouter"];

export class ProviderRequestError extends Error {
  constructor(
    readonly provider: Provider,
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "ProviderRequestError";
  }
}

export type CompletionRequest = {
  provider: Provider;
  model?: string;
  apiKey?: string;
  systemPrompt: string;
  prompt: string;
  signal?: AbortSignal;
};

export type CompletionStreamer = (request: CompletionRequest) => AsyncIterable<string>;

type ListedModel = {
  id: string;
  label?: string;
};

export function resolveDefaultModel(provider: Provider, settings: ProviderSettings): string {
  return settings.defaultModels[provider];
}

export function resolveApiKey(provider: Provider, settings: ProviderSettings, providedApiKey?: string): string {
  const fromRequest = providedApiKey?.trim();
  if (fromRequest) {
    return fromRequest;
  }

  const fromEnv = settings.apiKeys[provider];
  if (fromEnv) {
    return fromEnv;
  }

  throw new Error(`Missing API key for provider "${provider}".`);
}

export function buildSystemPrompt(mode: SessionMode): string {
  if (mode === "chat") {
    return [
      "You are a coding assistant embedded in an editor.",
      "Answer concisely. Put code in fenced blocks tagged with their language.",
      "Use bash blocks for commands the user should run in a terminal."
    ].join("\n");
  }

  return [
    "You are a code generation engine embedded in an editor.",
    "Output only file contents. For every file you create or change:",
    "1. Write the relative file path on its own line wrapped in backticks, for example `src/app.ts`.",
    "2. On the next line open a fenced code block tagged with the language.",
    "3. Write the complete new file content, then close the fence.",
    "Do not write plans, reasoning, summaries or explanations.",
    "Do not describe what you are going to do."
  ].join("\n");
}

async function* streamAnthropic(request: CompletionRequest, model: string, apiKey: string): AsyncGenerator<string> {
  const client = new Anthropic({ apiKey });
  const stream = await client.messages.create(
    {
      model,
      max_tokens: 8192,
      temperature: 0.2,
      system: request.systemPrompt,
      stream: true,
      messages: [
        {
          role: "user",
          content: request.prompt
        }
      ]
    },
    { signal: request.signal }
  );

  for await (const event of stream) {
    if (event.type === "content_block_delta" && event.delta.type === "text_delta") {
      yield event.delta.text;
    }
  }
}

async function* streamGemini(request: CompletionRequest, model: string, apiKey: string): AsyncGenerator<string> {
  const client = new GoogleGenerativeAI(apiKey);
  const modelApi = client.getGenerativeModel({ model, systemInstruction: request.systemPrompt });
  const result = await modelApi.generateContentStream(request.prompt, { signal: request.signal });

  for await (const chunk of result.stream) {
    const text = chunk.text();
    if (text) {
      yield text;
    }
  }
}

const openRouterChunkSchema = z.object({
  choices: z
    .array(
      z.object({
        delta: z.object({ content: z.string().nullish() }).optional()
      })
    )
    .optional()
});

/**
 * Reads `data:` payloads from a server-sent event stream, yielding the text
 * delta of each chat-completion chunk until `[DONE]`.
 */
export async function* readServerSentText(body: ReadableStream<Uint8Array>): AsyncGenerator<string> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let pending = "";

  try {
    while (true) {
      const { done, value } = await reader.read();
      pending += done ? decoder.decode() : decoder.decode(value, { stream: true });

      const lines = pending.split("\n");
      pending = done ? "" : lines.pop() || "";

      for (const rawLine of lines) {
        const line = rawLine.trim();
        if (!line.startsWith("data:")) {
          continue;
        }
        const payload = line.slice("data:".length).trim();
        if (payload === "[DONE]") {
          return;
        }

        let parsed: unknown;
        try {
          parsed = JSON.parse(payload);
        } catch {
          log.debug("Ignoring non-JSON stream payload", payload);
          continue;
        }
        const chunk = openRouterChunkSchema.safeParse(parsed);
        const text = chunk.success ? chunk.data.choices?.[0]?.delta?.content : undefined;
        if (text) {
          yield text;
        }
      }

      if (done) {
        return;
      }
    }
  } finally {
    reader.releaseLock();
  }
}

async function* streamOpenRouter(request: CompletionRequest, model: string, apiKey: string): AsyncGenerator<string> {
  const response = await fetch("https://openrouter.ai/api/v1/chat/completions", {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
      Authorization: `Bearer ${apiKey}`
    },
    body: JSON.stringify({
      model,
      temperature: 0.2,
      stream: true,
      messages: [
        { role: "system", content: request.systemPrompt },
        { role: "user", content: request.prompt }
      ]
    }),
    signal: request.signal
  });

  if (!response.ok || !response.body) {
    const body = await response.text();
    throw new ProviderRequestError("openrouter", response.status, `OpenRouter request failed: ${response.status} ${body}`);
  }

  yield* readServerSentText(response.body);
}

export function createCompletionStreamer(settings: ProviderSettings): CompletionStreamer {
  return async function* streamCompletion(request: CompletionRequest): AsyncGenerator<string> {
    const provider = request.provider;
    const model = request.model || resolveDefaultModel(provider, settings);
    const apiKey = resolveApiKey(provider, settings, request.apiKey);
    log.debug(`Streaming completion from ${provider} (${model})`);

    if (provider === "anthropic") {
      yield* streamAnthropic(request, model, apiKey);
    } else if (provider === "gemini") {
      yield* streamGemini(request, model, apiKey);
    } else {
      yield* streamOpenRouter(request, model, apiKey);
    }
  };
}

type ModelCatalog = {
  label: string;
  request: (apiKey: string) => { url: string; headers?: Record<string, string> };
  read: (body: unknown) => ListedModel[];
};

const GENERATION_METHODS = new Set(["generateContent", "streamGenerateContent"]);

const MODEL_CATALOGS: Record<Provider, ModelCatalog> = {
  anthropic: {
    label: "Anthropic",
    request: (apiKey) => ({
      url: "https://api.anthropic.com/v1/models",
      headers: { "x-api-key": apiKey, "anthropic-version": "2023-06-01" }
    }),
    read: (body) =>
      z
        .object({ data: z.array(z.object({ id: z.string().default(""), display_name: z.string().optional() })).default([]) })
        .parse(body)
        .data.map((model) => ({ id: model.id, label: model.display_name }))
  },
  gemini: {
    label: "Gemini",
    request: (apiKey) => ({
      url: `https://generativelanguage.googleapis.com/v1beta/models?key=${encodeURIComponent(apiKey)}`
    }),
    // Only models that can generate text; ids drop the "models/" prefix.
    read: (body) =>
      z
        .object({
          models: z
            .array(
              z.object({
                name: z.string().default(""),
                displayName: z.string().optional(),
                supportedGenerationMethods: z.array(z.string()).default([])
              })
            )
            .default([])
        })
        .parse(body)
        .models.filter((model) => model.supportedGenerationMethods.some((method) => GENERATION_METHODS.has(method)))
        .map((model) => ({ id: model.name.replace(/^models\//, ""), label: model.displayName }))
  },
  openrouter: {
    label: "OpenRouter",
    request: (apiKey) => ({
      url: "https://openrouter.ai/api/v1/models",
      headers: { Authorization: `Bearer ${apiKey}` }
    }),
    read: (body) =>
      z
        .object({ data: z.array(z.object({ id: z.string().default(""), name: z.string().optional() })).default([]) })
        .parse(body)
        .data.map((model) => ({ id: model.id, label: model.name }))
  }
};

export type ModelListing = {
  provider: Provider;
  models: ListedModel[];
  defaultModel: string;
};

/** Lists a provider's models sorted by id, without duplicates or blank ids. */
export async function listProviderModels(
  args: { provider: Provider; apiKey?: string },
  settings: ProviderSettings,
  fetchImpl: FetchLike = (input, init) => fetch(input, init)
): Promise<ModelListing> {
  const { provider } = args;
  const catalog = MODEL_CATALOGS[provider];
  const { url, headers } = catalog.request(resolveApiKey(provider, settings, args.apiKey));

  const response = await fetchImpl(url, { headers });
  if (!response.ok) {
    const body = await response.text();
    throw new ProviderRequestError(
      provider,
      response.status,
      `${catalog.label} models request failed: ${response.status} ${body}`
    );
  }

  const byId = new Map<string, ListedModel>();
  for (const model of catalog.read(await response.json())) {
    if (model.id && !byId.has(model.id)) {
      byId.set(model.id, model);
    }
  }

  return {
    provider,
    models: [...byId.values()].sort((left, right) => left.id.localeCompare(right.id)),
    defaultModel: resolveDefaultModel(provider, settings)
  };
}
