import "dotenv/config";
import path from "node:path";
import { z } from "zod";
import type { LogLevel } from "./logger.js";
import type { Provider } from "./services/aiService.js";

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value?.trim() ? value.trim() : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  PROJECT_ROOT: optionalText,
  DATA_DIR: optionalText,
  LOG_LEVEL: z.enum(["error", "warn", "info", "debug"]).default("info"),
  ANTHROPIC_API_KEY: optionalText,
  GEMINI_API_KEY: optionalText,
  OPENROUTER_API_KEY: optionalText,
  CLAUDE_MODEL: optionalText,
  GEMINI_MODEL: optionalText,
  OPENROUTER_MODEL: optionalText,
  SANITIZER_POLICY_FILE: optionalText
});

export type ProviderSettings = {
  apiKeys: Record<Provider, string | undefined>;
  defaultModels: Record<Provider, string>;
};

export type AppConfig = {
  port: number;
  projectRoot: string;
  dataDir: string;
  logLevel: LogLevel;
  sanitizerPolicyFile?: string;
  providers: ProviderSettings;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    projectRoot: path.resolve(values.PROJECT_ROOT || process.cwd()),
    dataDir: path.resolve(values.DATA_DIR || path.join(process.cwd(), "data")),
    logLevel: values.LOG_LEVEL,
    sanitizerPolicyFile: values.SANITIZER_POLICY_FILE,
    providers: {
      apiKeys: {
        anthropic: values.ANTHROPIC_API_KEY,
        gemini: values.GEMINI_API_KEY,
        openrouter: values.OPENROUTER_API_KEY
      },
      defaultModels: {
        anthropic: values.CLAUDE_MODEL || "claude-3-5-sonnet-latest",
        gemini: values.GEMINI_MODEL || "gemini-1.5-pro",
        openrouter: values.OPENROUTER_MODEL || "openai/gpt-4o"
      }
    }
  };
}
