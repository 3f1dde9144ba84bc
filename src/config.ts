import { z } from "zod";
import { ConfigError } from "./errors.js";

/**
 * Environment configuration, validated once at startup.
 * Reads from the given env record (process.env by default) and fails with
 * every invalid variable listed.
 */

const optionalString = z
  .string()
  .min(1)
  .optional()
  .or(z.literal("").transform(() => undefined));

const EnvSchema = z.object({
  /** API key for OpenAI or Azure OpenAI; never logged */
  OPENAI_API_KEY: z.string().min(1, "OPENAI_API_KEY is required"),
  /** Custom OpenAI-compatible endpoint */
  OPENAI_BASE_URL: optionalString,
  /** When set, requests go through the Azure OpenAI client */
  AZURE_OPENAI_ENDPOINT: optionalString,
  AZURE_OPENAI_API_VERSION: z.string().min(1).default("2025-01-01-preview"),
  LLM_MODEL: z.string().min(1).default("gpt-4o-mini"),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(4096),
  /** JSON catalog of stored-procedure tools */
  PROCEDURE_CATALOG: z.string().min(1).default("config/procedures.json"),
  /** JSON fixture data served by the demo data source */
  FIXTURE_DATA: z.string().min(1).default("config/demo-data.json"),
  EXPORT_DIR: z.string().min(1).default("exports"),
  EXPORT_BASE_URL: z.string().url("EXPORT_BASE_URL must be a valid URL").default("http://localhost:8000"),
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
});

export type Env = z.infer<typeof EnvSchema>;

export interface AppConfig {
  llm: {
    apiKey: string;
    baseURL?: string;
    azureEndpoint?: string;
    azureApiVersion: string;
    model: string;
    maxTokens: number;
  };
  procedureCatalogPath: string;
  fixtureDataPath: string;
  export: {
    outputDir: string;
    baseUrl: string;
  };
  logLevel: Env["LOG_LEVEL"];
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid environment configuration: ${issues}`);
  }

  const e = parsed.data;
  return {
    llm: {
      apiKey: e.OPENAI_API_KEY,
      baseURL: e.OPENAI_BASE_URL,
      azureEndpoint: e.AZURE_OPENAI_ENDPOINT,
      azureApiVersion: e.AZURE_OPENAI_API_VERSION,
      model: e.LLM_MODEL,
      maxTokens: e.LLM_MAX_TOKENS,
    },
    procedureCatalogPath: e.PROCEDURE_CATALOG,
    fixtureDataPath: e.FIXTURE_DATA,
    export: {
      outputDir: e.EXPORT_DIR,
      baseUrl: e.EXPORT_BASE_URL,
    },
    logLevel: e.LOG_LEVEL,
  };
}
