/**
 * Reads process configuration for the host and the tool server. Entry points
 * load `.env` through dotenv before calling these; the loaders themselves only
 * look at the environment object they are given.
 */
import { z } from "zod";

import {
  ALPHA_VANTAGE_API_KEY_ENV,
  ANTHROPIC_API_KEY_ENV,
  ANTHROPIC_BASE_URL,
  DEFAULT_SERVER_HOST,
  DEFAULT_SERVER_PORT,
  DEFAULT_SERVER_URL,
  MAX_CONNECT_RETRIES,
  MAX_TOKENS,
  MAX_TOOL_ROUNDS,
  MODEL_NAME,
  RETRY_BASE_DELAY_MS,
} from "./constants.js";

export interface ConfigurationErrorOptions extends ErrorOptions {
  /** Required variables that were absent or blank. */
  readonly missing?: readonly string[];
}

export class ConfigurationError extends Error {
  readonly missing: readonly string[];

  constructor(message: string, options: ConfigurationErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "ConfigurationError";
    this.missing = options.missing ?? [];
  }
}

export interface HostConfig {
  readonly anthropicApiKey: string;
  readonly anthropicBaseUrl: string;
  readonly model: string;
  readonly maxTokens: number;
  readonly serverUrl: string;
  readonly maxRetries: number;
  readonly retryBaseDelayMs: number;
  readonly maxToolRounds: number;
}

export interface ServerConfig {
  readonly alphaVantageApiKey: string | undefined;
  readonly host: string;
  readonly port: number;
}

type Env = Record<string, string | undefined>;

// Blank values in .env files count as unset.
function blankToUndefined(value: unknown): unknown {
  return typeof value === "string" && value.trim() === "" ? undefined : value;
}

const hostEnvSchema = z.object({
  [ANTHROPIC_API_KEY_ENV]: z.preprocess(
    blankToUndefined,
    z.string({
      required_error: `${ANTHROPIC_API_KEY_ENV} not found in environment variables`,
    }),
  ),
  ANTHROPIC_BASE_URL: z.preprocess(
    blankToUndefined,
    z.string().url().default(ANTHROPIC_BASE_URL),
  ),
  ANTHROPIC_MODEL: z.preprocess(
    blankToUndefined,
    z.string().default(MODEL_NAME),
  ),
  ANTHROPIC_MAX_TOKENS: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().default(MAX_TOKENS),
  ),
  MCP_SERVER_URL: z.preprocess(
    blankToUndefined,
    z.string().url().default(DEFAULT_SERVER_URL),
  ),
  MCP_MAX_RETRIES: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().default(MAX_CONNECT_RETRIES),
  ),
  MCP_RETRY_BASE_DELAY_MS: z.preprocess(
    blankToUndefined,
    z.coerce.number().nonnegative().default(RETRY_BASE_DELAY_MS),
  ),
  MAX_TOOL_ROUNDS: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().default(MAX_TOOL_ROUNDS),
  ),
});

const serverEnvSchema = z.object({
  [ALPHA_VANTAGE_API_KEY_ENV]: z.preprocess(
    blankToUndefined,
    z.string().optional(),
  ),
  MCP_SERVER_HOST: z.preprocess(
    blankToUndefined,
    z.string().default(DEFAULT_SERVER_HOST),
  ),
  MCP_SERVER_PORT: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(0).max(65_535).default(DEFAULT_SERVER_PORT),
  ),
});

function isMissing(issue: z.ZodIssue): boolean {
  return issue.code === "invalid_type" && issue.received === "undefined";
}

function toConfigurationError(error: z.ZodError): ConfigurationError {
  const message = error.issues
    .map((issue) =>
      isMissing(issue)
        ? issue.message
        : `${issue.path.join(".")}: ${issue.message}`,
    )
    .join("; ");
  const missing = error.issues
    .filter(isMissing)
    .map((issue) => issue.path.join("."));
  return new ConfigurationError(message, { cause: error, missing });
}

export function loadHostConfig(env: Env = process.env): HostConfig {
  const parsed = hostEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw toConfigurationError(parsed.error);
  }
  const values = parsed.data;
  return {
    anthropicApiKey: values[ANTHROPIC_API_KEY_ENV],
    anthropicBaseUrl: values.ANTHROPIC_BASE_URL,
    model: values.ANTHROPIC_MODEL,
    maxTokens: values.ANTHROPIC_MAX_TOKENS,
    serverUrl: values.MCP_SERVER_URL,
    maxRetries: values.MCP_MAX_RETRIES,
    retryBaseDelayMs: values.MCP_RETRY_BASE_DELAY_MS,
    maxToolRounds: values.MAX_TOOL_ROUNDS,
  };
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
  const parsed = serverEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw toConfigurationError(parsed.error);
  }
  const values = parsed.data;
  return {
    alphaVantageApiKey: values[ALPHA_VANTAGE_API_KEY_ENV],
    host: values.MCP_SERVER_HOST,
    port: values.MCP_SERVER_PORT,
  };
}
