export const ANTHROPIC_API_KEY_ENV = "ANTHROPIC_API_KEY";
export const ALPHA_VANTAGE_API_KEY_ENV = "ALPHA_VANTAGE_API_KEY";

export const ANTHROPIC_BASE_URL = "https://api.anthropic.com";
export const ANTHROPIC_VERSION = "2023-06-01";
export const MODEL_NAME = "claude-3-5-sonnet-20241022";
export const MAX_TOKENS = 1000;

export const ALPHA_VANTAGE_BASE_URL = "https://www.alphavantage.co/query";
export const MARKET_DATA_TIMEOUT_MS = 10_000;

export const MCP_SERVER_NAME = "finance-analyzer";
export const MCP_SERVER_VERSION = "0.1.0";
export const MCP_CLIENT_NAME = "finance-analyzer-host";
export const DEFAULT_SERVER_HOST = "localhost";
export const DEFAULT_SERVER_PORT = 8000;
export const SSE_PATH = "/sse";
export const MESSAGES_PATH = "/messages";
export const DEFAULT_SERVER_URL =
  `http://${DEFAULT_SERVER_HOST}:${DEFAULT_SERVER_PORT}${SSE_PATH}`;

export const MAX_CONNECT_RETRIES = 3;
export const RETRY_BASE_DELAY_MS = 1_000;
export const CONNECT_TIMEOUT_MS = 10_000;
export const INITIALIZE_TIMEOUT_MS = 10_000;
export const DISCOVERY_TIMEOUT_MS = 5_000;
export const TOOL_CALL_TIMEOUT_MS = 30_000;
export const COMPLETION_TIMEOUT_MS = 30_000;
export const MAX_TOOL_ROUNDS = 1;
