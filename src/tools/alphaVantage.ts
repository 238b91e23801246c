/**
 * Thin client for the Alpha Vantage query endpoint. Every call resolves to an
 * `{ok|error}` envelope so the tool layer can turn failures into plain text
 * without catching anything.
 */
import { z } from "zod";

import {
  ALPHA_VANTAGE_BASE_URL,
  MARKET_DATA_TIMEOUT_MS,
} from "../config/constants.js";
import { errorMessage } from "../utils/asyncUtils.js";

export type AlphaVantageFunction =
  | "GLOBAL_QUOTE"
  | "SYMBOL_SEARCH"
  | "CURRENCY_EXCHANGE_RATE";

export interface AlphaVantageOkResponse {
  readonly ok: true;
  readonly data: Record<string, unknown>;
}

/**
 * `request`: the call never produced a payload (missing key, network, HTTP).
 * `rejected`: upstream answered with an "Error Message" (bad symbol, etc.).
 * `notice`: upstream answered with a rate-limit or usage notice.
 */
export interface AlphaVantageErrorResponse {
  readonly ok: false;
  readonly reason: "request" | "rejected" | "notice";
  readonly message: string;
}

export type AlphaVantageResponse =
  | AlphaVantageOkResponse
  | AlphaVantageErrorResponse;

export interface AlphaVantageClientOptions {
  readonly apiKey: string | undefined;
  readonly baseUrl?: string;
  readonly timeoutMs?: number;
  readonly fetch?: typeof fetch;
}

const payloadSchema = z.record(z.unknown());

const defaultFetch: typeof fetch = (input, init) => fetch(input, init);

export class AlphaVantageClient {
  private readonly apiKey: string | undefined;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: AlphaVantageClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? ALPHA_VANTAGE_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? MARKET_DATA_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? defaultFetch;
  }

  get configured(): boolean {
    return Boolean(this.apiKey);
  }

  async query(
    fn: AlphaVantageFunction,
    params: Record<string, string>,
  ): Promise<AlphaVantageResponse> {
    if (!this.apiKey) {
      return {
        ok: false,
        reason: "request",
        message: "Alpha Vantage API key not configured",
      };
    }

    const url = new URL(this.baseUrl);
    url.searchParams.set("function", fn);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    url.searchParams.set("apikey", this.apiKey);

    let payload: unknown;
    try {
      const response = await this.fetchImpl(url, {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!response.ok) {
        return {
          ok: false,
          reason: "request",
          message:
            `API request failed: ${response.status} ${response.statusText}`,
        };
      }
      payload = await response.json();
    } catch (error) {
      return {
        ok: false,
        reason: "request",
        message: `API request failed: ${errorMessage(error)}`,
      };
    }

    const parsed = payloadSchema.safeParse(payload);
    if (!parsed.success) {
      return {
        ok: false,
        reason: "request",
        message: "API request failed: unexpected response body",
      };
    }

    const data = parsed.data;
    if (typeof data["Error Message"] === "string") {
      return { ok: false, reason: "rejected", message: data["Error Message"] };
    }
    const notice = data["Note"] ?? data["Information"];
    if (typeof notice === "string") {
      return { ok: false, reason: "notice", message: notice };
    }
    return { ok: true, data };
  }
}
