/**
 * The three market-data operations the tool server exposes. Each one performs
 * a single Alpha Vantage call and returns operator-ready text; upstream
 * problems come back as `Error: ...` strings rather than exceptions.
 */
import { z } from "zod";

import type { AlphaVantageClient } from "./alphaVantage.js";

export const stockSymbolInputSchema = z.object({
  symbol: z.string().describe("Stock ticker symbol, e.g. AAPL"),
});

export const searchStocksInputSchema = z.object({
  query: z.string().describe("Company name or partial ticker to search for"),
});

export const cryptoSymbolInputSchema = z.object({
  symbol: z.string().describe("Cryptocurrency symbol, e.g. BTC"),
});

export type StockQuoteInput = z.infer<typeof stockSymbolInputSchema>;
export type SearchStocksInput = z.infer<typeof searchStocksInputSchema>;
export type CryptoPriceInput = z.infer<typeof cryptoSymbolInputSchema>;

const SEARCH_RESULT_LIMIT = 5;

const fieldsSchema = z.record(z.unknown());
const matchesSchema = z.array(fieldsSchema);

function field(fields: Record<string, unknown>, key: string): string {
  const value = fields[key];
  return typeof value === "string" || typeof value === "number"
    ? String(value)
    : "N/A";
}

function readFields(value: unknown): Record<string, unknown> | null {
  const parsed = fieldsSchema.safeParse(value);
  if (!parsed.success || Object.keys(parsed.data).length === 0) {
    return null;
  }
  return parsed.data;
}

export async function getStockQuote(
  client: AlphaVantageClient,
  input: StockQuoteInput,
): Promise<string> {
  const symbol = input.symbol.trim().toUpperCase();
  const response = await client.query("GLOBAL_QUOTE", { symbol });

  if (!response.ok) {
    return response.reason === "rejected"
      ? `Error: Invalid symbol '${symbol}' or API limit reached`
      : `Error: ${response.message}`;
  }

  const quote = readFields(response.data["Global Quote"]);
  if (!quote) {
    return `No data found for symbol: ${symbol}`;
  }

  return [
    `Stock Quote for ${symbol}:`,
    `• Current Price: $${field(quote, "05. price")}`,
    `• Change: ${field(quote, "09. change")} ` +
      `(${field(quote, "10. change percent")})`,
    `• Volume: ${field(quote, "06. volume")}`,
    `• Last Updated: ${field(quote, "07. latest trading day")}`,
  ].join("\n");
}

export async function searchStocks(
  client: AlphaVantageClient,
  input: SearchStocksInput,
): Promise<string> {
  const query = input.query.trim();
  const response = await client.query("SYMBOL_SEARCH", { keywords: query });

  if (!response.ok) {
    return `Error: ${response.message}`;
  }

  const matches = matchesSchema.safeParse(response.data["bestMatches"]);
  if (!matches.success || matches.data.length === 0) {
    return `No stocks found matching: ${query}`;
  }

  const lines = matches.data
    .slice(0, SEARCH_RESULT_LIMIT)
    .map(
      (match, index) =>
        `${index + 1}. ${field(match, "1. symbol")} - ${field(match, "2. name")}`,
    );
  return [`Search results for '${query}':`, "", ...lines].join("\n");
}

export async function getCryptoPrice(
  client: AlphaVantageClient,
  input: CryptoPriceInput,
): Promise<string> {
  const symbol = input.symbol.trim().toUpperCase();
  const response = await client.query("CURRENCY_EXCHANGE_RATE", {
    from_currency: symbol,
    to_currency: "USD",
  });

  if (!response.ok) {
    return response.reason === "rejected"
      ? `Error: Invalid crypto symbol '${symbol}' or API limit reached`
      : `Error: ${response.message}`;
  }

  const rate = readFields(response.data["Realtime Currency Exchange Rate"]);
  if (!rate) {
    return `No data found for crypto: ${symbol}`;
  }

  return [
    `Crypto Price for ${field(rate, "1. From_Currency Code")}:`,
    `• Current Price: $${field(rate, "5. Exchange Rate")} USD`,
    `• Last Updated: ${field(rate, "6. Last Refreshed")}`,
  ].join("\n");
}

export const financeToolNames = [
  "get_stock_quote",
  "search_stocks",
  "get_crypto_price",
] as const;

export type FinanceToolName = (typeof financeToolNames)[number];
