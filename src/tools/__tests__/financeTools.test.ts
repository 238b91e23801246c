import { describe, expect, it, vi, type Mock } from "vitest";

import { AlphaVantageClient } from "../alphaVantage.js";
import {
  getCryptoPrice,
  getStockQuote,
  searchStocks,
} from "../financeTools.js";

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "Content-Type": "application/json" },
    ...init,
  });
}

function clientReturning(body: unknown, init?: ResponseInit) {
  const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse(body, init));
  const client = new AlphaVantageClient({
    apiKey: "test-key",
    fetch: fetchMock,
  });
  return { client, fetchMock };
}

function requestedParams(fetchMock: Mock<typeof fetch>): URLSearchParams {
  const input = fetchMock.mock.calls[0]?.[0];
  return new URL(String(input)).searchParams;
}

describe("finance tools", () => {
  it("reports a missing API key without touching the network", async () => {
    const fetchMock = vi.fn<typeof fetch>();
    const client = new AlphaVantageClient({
      apiKey: undefined,
      fetch: fetchMock,
    });

    const result = await getStockQuote(client, { symbol: "AAPL" });

    expect(result).toBe("Error: Alpha Vantage API key not configured");
    expect(fetchMock).not.toHaveBeenCalled();
    expect(client.configured).toBe(false);
  });

  describe("getStockQuote", () => {
    it("formats the global quote", async () => {
      const { client, fetchMock } = clientReturning({
        "Global Quote": {
          "01. symbol": "AAPL",
          "05. price": "150.0000",
          "06. volume": "51234567",
          "07. latest trading day": "2024-05-01",
          "09. change": "1.5000",
          "10. change percent": "1.0101%",
        },
      });

      const result = await getStockQuote(client, { symbol: " aapl " });

      expect(result).toBe(
        [
          "Stock Quote for AAPL:",
          "• Current Price: $150.0000",
          "• Change: 1.5000 (1.0101%)",
          "• Volume: 51234567",
          "• Last Updated: 2024-05-01",
        ].join("\n"),
      );
      const params = requestedParams(fetchMock);
      expect(params.get("function")).toBe("GLOBAL_QUOTE");
      expect(params.get("symbol")).toBe("AAPL");
      expect(params.get("apikey")).toBe("test-key");
    });

    it("fills missing fields with N/A", async () => {
      const { client } = clientReturning({
        "Global Quote": { "05. price": "10.00" },
      });

      const result = await getStockQuote(client, { symbol: "ABC" });

      expect(result.split("\n")).toEqual([
        "Stock Quote for ABC:",
        "• Current Price: $10.00",
        "• Change: N/A (N/A)",
        "• Volume: N/A",
        "• Last Updated: N/A",
      ]);
    });

    it("maps an upstream error message to an invalid symbol notice", async () => {
      const { client } = clientReturning({
        "Error Message": "Invalid API call.",
      });

      await expect(getStockQuote(client, { symbol: "xyz" })).resolves.toBe(
        "Error: Invalid symbol 'XYZ' or API limit reached",
      );
    });

    it("reports an empty quote as missing data", async () => {
      const { client } = clientReturning({ "Global Quote": {} });

      await expect(getStockQuote(client, { symbol: "XYZ" })).resolves.toBe(
        "No data found for symbol: XYZ",
      );
    });

    it("passes rate-limit notices through", async () => {
      const { client } = clientReturning({
        Note: "Thank you for using Alpha Vantage!",
      });

      await expect(getStockQuote(client, { symbol: "AAPL" })).resolves.toBe(
        "Error: Thank you for using Alpha Vantage!",
      );
    });

    it("reports HTTP failures", async () => {
      const { client } = clientReturning(
        {},
        { status: 500, statusText: "Internal Server Error" },
      );

      await expect(getStockQuote(client, { symbol: "AAPL" })).resolves.toBe(
        "Error: API request failed: 500 Internal Server Error",
      );
    });

    it("reports network failures", async () => {
      const fetchMock = vi.fn<typeof fetch>(async () => {
        throw new TypeError("fetch failed");
      });
      const client = new AlphaVantageClient({
        apiKey: "test-key",
        fetch: fetchMock,
      });

      await expect(getStockQuote(client, { symbol: "AAPL" })).resolves.toBe(
        "Error: API request failed: fetch failed",
      );
    });
  });

  describe("searchStocks", () => {
    it("lists the first five matches", async () => {
      const names = [
        "AAPL",
        "APLE",
        "AAPL34.SAO",
        "APC.DEX",
        "APC.FRK",
        "AAPL.TRT",
      ];
      const { client, fetchMock } = clientReturning({
        bestMatches: names.map((symbol) => ({
          "1. symbol": symbol,
          "2. name": `${symbol} Corp`,
        })),
      });

      const result = await searchStocks(client, { query: "apple" });

      expect(result).toBe(
        [
          "Search results for 'apple':",
          "",
          "1. AAPL - AAPL Corp",
          "2. APLE - APLE Corp",
          "3. AAPL34.SAO - AAPL34.SAO Corp",
          "4. APC.DEX - APC.DEX Corp",
          "5. APC.FRK - APC.FRK Corp",
        ].join("\n"),
      );
      const params = requestedParams(fetchMock);
      expect(params.get("function")).toBe("SYMBOL_SEARCH");
      expect(params.get("keywords")).toBe("apple");
    });

    it("reports when nothing matches", async () => {
      const { client } = clientReturning({ bestMatches: [] });

      await expect(searchStocks(client, { query: "zzzz" })).resolves.toBe(
        "No stocks found matching: zzzz",
      );
    });
  });

  describe("getCryptoPrice", () => {
    it("formats the exchange rate in USD", async () => {
      const { client, fetchMock } = clientReturning({
        "Realtime Currency Exchange Rate": {
          "1. From_Currency Code": "BTC",
          "3. To_Currency Code": "USD",
          "5. Exchange Rate": "65000.12000000",
          "6. Last Refreshed": "2024-05-01 12:00:01",
        },
      });

      const result = await getCryptoPrice(client, { symbol: "btc" });

      expect(result).toBe(
        [
          "Crypto Price for BTC:",
          "• Current Price: $65000.12000000 USD",
          "• Last Updated: 2024-05-01 12:00:01",
        ].join("\n"),
      );
      const params = requestedParams(fetchMock);
      expect(params.get("function")).toBe("CURRENCY_EXCHANGE_RATE");
      expect(params.get("from_currency")).toBe("BTC");
      expect(params.get("to_currency")).toBe("USD");
    });

    it("maps an upstream error message to an invalid symbol notice", async () => {
      const { client } = clientReturning({
        "Error Message": "Invalid API call.",
      });

      await expect(getCryptoPrice(client, { symbol: "foo" })).resolves.toBe(
        "Error: Invalid crypto symbol 'FOO' or API limit reached",
      );
    });

    it("reports a missing rate as missing data", async () => {
      const { client } = clientReturning({});

      await expect(getCryptoPrice(client, { symbol: "FOO" })).resolves.toBe(
        "No data found for crypto: FOO",
      );
    });
  });
});
