/**
 * Builds the MCP server that publishes the finance tools. One instance serves
 * exactly one client session; the HTTP listener creates a fresh server for
 * every SSE connection.
 */
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";

import { MCP_SERVER_NAME, MCP_SERVER_VERSION } from "../config/constants.js";
import { errorMessage } from "../utils/asyncUtils.js";
import type { AlphaVantageClient } from "../tools/alphaVantage.js";
import {
  cryptoSymbolInputSchema,
  getCryptoPrice,
  getStockQuote,
  searchStocks,
  searchStocksInputSchema,
  stockSymbolInputSchema,
  type CryptoPriceInput,
  type FinanceToolName,
  type SearchStocksInput,
  type StockQuoteInput,
} from "../tools/financeTools.js";

function textResult(text: string): CallToolResult {
  return { content: [{ type: "text", text }] };
}

// Turns an unexpected throw inside a tool into an MCP error result.
function withErrorHandling<T>(
  toolName: FinanceToolName,
  handler: (args: T) => Promise<string>,
): (args: T) => Promise<CallToolResult> {
  return async (args: T) => {
    console.log(`[tool] ${toolName} args: ${JSON.stringify(args)}`);
    try {
      return textResult(await handler(args));
    } catch (error) {
      console.error(`[tool] ${toolName} failed: ${errorMessage(error)}`);
      return {
        content: [
          {
            type: "text",
            text: `Error in ${toolName}: ${errorMessage(error)}`,
          },
        ],
        isError: true,
      };
    }
  };
}

export function createFinanceServer(client: AlphaVantageClient): McpServer {
  const server = new McpServer({
    name: MCP_SERVER_NAME,
    version: MCP_SERVER_VERSION,
  });

  server.tool(
    "get_stock_quote",
    "Get current stock price and basic info for a given symbol",
    stockSymbolInputSchema.shape,
    withErrorHandling("get_stock_quote", (args: StockQuoteInput) =>
      getStockQuote(client, args),
    ),
  );

  server.tool(
    "search_stocks",
    "Search for stocks by company name or symbol",
    searchStocksInputSchema.shape,
    withErrorHandling("search_stocks", (args: SearchStocksInput) =>
      searchStocks(client, args),
    ),
  );

  server.tool(
    "get_crypto_price",
    "Get current cryptocurrency price in USD",
    cryptoSymbolInputSchema.shape,
    withErrorHandling("get_crypto_price", (args: CryptoPriceInput) =>
      getCryptoPrice(client, args),
    ),
  );

  return server;
}
