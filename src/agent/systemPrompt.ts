/**
 * System instructions that prime the finance assistant before any user input.
 */
export const systemPrompt =
  "You are a finance assistant. Provide concise market context and only call tools when the user asks for specific data points such as a current stock quote, a symbol lookup, or a cryptocurrency price. Prefer summarising high-level trends over fetching ticker-by-ticker data unless a lookup is necessary.";

export const toolsUnavailableNote =
  "Note: MCP server tools are currently unavailable. Provide a helpful response based on general knowledge.";

export function buildSystemPrompt(toolsAvailable: boolean): string {
  return toolsAvailable
    ? systemPrompt
    : `${systemPrompt}\n\n${toolsUnavailableNote}`;
}
