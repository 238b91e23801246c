/**
 * Translates the MCP tool catalog into the tool definitions sent to the
 * Anthropic Messages API.
 */
import type { ToolDescriptor } from "../mcp/session.js";
import type { ToolDefinition } from "./chatTypes.js";

export function toToolDefinitions(
  tools: ReadonlyArray<ToolDescriptor>,
): ToolDefinition[] {
  return tools.map((tool) => ({
    name: tool.name,
    description: tool.description,
    input_schema: { type: "object", ...tool.inputSchema },
  }));
}
