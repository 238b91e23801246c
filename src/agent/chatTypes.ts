/**
 * Shared TypeScript types that describe the conversation exchanged with the
 * Anthropic Messages API as well as the tool blocks the model can emit.
 */
export type TextBlock = { type: "text"; text: string };

export type ToolUseBlock = {
  type: "tool_use";
  id: string;
  name: string;
  input: Record<string, unknown>;
};

export type ToolResultBlock = {
  type: "tool_result";
  tool_use_id: string;
  content: string;
};

export type AssistantContentBlock = TextBlock | ToolUseBlock;

export type ChatMessage =
  | { role: "user"; content: string | ToolResultBlock[] }
  | { role: "assistant"; content: AssistantContentBlock[] };

export type ToolDefinition = {
  name: string;
  description: string;
  input_schema: Record<string, unknown>;
};

export type StopReason =
  | "end_turn"
  | "max_tokens"
  | "stop_sequence"
  | "tool_use"
  | (string & {});

export type CompletionRequest = {
  model: string;
  max_tokens: number;
  system?: string;
  tools?: ToolDefinition[];
  messages: ChatMessage[];
};

export type CompletionResponse = {
  id: string;
  model: string;
  stop_reason: StopReason | null;
  content: AssistantContentBlock[];
};
