/**
 * Text-only tool result, assignable to the MCP SDK's CallToolResult
 */
export type ToolTextResult = {
  content: { type: 'text'; text: string }[];
  isError?: boolean;
};

export function textResult(text: string, isError = false): ToolTextResult {
  return isError ? { isError: true, content: [{ type: 'text', text }] } : { content: [{ type: 'text', text }] };
}
