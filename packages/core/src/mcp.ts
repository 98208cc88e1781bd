/**
 * Tool responses: Markdown text for the reader plus structured content with
 * a `success` flag for programmatic clients.
 */

import { toError, type Result } from "./result.js";

export type TextContent = {
  type: "text";
  text: string;
};

/**
 * MCP tool response structure. Declared as a type alias so it stays
 * assignable to the SDK's index-signature result type.
 */
export type ToolResponse = {
  content: TextContent[];
  structuredContent?: Record<string, unknown>;
  isError?: boolean;
};

/**
 * Create an error response from a message. Flagged with `isError` so the
 * client can tell a failed call from an empty answer.
 */
export function errorResponse(message: string): ToolResponse {
  return {
    content: [{ type: "text", text: `Error: ${message}` }],
    structuredContent: { success: false, error: message },
    isError: true,
  };
}

export function successResponse(text: string, data: Record<string, unknown> = {}): ToolResponse {
  return {
    content: [{ type: "text", text }],
    structuredContent: { success: true, ...data },
  };
}

/** Format a success; turn a failure into an error response. */
export function resultToResponse<T, E extends string | Error>(
  result: Result<T, E>,
  formatter: (value: T) => ToolResponse
): ToolResponse {
  if (result.ok) {
    return formatter(result.value);
  }
  const message = typeof result.error === "string" ? result.error : result.error.message;
  return errorResponse(message);
}

/** Run a tool body; anything it throws becomes an error response. */
export async function guardTool(body: () => Promise<ToolResponse>): Promise<ToolResponse> {
  try {
    return await body();
  } catch (e) {
    return errorResponse(toError(e).message);
  }
}
