/**
 * MCP (Model Context Protocol) response utilities.
 * Every tool answers with a text block for humans and structured content for agents.
 */

import type { Result } from "./result.js";

/**
 * MCP text content block.
 */
export interface TextContent {
  type: "text";
  text: string;
}

/**
 * MCP tool response structure.
 */
export interface ToolResponse<T = unknown> {
  [key: string]: unknown;
  content: TextContent[];
  structuredContent?: T;
}

export interface ErrorPayload extends Record<string, unknown> {
  success: false;
  error: string;
}

/**
 * Create an error response from a message.
 */
export function errorResponse(message: string): ToolResponse<ErrorPayload> {
  return {
    content: [{ type: "text", text: `Error: ${message}` }],
    structuredContent: { success: false, error: message },
  };
}

/**
 * Convert a Result to a tool response.
 * On success the formatter supplies the text and the structured payload.
 */
export function resultToStructuredResponse<T, E extends string | Error, S extends Record<string, unknown>>(
  result: Result<T, E>,
  formatter: (value: T) => { text: string; data: S }
): ToolResponse<(S & { success: true }) | ErrorPayload> {
  if (result.ok) {
    const { text, data } = formatter(result.value);
    return {
      content: [{ type: "text", text }],
      structuredContent: { success: true, ...data },
    };
  }
  const message = result.error instanceof Error ? result.error.message : String(result.error);
  return errorResponse(message);
}
