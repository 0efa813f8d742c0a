/**
 * MCP response helpers shared by every tool.
 */

import type { Result } from "./result.js";

export interface TextContent {
  type: "text";
  text: string;
}

/**
 * MCP tool response. The index signature keeps it assignable to the SDK's
 * CallToolResult.
 */
export interface ToolResponse<T extends Record<string, unknown> = Record<string, unknown>> {
  [key: string]: unknown;
  content: TextContent[];
  structuredContent?: T;
  isError?: boolean;
}

/**
 * Anything that can explain itself in one line.
 */
export type Failure = string | Error | { readonly kind: string; readonly message: string };

export interface FailureContent extends Record<string, unknown> {
  success: false;
  error: string;
  kind?: string;
}

export function describeFailure(failure: Failure): string {
  return typeof failure === "string" ? failure : failure.message;
}

export function errorResponse(failure: Failure): ToolResponse<FailureContent> {
  const message = describeFailure(failure);
  const structuredContent: FailureContent = { success: false, error: message };
  if (typeof failure === "object" && "kind" in failure) {
    structuredContent.kind = failure.kind;
  }
  return {
    content: [{ type: "text", text: `Error: ${message}` }],
    structuredContent,
    isError: true,
  };
}

/**
 * Turn a Result into a tool response: the formatter supplies the text and the
 * structured payload for a success, failures become error responses.
 */
export function resultToStructuredResponse<T, E extends Failure, S extends Record<string, unknown>>(
  result: Result<T, E>,
  formatter: (value: T) => { text: string; data: S }
): ToolResponse<(S & { success: true }) | FailureContent> {
  if (!result.ok) {
    return errorResponse(result.error);
  }
  const { text, data } = formatter(result.value);
  return {
    content: [{ type: "text", text }],
    structuredContent: { ...data, success: true },
  };
}
