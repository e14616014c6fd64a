/**
 * Error Handler - Uniform tool responses
 *
 * Every tool returns plain text. Failures become a single
 * "❌ Failed <context>: <message>" line; engine errors add their code.
 */

import { LifecycleError } from "../errors.js";

/**
 * Standard MCP tool response format
 */
export interface ToolResponse {
  [key: string]: unknown;
  content: Array<{
    type: "text";
    text: string;
  }>;
}

export function textResponse(text: string): ToolResponse {
  return { content: [{ type: "text" as const, text }] };
}

/**
 * Format an error message for display
 *
 * @param error - Error object or message
 */
export function formatError(error: unknown): string {
  if (error instanceof LifecycleError) {
    return `${error.message} [${error.code}]`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Create a standardized error response and log the failure to stderr.
 *
 * @param context - What the tool was doing (e.g., "merging memories")
 */
export function errorResponse(context: string, error: unknown): ToolResponse {
  console.error(`[tools] Error ${context}:`, error);
  return textResponse(`❌ Failed ${context}: ${formatError(error)}`);
}
