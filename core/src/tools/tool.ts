import { z } from 'zod';

export interface TextContent {
  type: 'text';
  text: string;
}

/** What a tool call hands back to the protocol server. */
export interface ToolResult {
  content: TextContent[];
  isError?: boolean;
}

export interface Tool {
  name: string;
  description: string;
  parameters: z.ZodTypeAny;
  call(params: unknown, signal?: AbortSignal): ToolResult;
}

export function textResult(text: string): ToolResult {
  return { content: [{ type: 'text', text }] };
}

export function jsonResult(value: unknown): ToolResult {
  return textResult(JSON.stringify(value, null, 2));
}

export function errorResult(message: string): ToolResult {
  return { content: [{ type: 'text', text: message }], isError: true };
}

function describeIssue(error: z.ZodError): string {
  const [issue] = error.issues;
  if (!issue) return 'invalid parameters';
  if (issue.path.length === 0) return issue.message;
  return `missing or invalid '${issue.path.join('.')}' parameter`;
}

/**
 * Wraps a handler so its parameters are validated first and any error it
 * throws comes back as an error result instead of escaping the call.
 */
export function defineTool<S extends z.ZodTypeAny>(
  name: string,
  description: string,
  parameters: S,
  handler: (params: z.infer<S>, signal?: AbortSignal) => ToolResult
): Tool {
  return {
    name,
    description,
    parameters,
    call(params: unknown, signal?: AbortSignal): ToolResult {
      const parsed = parameters.safeParse(params ?? {});
      if (!parsed.success) {
        return errorResult(describeIssue(parsed.error));
      }
      try {
        return handler(parsed.data, signal);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.warn(`[Tools] ${name} failed: ${message}`);
        return errorResult(message);
      }
    },
  };
}
