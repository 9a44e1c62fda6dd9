import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { z } from 'zod';
import type { DocumentStore } from '../types.js';
import { formatArgumentIssues, getToolErrorMessage, logToolError } from './tool-error.js';
import { textErrorResponse, type TextPayload } from './tool-response.js';

/** A tool exposed through tools/list and tools/call. */
export interface GatewayTool {
  readonly definition: Tool;
  /** Validate raw arguments and run the tool; never rejects. */
  call(rawArgs: unknown, store: DocumentStore): Promise<TextPayload>;
}

export function defineTool<S extends z.ZodTypeAny>(options: {
  definition: Tool;
  argsSchema: S;
  /** Shown to the caller when the tool body throws. */
  failureMessage: string;
  run: (args: z.output<S>, store: DocumentStore) => Promise<TextPayload>;
}): GatewayTool {
  const { name } = options.definition;
  return {
    definition: options.definition,
    async call(rawArgs, store) {
      const parsed = options.argsSchema.safeParse(rawArgs ?? {});
      if (!parsed.success) {
        return textErrorResponse(
          `Invalid arguments for ${name}: ${formatArgumentIssues(parsed.error)}`
        );
      }
      try {
        return await options.run(parsed.data, store);
      } catch (error) {
        logToolError(name, error);
        return textErrorResponse(getToolErrorMessage(error, options.failureMessage));
      }
    },
  };
}
