export type TextPayload = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

/** Build a tool result carrying plain text. */
export function textResponse(text: string): TextPayload {
  return {
    content: [{ type: 'text', text }],
  };
}

/** Build a tool result carrying plain text with isError: true. */
export function textErrorResponse(text: string): TextPayload {
  return {
    isError: true,
    content: [{ type: 'text', text }],
  };
}

/** Build a tool result with JSON-stringified content. */
export function jsonResponse(payload: unknown): TextPayload {
  return textResponse(JSON.stringify(payload, null, 2));
}
