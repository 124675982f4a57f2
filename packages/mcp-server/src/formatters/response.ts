/**
 * Wrap a tool result as MCP text content. Strings pass through, everything
 * else is pretty-printed JSON. Errors come back flagged with `isError`.
 */
export function wrapResponse(result: unknown) {
  if (result instanceof Error) {
    return {
      content: [{ type: "text" as const, text: JSON.stringify({ error: result.message }) }],
      isError: true,
    };
  }
  return {
    content: [
      {
        type: "text" as const,
        text: typeof result === "string" ? result : JSON.stringify(result, null, 2),
      },
    ],
  };
}
