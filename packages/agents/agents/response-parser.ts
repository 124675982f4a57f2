// Response parser — classifies raw model text as a function call or plain text
// Completion-marker detection is left to the agent loop.

import { MalformedFunctionCallError } from '../types/errors.js';

export const DEFAULT_FUNCTION_CALL_MARKER = 'FUNCTION_CALL:';

export type ParsedResponse =
  | { kind: 'function_call'; functionName: string; params: string }
  | { kind: 'text'; text: string };

/**
 * `FUNCTION_CALL: <name>|<params>` anywhere in the text is a function call;
 * everything after the first marker is split on the first `|`.
 *
 * @throws MalformedFunctionCallError when the marker is present without a `|`
 */
export function parseResponse(
  text: string,
  marker: string = DEFAULT_FUNCTION_CALL_MARKER,
): ParsedResponse {
  const markerAt = text.indexOf(marker);
  if (markerAt === -1) return { kind: 'text', text };

  const call = text.slice(markerAt + marker.length).trim();
  const separator = call.indexOf('|');
  if (separator === -1) {
    throw new MalformedFunctionCallError(
      `Malformed function call: expected "${marker} <name>|<params>" but got "${call}"`,
      text,
    );
  }

  return {
    kind: 'function_call',
    functionName: call.slice(0, separator).trim(),
    params: call.slice(separator + 1).trim(),
  };
}
