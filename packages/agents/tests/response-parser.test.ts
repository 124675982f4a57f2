import { describe, it, expect } from 'vitest';
import { parseResponse, DEFAULT_FUNCTION_CALL_MARKER } from '../agents/response-parser.js';
import { MalformedFunctionCallError } from '../types/errors.js';

describe('parseResponse', () => {
  it('treats text without the marker as plain text', () => {
    const parsed = parseResponse('The stock rose on earnings news.');
    expect(parsed).toEqual({ kind: 'text', text: 'The stock rose on earnings news.' });
  });

  it('splits a function call into name and params on the first pipe', () => {
    const parsed = parseResponse('FUNCTION_CALL: analyze_price_data|[{"date":"2024-01-02"}]');
    expect(parsed).toEqual({
      kind: 'function_call',
      functionName: 'analyze_price_data',
      params: '[{"date":"2024-01-02"}]',
    });
  });

  it('keeps later pipes inside the params', () => {
    const parsed = parseResponse('FUNCTION_CALL: f|a|b|c');
    expect(parsed).toEqual({ kind: 'function_call', functionName: 'f', params: 'a|b|c' });
  });

  it('detects the marker anywhere in the text and trims around the call', () => {
    const parsed = parseResponse('Let me look at prices first.\nFUNCTION_CALL:   analyze_price_data | {"x":1}  ');
    expect(parsed).toEqual({ kind: 'function_call', functionName: 'analyze_price_data', params: '{"x":1}' });
  });

  it('uses only the first marker occurrence', () => {
    const parsed = parseResponse('FUNCTION_CALL: a|1 FUNCTION_CALL: b|2');
    expect(parsed).toEqual({ kind: 'function_call', functionName: 'a', params: '1 FUNCTION_CALL: b|2' });
  });

  it('accepts empty params', () => {
    const parsed = parseResponse('FUNCTION_CALL: analyze_news_sentiment|');
    expect(parsed).toEqual({ kind: 'function_call', functionName: 'analyze_news_sentiment', params: '' });
  });

  it('throws MalformedFunctionCallError when the pipe is missing', () => {
    const text = 'FUNCTION_CALL: analyze_price_data';
    expect(() => parseResponse(text)).toThrow(MalformedFunctionCallError);
    expect(() => parseResponse(text)).toThrow(
      'Malformed function call: expected "FUNCTION_CALL: <name>|<params>" but got "analyze_price_data"',
    );
  });

  it('keeps the raw response on the error', () => {
    try {
      parseResponse('oops FUNCTION_CALL: nothing');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MalformedFunctionCallError);
      if (err instanceof MalformedFunctionCallError) {
        expect(err.response).toBe('oops FUNCTION_CALL: nothing');
      }
    }
  });

  it('honours a custom marker', () => {
    expect(parseResponse('CALL>> f|x', 'CALL>>')).toEqual({ kind: 'function_call', functionName: 'f', params: 'x' });
    expect(parseResponse(`${DEFAULT_FUNCTION_CALL_MARKER} f|x`, 'CALL>>').kind).toBe('text');
  });
});
