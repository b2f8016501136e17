import { describe, it, expect } from 'vitest';
import { extractJson } from './json-extraction.js';

describe('extractJson', () => {
  it('should parse clean JSON directly', () => {
    expect(extractJson('{"status": "VERIFIED"}')).toEqual({ status: 'VERIFIED' });
  });

  it('should parse JSON with surrounding whitespace', () => {
    expect(extractJson('  \n  {"status": "VERIFIED"}  \n  ')).toEqual({ status: 'VERIFIED' });
  });

  it('should extract JSON from a fenced json block', () => {
    const input = '```json\n{"status": "HALLUCINATED", "reason": "Sources say otherwise"}\n```';
    expect(extractJson(input)).toEqual({ status: 'HALLUCINATED', reason: 'Sources say otherwise' });
  });

  it('should extract JSON from a fence without a language tag', () => {
    expect(extractJson('```\n{"claims": []}\n```')).toEqual({ claims: [] });
  });

  it('should extract JSON after a leading explanation', () => {
    const input = 'Here is my verdict:\n{"status": "UNVERIFIABLE", "reason": "Not enough evidence"}';
    expect(extractJson(input)).toEqual({ status: 'UNVERIFIABLE', reason: 'Not enough evidence' });
  });

  it('should extract JSON followed by trailing prose', () => {
    const input = '{"status": "VERIFIED", "reason": "ok"} I hope this helps.';
    expect(extractJson(input)).toEqual({ status: 'VERIFIED', reason: 'ok' });
  });

  it('should handle nested braces', () => {
    const input = 'Result: {"claims": [{"claim": "x", "meta": {"deep": true}}]}';
    expect(extractJson(input)).toEqual({ claims: [{ claim: 'x', meta: { deep: true } }] });
  });

  it('should ignore braces inside string values', () => {
    const input = 'Verdict {"reason": "the {bracketed} part is fine", "status": "VERIFIED"}';
    expect(extractJson(input)).toEqual({
      reason: 'the {bracketed} part is fine',
      status: 'VERIFIED',
    });
  });

  it('should handle escaped quotes in strings', () => {
    const input = 'Answer: {"reason": "he said \\"no\\"", "status": "HALLUCINATED"}';
    expect(extractJson(input)).toEqual({ reason: 'he said "no"', status: 'HALLUCINATED' });
  });

  it('should fall back to arrays when no object is present', () => {
    expect(extractJson('The list: [1, 2, 3]')).toEqual([1, 2, 3]);
  });

  it('should throw SyntaxError for content with no JSON', () => {
    expect(() => extractJson('no json here')).toThrow(SyntaxError);
  });

  it('should throw SyntaxError for an empty string', () => {
    expect(() => extractJson('')).toThrow(SyntaxError);
  });
});
