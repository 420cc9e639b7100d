import { describe, it, expect } from 'vitest';
import {
  coerceNumber,
  extractJson,
  optionalBoolean,
  optionalNumber,
  parseListPayload,
  parseObjectPayload,
  payloadToText,
  roundTo,
} from '../llmPayload.js';

describe('LLM payload parsing', () => {
  describe('extractJson', () => {
    it('should parse plain and fenced JSON', () => {
      expect(extractJson('{"a": 1}')).toEqual({ a: 1 });
      expect(extractJson('```json\n[1, 2]\n```')).toEqual([1, 2]);
    });

    it('should find JSON wrapped in prose', () => {
      expect(extractJson('Sure! {"price": 100} Let me know.')).toEqual({ price: 100 });
      expect(extractJson('Options: [{"a": 1}] and {"b": 2} later')).toEqual([{ a: 1 }]);
    });

    it('should return undefined when there is no JSON', () => {
      expect(extractJson('')).toBeUndefined();
      expect(extractJson('no structure {here')).toBeUndefined();
    });
  });

  describe('parseObjectPayload', () => {
    it('should keep non-object replies as raw text', () => {
      expect(parseObjectPayload('[1, 2]')).toEqual({ kind: 'raw', text: '[1, 2]', degraded: false });
      expect(parseObjectPayload('{"ok": true}')).toEqual({ kind: 'structured', data: { ok: true } });
    });
  });

  describe('parseListPayload', () => {
    it('should accept arrays, wrapped arrays and single objects', () => {
      expect(parseListPayload('[{"a": 1}, 2, {"b": 2}]')).toEqual({
        kind: 'structured',
        data: [{ a: 1 }, { b: 2 }],
      });
      expect(parseListPayload('{"proposals": [{"a": 1}]}')).toEqual({ kind: 'structured', data: [{ a: 1 }] });
      expect(parseListPayload('{"a": 1}')).toEqual({ kind: 'structured', data: [{ a: 1 }] });
    });

    it('should keep unparseable replies as raw text', () => {
      expect(parseListPayload('"just a string"')).toEqual({
        kind: 'raw',
        text: '"just a string"',
        degraded: false,
      });
    });
  });

  describe('value coercion', () => {
    it('should read numbers from formatted strings', () => {
      expect(optionalNumber('€ 12 500')).toBe(12500);
      expect(optionalNumber('$3,000')).toBeUndefined();
      expect(optionalNumber('12.5%')).toBe(12.5);
      expect(optionalNumber(Number.NaN)).toBeUndefined();
      expect(optionalNumber('  ')).toBeUndefined();
    });

    it('should report when a default was used', () => {
      expect(coerceNumber('42')).toEqual({ value: 42, defaulted: false });
      expect(coerceNumber(undefined)).toEqual({ value: 0, defaulted: true });
      expect(coerceNumber(null, 50)).toEqual({ value: 50, defaulted: true });
    });

    it('should read booleans strictly', () => {
      expect(optionalBoolean('true')).toBe(true);
      expect(optionalBoolean(false)).toBe(false);
      expect(optionalBoolean('yes')).toBeUndefined();
      expect(optionalBoolean(1)).toBeUndefined();
    });

    it('should round to two decimals by default', () => {
      expect(roundTo(2.345, 1)).toBe(2.3);
      expect(roundTo(19199.952)).toBe(19199.95);
    });
  });

  describe('payloadToText', () => {
    it('should render both variants', () => {
      expect(payloadToText({ kind: 'structured', data: { a: 1 } })).toBe('{"a":1}');
      expect(payloadToText({ kind: 'raw', text: 'hello', degraded: true })).toBe('hello');
    });
  });
});
