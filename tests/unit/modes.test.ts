import { describe, it, expect } from 'vitest';
import {
  parseModeSpec,
  modesFromBits,
  modesToBits,
  effectiveModes,
  formatModes,
  TOOL_MODES,
} from '../../src/modes.js';
import { ValidationError } from '../../src/errors.js';

describe('Capability modes', () => {
  describe('parseModeSpec', () => {
    it('accepts a single name', () => {
      expect(parseModeSpec('FOR_DATA_PATTERNS')).toEqual(['FOR_DATA_PATTERNS']);
    });

    it('accepts comma and pipe separated names in any case', () => {
      expect(parseModeSpec('for_prometheus, FOR_SELF')).toEqual(['FOR_SELF', 'FOR_PROMETHEUS']);
      expect(parseModeSpec('FOR_SELF|FOR_DATA_PATTERNS')).toEqual(['FOR_SELF', 'FOR_DATA_PATTERNS']);
    });

    it('accepts a list of names and drops duplicates', () => {
      expect(parseModeSpec(['FOR_SELF', 'FOR_SELF,EXPERIMENTAL'])).toEqual(['FOR_SELF', 'EXPERIMENTAL']);
    });

    it('accepts integer bit combinations', () => {
      expect(parseModeSpec(3)).toEqual(['FOR_SELF', 'FOR_PROMETHEUS']);
      expect(parseModeSpec('12')).toEqual(['FOR_DATA_PATTERNS', 'EXPERIMENTAL']);
    });

    it('lists every unknown name', () => {
      let caught: unknown;
      try {
        parseModeSpec('FOR_SELF,BOGUS,OTHER');
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(ValidationError);
      expect(caught instanceof ValidationError ? caught.violations.map(v => v.message) : []).toEqual([
        'unknown mode "BOGUS" (expected one of FOR_SELF, FOR_PROMETHEUS, FOR_DATA_PATTERNS, EXPERIMENTAL)',
        'unknown mode "OTHER" (expected one of FOR_SELF, FOR_PROMETHEUS, FOR_DATA_PATTERNS, EXPERIMENTAL)',
      ]);
    });

    it('rejects empty specs and unknown bits', () => {
      expect(() => parseModeSpec('')).toThrow('mode specification is empty');
      expect(() => parseModeSpec(' , ')).toThrow(ValidationError);
      expect(() => parseModeSpec(0)).toThrow(ValidationError);
      expect(() => parseModeSpec(16)).toThrow('invalid mode bits "16"');
    });
  });

  describe('bits', () => {
    it('round-trips every combination', () => {
      for (let bits = 1; bits < 1 << TOOL_MODES.length; bits++) {
        expect(modesToBits(modesFromBits(bits))).toBe(bits);
      }
    });
  });

  describe('effectiveModes', () => {
    it('drops EXPERIMENTAL unless enabled', () => {
      expect([...effectiveModes(['FOR_SELF', 'EXPERIMENTAL'], false)]).toEqual(['FOR_SELF']);
      expect([...effectiveModes(['FOR_SELF', 'EXPERIMENTAL'], true)]).toEqual(['FOR_SELF', 'EXPERIMENTAL']);
    });

    it('does not add EXPERIMENTAL on its own', () => {
      expect([...effectiveModes(['FOR_SELF'], true)]).toEqual(['FOR_SELF']);
    });
  });

  it('formats in canonical order', () => {
    expect(formatModes(new Set(['EXPERIMENTAL', 'FOR_SELF'] as const))).toBe('FOR_SELF,EXPERIMENTAL');
  });
});
