import { describe, it, expect } from 'vitest';
import { SEVERITIES, SYSLOG_LEVELS, isSeverity, levelTag, parseLevelTag } from '../transform/levels.ts';

describe('levels', () => {
  it('uses syslog codes', () => {
    expect(SYSLOG_LEVELS).toEqual({ CRITICAL: 2, ERROR: 3, WARNING: 4, INFO: 6, DEBUG: 7 });
  });

  it('renders numeric codes by default and symbolic names on request', () => {
    expect(levelTag('WARNING', false)).toBe('4');
    expect(levelTag('WARNING', true)).toBe('WARNING');
  });

  it('maps bijectively in both modes', () => {
    for (const names of [false, true]) {
      const rendered = SEVERITIES.map((s) => levelTag(s, names));
      expect(new Set(rendered).size).toBe(SEVERITIES.length);
      expect(rendered.map(parseLevelTag)).toEqual([...SEVERITIES]);
    }
  });

  it('rejects unknown renderings', () => {
    expect(parseLevelTag('5')).toBeUndefined();
    expect(isSeverity('NOTICE')).toBe(false);
    expect(isSeverity('DEBUG')).toBe(true);
  });
});
