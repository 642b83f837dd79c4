import { InvalidArgumentError } from 'commander';
import { ConfigurationError } from '@hours-monitor/shared';
import { parseNonNegative, requirementFor } from '../commands/calc.js';

describe('parseNonNegative', () => {
  it('accepts zero, integers and halves', () => {
    expect(parseNonNegative('0')).toBe(0);
    expect(parseNonNegative('2')).toBe(2);
    expect(parseNonNegative('1.5')).toBe(1.5);
  });

  it.each(['-1', 'abc', '', ' '])('rejects %j', (value) => {
    expect(() => parseNonNegative(value)).toThrow(InvalidArgumentError);
  });
});

describe('requirementFor', () => {
  it('prorates the default 40 h week by days off', () => {
    const r = requirementFor({ leave: 2, holidays: 1 });

    expect(r.effectiveLeaveDays).toBe(3);
    expect(r.requiredHours).toBeCloseTo(22.857, 3);
    expect(r.acceptableHours).toBeCloseTo(19.857, 3);
  });

  it('takes a custom base and buffer', () => {
    expect(requirementFor({ leave: 0, holidays: 0, base: 35, buffer: 0 })).toMatchObject({
      requiredHours: 35,
      acceptableHours: 35,
    });
  });

  it('rejects a zero base week', () => {
    expect(() => requirementFor({ leave: 0, holidays: 0, base: 0 })).toThrow(ConfigurationError);
  });
});
