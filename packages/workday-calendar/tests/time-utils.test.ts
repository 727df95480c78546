import { describe, it, expect } from 'vitest';
import {
  MINUTES_IN_DAY,
  addMinutes,
  addTime,
  convertToMinutes,
  subtractMinutes,
  subtractTime,
} from '../src/time-utils.js';

describe('time-utils', () => {
  it('should convert a pair to minutes since midnight', () => {
    expect(convertToMinutes([0, 0])).toBe(0);
    expect(convertToMinutes([8, 0])).toBe(480);
    expect(convertToMinutes([15, 7])).toBe(907);
  });

  it('should add minutes without wrapping at 24 hours', () => {
    expect(addMinutes(480, 67)).toEqual([9, 7]);
    expect(addMinutes(1380, 120)).toEqual([25, 0]);
  });

  it('should subtract minutes', () => {
    expect(subtractMinutes(960, 358)).toEqual([10, 2]);
  });

  it('should borrow one day when the difference is negative', () => {
    expect(MINUTES_IN_DAY).toBe(1440);
    expect(subtractMinutes(60, 120)).toEqual([23, 0]);
  });

  it('should operate on pairs', () => {
    expect(addTime([8, 45], [1, 30])).toEqual([10, 15]);
    expect(subtractTime([16, 0], [8, 0])).toEqual([8, 0]);
    expect(subtractTime([6, 0], [22, 0])).toEqual([8, 0]);
    expect(subtractTime([8, 0], [8, 0])).toEqual([0, 0]);
  });
});
