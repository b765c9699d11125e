import { formatMonthLabel, monthsToDays } from '../../utils/time';

describe('monthsToDays', () => {
  it('should use 30-day months', () => {
    expect(monthsToDays(0)).toBe(0);
    expect(monthsToDays(12)).toBe(360);
    expect(monthsToDays(24)).toBe(720);
  });
});

describe('formatMonthLabel', () => {
  it('should label months within the first year', () => {
    expect(formatMonthLabel(0)).toBe('Month 0');
    expect(formatMonthLabel(11)).toBe('Month 11');
  });

  it('should label later months in years and months', () => {
    expect(formatMonthLabel(12)).toBe('1Y 0M');
    expect(formatMonthLabel(27)).toBe('2Y 3M');
    expect(formatMonthLabel(36)).toBe('3Y 0M');
  });
});
