import {
  computePrice,
  formatFileSize,
  formatMultiplier,
  formatPrice,
} from './pricing.service';
import {
  ACADEMIC_LEVELS,
  CEILING_PER_PAGE,
  DEADLINE_OPTIONS,
  deadlineKeys,
  levelKeys,
} from '../config/catalog';

describe('computePrice', () => {
  it('prices a bachelor paper due in 24h below the ceiling', () => {
    expect(computePrice('bachelor', '24h', 2)).toBe(66);
  });

  it('caps a PhD express paper at the per-page ceiling', () => {
    expect(computePrice('phd', '6h', 3)).toBe(150);
  });

  it('returns 0 for an unknown level', () => {
    expect(computePrice('kindergarten', '24h', 4)).toBe(0);
  });

  it('uses multiplier 1.0 for an unknown deadline', () => {
    expect(computePrice('master', '1y', 2)).toBe(52);
  });

  it('applies the economy discount', () => {
    // 18 * 0.9 * 10
    expect(computePrice('high_school', '14d', 10)).toBeCloseTo(162, 10);
  });

  it('never exceeds the ceiling and matches the raw product below it', () => {
    for (const level of levelKeys()) {
      for (const deadline of deadlineKeys()) {
        for (const pages of [1, 2, 7, 25, 50]) {
          const price = computePrice(level, deadline, pages);
          const raw = ACADEMIC_LEVELS[level].basePrice * DEADLINE_OPTIONS[deadline].multiplier * pages;

          expect(price).toBeLessThanOrEqual(CEILING_PER_PAGE * pages);
          if (raw <= CEILING_PER_PAGE * pages) {
            expect(price).toBe(raw);
          }
        }
      }
    }
  });
});

describe('formatting helpers', () => {
  it('formats prices with two decimals and the euro sign', () => {
    expect(formatPrice(66)).toBe('66.00€');
    expect(formatPrice(172.8)).toBe('172.80€');
  });

  it('formats file sizes by magnitude', () => {
    expect(formatFileSize(512)).toBe('512 B');
    expect(formatFileSize(2048)).toBe('2.0 KB');
    expect(formatFileSize(5 * 1024 * 1024)).toBe('5.0 MB');
  });

  it('formats multipliers as percentage adjustments', () => {
    expect(formatMultiplier(1.5)).toBe('+50%');
    expect(formatMultiplier(0.9)).toBe('-10%');
    expect(formatMultiplier(1.0)).toBe('standard price');
  });
});
