import {
  ACADEMIC_LEVELS,
  CEILING_PER_PAGE,
  DEADLINE_OPTIONS,
  isDeadlineKey,
  isLevelKey,
} from '../config/catalog';

/**
 * Computes the price of an order.
 * Unknown level yields 0, unknown deadline falls back to multiplier 1.0.
 * The result is capped at CEILING_PER_PAGE per page.
 */
export function computePrice(levelKey: string, deadlineKey: string, pages: number): number {
  if (!isLevelKey(levelKey)) {
    return 0;
  }
  const basePrice = ACADEMIC_LEVELS[levelKey].basePrice;
  const multiplier = isDeadlineKey(deadlineKey) ? DEADLINE_OPTIONS[deadlineKey].multiplier : 1.0;

  const raw = basePrice * multiplier * pages;
  return Math.min(raw, CEILING_PER_PAGE * pages);
}

export function formatPrice(price: number): string {
  return `${price.toFixed(2)}€`;
}

export function formatFileSize(sizeBytes: number): string {
  if (sizeBytes < 1024) {
    return `${sizeBytes} B`;
  }
  if (sizeBytes < 1024 * 1024) {
    return `${(sizeBytes / 1024).toFixed(1)} KB`;
  }
  return `${(sizeBytes / (1024 * 1024)).toFixed(1)} MB`;
}

/**
 * Renders a deadline multiplier as a signed percentage ("+50%", "-10%")
 * or "standard price" for 1.0
 */
export function formatMultiplier(multiplier: number): string {
  const percent = Math.round((multiplier - 1) * 100);
  if (percent === 0) {
    return 'standard price';
  }
  return percent > 0 ? `+${percent}%` : `${percent}%`;
}
