import type { MarkupRule } from '../../types/seat-pack';

export interface PackPrice {
  unitPriceCents: number | null;
  packPriceCents: number | null;
  totalPriceCents: number | null;
}

/**
 * Pack price is the unit price times the size; venue markup applies once to
 * the pack total. A percentage markup is rounded to whole cents.
 */
export function pricePack(unitPriceCents: number | null, packSize: number, markup: MarkupRule | null): PackPrice {
  if (unitPriceCents === null) {
    return { unitPriceCents: null, packPriceCents: null, totalPriceCents: null };
  }

  const packPriceCents = unitPriceCents * packSize;
  return {
    unitPriceCents,
    packPriceCents,
    totalPriceCents: applyMarkup(packPriceCents, markup),
  };
}

export function applyMarkup(packPriceCents: number, markup: MarkupRule | null): number {
  if (!markup) return packPriceCents;

  switch (markup.type) {
    case 'percentage':
      return packPriceCents + Math.round((packPriceCents * markup.percent) / 100);
    case 'dollar':
      return packPriceCents + markup.amountCents;
  }
}
