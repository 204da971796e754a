import Decimal from 'decimal.js';
import type {
  AssetDescriptor,
  AssetId,
  BalanceEntry,
  ResolvedPrice,
} from './types';

export type PortfolioLineItem = {
  assetId: AssetId;
  code: string;
  name: string;
  color: string;
  quantity: Decimal;
  price: number;
  value: Decimal;
  secondaryValue: Decimal;
  change24h: number;
};

export type PortfolioValuation = {
  lineItems: PortfolioLineItem[];
  totals: {
    totalValue: Decimal;
    totalSecondaryValue: Decimal;
    change24h: Decimal; // value-weighted, percent
  };
  unpriced: AssetId[];
  computedAt: string;
};

export type AggregateOptions = {
  /** Approximate primary -> secondary currency factor. */
  secondaryRate: number;
  computedAt: Date;
};

export function aggregatePortfolio(
  balances: readonly BalanceEntry[],
  prices: ReadonlyMap<AssetId, ResolvedPrice>,
  assets: ReadonlyMap<AssetId, AssetDescriptor>,
  opts: AggregateOptions,
): PortfolioValuation {
  const D = Decimal;
  const rate = new D(opts.secondaryRate);

  const lineItems: PortfolioLineItem[] = [];
  const unpriced: AssetId[] = [];

  let totalValue = new D(0);
  let totalSecondaryValue = new D(0);
  let weightedChange = new D(0);

  for (const b of balances) {
    if (!b.available.isFinite() || b.available.lte(0)) continue;

    const asset = assets.get(b.assetId);
    const quote = prices.get(b.assetId);
    if (!asset || !quote) {
      unpriced.push(b.assetId);
      continue;
    }

    const value = b.available.mul(quote.price);
    const secondaryValue = value.mul(rate);

    totalValue = totalValue.add(value);
    totalSecondaryValue = totalSecondaryValue.add(secondaryValue);
    weightedChange = weightedChange.add(value.mul(quote.change24h).div(100));

    lineItems.push({
      assetId: b.assetId,
      code: asset.code,
      name: asset.name,
      color: asset.color,
      quantity: b.available,
      price: quote.price,
      value,
      secondaryValue,
      change24h: quote.change24h,
    });
  }

  // Array#sort is stable, ties keep encounter order
  lineItems.sort((a, b) => b.value.cmp(a.value));

  const change24h = totalValue.isZero()
    ? new D(0)
    : weightedChange.div(totalValue).mul(100);

  return {
    lineItems,
    totals: { totalValue, totalSecondaryValue, change24h },
    unpriced,
    computedAt: opts.computedAt.toISOString(),
  };
}
