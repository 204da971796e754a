import type Decimal from 'decimal.js';

/** Swyftx-assigned asset id. */
export type AssetId = number;

export type AssetDescriptor = {
  id: AssetId;
  code: string;
  name: string;
  color: string;
  fixedPrice?: number; // fiat valued against the primary currency
  coingeckoId?: string;
};

export type BalanceEntry = {
  assetId: AssetId;
  available: Decimal;
};

export type PriceSource = 'fixed' | 'coingecko';

export type ResolvedPrice = {
  assetId: AssetId;
  price: number;
  change24h: number;
  source: PriceSource;
};
