import type { PriceSource } from '@holdings/valuation';

export type MarketDataItem = {
  asset_id: number | null;
  code: string;
  name: string;
  last_price: number;
  change_24h: number;
  change_7d: number | null;
  volume_24h: number;
};

export type AssetDetail = {
  asset_id: number;
  code: string;
  name: string;
  type: 'fiat' | 'crypto';
  current_price_primary: number | null;
  current_price_secondary: number | null;
  change_24h: number | null;
  change_7d: number | null;
  high_24h: number | null;
  low_24h: number | null;
  volume_24h: number | null;
  price_source: PriceSource | null;
};
