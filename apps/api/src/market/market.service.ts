import { Inject, Injectable, NotFoundException } from '@nestjs/common';
import { APP_ENV, type Env } from '../config/env';
import { AssetsService } from '../assets/assets.service';
import { CoinGeckoClient } from '../prices/coingecko.client';
import { PRIMARY_CURRENCY, PricesService } from '../prices/prices.service';
import type { AssetDetail, MarketDataItem } from './market.types';

export const DEFAULT_MARKET_LIMIT = 50;

@Injectable()
export class MarketService {
  constructor(
    @Inject(APP_ENV) private readonly env: Env,
    private readonly assets: AssetsService,
    private readonly prices: PricesService,
    private readonly coingecko: CoinGeckoClient,
  ) {}

  /** Most traded coins, highest 24h volume first. */
  async marketData(limit = DEFAULT_MARKET_LIMIT): Promise<MarketDataItem[]> {
    const markets = await this.coingecko.markets(PRIMARY_CURRENCY, limit);

    const rows = markets.map((m) => ({
      asset_id: this.assets.findByCoingeckoId(m.id)?.id ?? null,
      code: m.symbol.toUpperCase(),
      name: m.name,
      last_price: m.current_price ?? 0,
      change_24h: m.price_change_percentage_24h ?? 0,
      change_7d: m.price_change_percentage_7d_in_currency ?? null,
      volume_24h: m.total_volume ?? 0,
    }));

    rows.sort((a, b) => b.volume_24h - a.volume_24h);
    return rows.slice(0, limit);
  }

  async assetDetail(code: string): Promise<AssetDetail> {
    const asset = this.assets.findByCode(code);
    if (!asset) throw new NotFoundException('Asset not found');

    const type: AssetDetail['type'] = asset.fixedPrice != null ? 'fiat' : 'crypto';
    const base = { asset_id: asset.id, code: asset.code, name: asset.name, type };

    if (asset.fixedPrice != null || !asset.coingeckoId) {
      const quote = await this.prices.quote(asset);
      return {
        ...base,
        current_price_primary: quote?.price ?? null,
        current_price_secondary: quote
          ? quote.price * this.env.SECONDARY_CURRENCY_RATE
          : null,
        change_24h: quote?.change24h ?? null,
        change_7d: null,
        high_24h: null,
        low_24h: null,
        volume_24h: null,
        price_source: quote?.source ?? null,
      };
    }

    const coingeckoId = asset.coingeckoId;
    const rows = await this.coingecko.markets(PRIMARY_CURRENCY, 1, [coingeckoId]);
    const m = rows.find((r) => r.id === coingeckoId);
    const price = m?.current_price;

    // a zero price counts as missing, same as the portfolio valuation
    if (!m || !price) {
      return {
        ...base,
        current_price_primary: null,
        current_price_secondary: null,
        change_24h: null,
        change_7d: null,
        high_24h: null,
        low_24h: null,
        volume_24h: null,
        price_source: null,
      };
    }

    return {
      ...base,
      current_price_primary: price,
      current_price_secondary: price * this.env.SECONDARY_CURRENCY_RATE,
      change_24h: m.price_change_percentage_24h ?? null,
      change_7d: m.price_change_percentage_7d_in_currency ?? null,
      high_24h: m.high_24h ?? null,
      low_24h: m.low_24h ?? null,
      volume_24h: m.total_volume,
      price_source: 'coingecko',
    };
  }
}
