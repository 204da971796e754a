import { Inject, Injectable } from '@nestjs/common';
import { APP_ENV, type Env } from '../config/env';
import { upstreamJson } from '../common/upstream-http';
import {
  coinGeckoMarketsSchema,
  coinGeckoSimplePriceSchema,
  type CoinGeckoMarket,
  type CoinGeckoSimplePrice,
} from './coingecko.types';

@Injectable()
export class CoinGeckoClient {
  constructor(@Inject(APP_ENV) private readonly env: Env) {}

  /** Price and 24h change for several coins in a single call. */
  simplePrice(ids: readonly string[], vsCurrency: string): Promise<CoinGeckoSimplePrice> {
    const url = this.url('/simple/price');
    url.searchParams.set('ids', ids.join(','));
    url.searchParams.set('vs_currencies', vsCurrency);
    url.searchParams.set('include_24hr_change', 'true');

    return upstreamJson({
      upstream: 'coingecko',
      url: url.toString(),
      headers: this.headers(),
      timeoutMs: this.env.UPSTREAM_TIMEOUT_MS,
      schema: coinGeckoSimplePriceSchema,
    });
  }

  /** Market rows by 24h volume, optionally narrowed to the given coin ids. */
  markets(
    vsCurrency: string,
    perPage: number,
    ids?: readonly string[],
  ): Promise<CoinGeckoMarket[]> {
    const url = this.url('/coins/markets');
    url.searchParams.set('vs_currency', vsCurrency);
    url.searchParams.set('order', 'volume_desc');
    url.searchParams.set('per_page', String(perPage));
    url.searchParams.set('page', '1');
    url.searchParams.set('price_change_percentage', '24h,7d');
    if (ids?.length) url.searchParams.set('ids', ids.join(','));

    return upstreamJson({
      upstream: 'coingecko',
      url: url.toString(),
      headers: this.headers(),
      timeoutMs: this.env.UPSTREAM_TIMEOUT_MS,
      schema: coinGeckoMarketsSchema,
    });
  }

  private url(path: string) {
    return new URL(`${this.env.COINGECKO_API_URL.replace(/\/+$/, '')}${path}`);
  }

  private headers(): Record<string, string> {
    const key = this.env.COINGECKO_API_KEY;
    return key ? { 'x-cg-demo-api-key': key } : {};
  }
}
