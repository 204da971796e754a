import { createHash } from 'crypto';
import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  aggregatePortfolio,
  type PortfolioValuation,
} from '@holdings/valuation';
import { APP_ENV, type Env } from '../config/env';
import { AssetsService } from '../assets/assets.service';
import { SwyftxClient } from '../swyftx/swyftx.client';
import { PricesService } from '../prices/prices.service';
import { CLOCK, type Clock } from '../cache/clock';
import { ResultCacheService } from '../cache/result-cache.service';
import type { PortfolioSummary } from './portfolio.types';

@Injectable()
export class PortfolioService {
  private readonly logger = new Logger(PortfolioService.name);
  private readonly cacheKey: string;

  constructor(
    @Inject(APP_ENV) private readonly env: Env,
    @Inject(CLOCK) private readonly clock: Clock,
    private readonly swyftx: SwyftxClient,
    private readonly prices: PricesService,
    private readonly assets: AssetsService,
    private readonly cache: ResultCacheService<PortfolioSummary>,
  ) {
    // one slot per brokerage account, never shared across credentials
    this.cacheKey = createHash('sha256')
      .update(env.SWYFTX_API_KEY)
      .digest('hex')
      .slice(0, 16);
  }

  getPortfolio(): Promise<PortfolioSummary> {
    return this.cache.getOrCompute(this.cacheKey, () => this.compute());
  }

  private async compute(): Promise<PortfolioSummary> {
    const startedAt = this.clock.now();

    const balances = await this.swyftx.fetchBalances();
    const prices = await this.prices.resolve(
      new Set(balances.map((b) => b.assetId)),
    );

    const valuation = aggregatePortfolio(balances, prices, this.assets.all(), {
      secondaryRate: this.env.SECONDARY_CURRENCY_RATE,
      computedAt: new Date(this.clock.now()),
    });

    if (valuation.unpriced.length) {
      this.logger.warn(
        `left out unpriced assets: ${valuation.unpriced.join(', ')}`,
      );
    }
    this.logger.log(
      `portfolio recomputed: ${valuation.lineItems.length} assets in ${this.clock.now() - startedAt}ms`,
    );

    return toSummary(valuation);
  }
}

function toSummary(v: PortfolioValuation): PortfolioSummary {
  return {
    total_primary_value: v.totals.totalValue.toNumber(),
    total_secondary_value: v.totals.totalSecondaryValue.toNumber(),
    total_change_24h: v.totals.change24h.toNumber(),
    assets: v.lineItems.map((i) => ({
      asset_id: i.assetId,
      code: i.code,
      name: i.name,
      balance: i.quantity.toNumber(),
      last_price: i.price,
      value_primary: i.value.toNumber(),
      value_secondary: i.secondaryValue.toNumber(),
      change_24h: i.change24h,
      color: i.color,
    })),
    last_updated: v.computedAt,
  };
}
