import { Inject, Injectable, Logger } from '@nestjs/common';
import { parseDecimal, type BalanceEntry } from '@holdings/valuation';
import { APP_ENV, type Env } from '../config/env';
import { upstreamJson } from '../common/upstream-http';
import { swyftxAuthSchema, swyftxBalanceSchema } from './swyftx.types';

@Injectable()
export class SwyftxClient {
  private readonly logger = new Logger(SwyftxClient.name);

  constructor(@Inject(APP_ENV) private readonly env: Env) {}

  /**
   * Exchanges the API key for a short-lived access token and reads the
   * account balances with it. The token is not kept.
   */
  async fetchBalances(): Promise<BalanceEntry[]> {
    const accessToken = await this.authenticate();

    const raw = await upstreamJson({
      upstream: 'swyftx',
      url: `${this.baseUrl}/user/balance/`,
      headers: { authorization: `Bearer ${accessToken}` },
      timeoutMs: this.env.UPSTREAM_TIMEOUT_MS,
      schema: swyftxBalanceSchema,
    });

    const balances: BalanceEntry[] = [];
    for (const b of raw) {
      const available = parseDecimal(b.availableBalance);
      if (!available) {
        this.logger.warn(`unparseable balance for asset ${b.assetId}`);
        continue;
      }
      if (available.lte(0)) continue;
      balances.push({ assetId: b.assetId, available });
    }
    return balances;
  }

  private async authenticate(): Promise<string> {
    const { accessToken } = await upstreamJson({
      upstream: 'swyftx',
      url: `${this.baseUrl}/auth/refresh/`,
      method: 'POST',
      body: { apiKey: this.env.SWYFTX_API_KEY },
      timeoutMs: this.env.UPSTREAM_TIMEOUT_MS,
      schema: swyftxAuthSchema,
      failure: 'auth',
    });
    return accessToken;
  }

  private get baseUrl() {
    return this.env.SWYFTX_API_URL.replace(/\/+$/, '');
  }
}
