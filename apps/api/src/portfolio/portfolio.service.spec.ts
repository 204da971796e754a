import { Test, TestingModule } from '@nestjs/testing';
import { Decimal } from '@holdings/valuation';
import { APP_ENV, loadEnv } from '../config/env';
import { AssetsService } from '../assets/assets.service';
import {
  ASSET_DESCRIPTORS,
  ASSET_DESCRIPTORS_TOKEN,
} from '../assets/asset-descriptors';
import { SwyftxClient } from '../swyftx/swyftx.client';
import { CoinGeckoClient } from '../prices/coingecko.client';
import { PricesService } from '../prices/prices.service';
import { CLOCK } from '../cache/clock';
import { MemoryResultCache, RESULT_CACHE } from '../cache/result-cache';
import { ResultCacheService } from '../cache/result-cache.service';
import { UpstreamAuthError } from '../common/upstream.errors';
import { PortfolioService } from './portfolio.service';
import type { PortfolioSummary } from './portfolio.types';

const D = Decimal;

describe('PortfolioService', () => {
  let service: PortfolioService;
  let store: MemoryResultCache<PortfolioSummary>;

  const clock = { ms: Date.parse('2026-03-01T10:00:00.000Z'), now() { return this.ms; } };
  const mockSwyftx = { fetchBalances: jest.fn() };
  const mockCoinGecko = { simplePrice: jest.fn() };

  beforeEach(async () => {
    clock.ms = Date.parse('2026-03-01T10:00:00.000Z');
    store = new MemoryResultCache<PortfolioSummary>(clock, 60);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PortfolioService,
        PricesService,
        AssetsService,
        ResultCacheService,
        { provide: ASSET_DESCRIPTORS_TOKEN, useValue: ASSET_DESCRIPTORS },
        { provide: APP_ENV, useValue: loadEnv({ SWYFTX_API_KEY: 'test-api-key' }) },
        { provide: CLOCK, useValue: clock },
        { provide: RESULT_CACHE, useValue: store },
        { provide: SwyftxClient, useValue: mockSwyftx },
        { provide: CoinGeckoClient, useValue: mockCoinGecko },
      ],
    }).compile();

    service = module.get<PortfolioService>(PortfolioService);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  function holdBtcAndAud() {
    mockSwyftx.fetchBalances.mockResolvedValue([
      { assetId: 3, available: new D('0.5') },
      { assetId: 1, available: new D('100') },
    ]);
    mockCoinGecko.simplePrice.mockResolvedValue({
      bitcoin: { aud: 90000, aud_24h_change: 2 },
    });
  }

  it('builds the summary for BTC + AUD', async () => {
    holdBtcAndAud();

    const summary = await service.getPortfolio();

    expect(summary.total_primary_value).toBe(45100);
    expect(summary.total_secondary_value).toBe(29315);
    expect(summary.total_change_24h).toBeCloseTo(1.9955654, 6);
    expect(summary.last_updated).toBe('2026-03-01T10:00:00.000Z');
    expect(summary.assets).toEqual([
      {
        asset_id: 3,
        code: 'BTC',
        name: 'Bitcoin',
        balance: 0.5,
        last_price: 90000,
        value_primary: 45000,
        value_secondary: 29250,
        change_24h: 2,
        color: '#F7931A',
      },
      {
        asset_id: 1,
        code: 'AUD',
        name: 'Australian Dollar',
        balance: 100,
        last_price: 1,
        value_primary: 100,
        value_secondary: 65,
        change_24h: 0,
        color: '#00843D',
      },
    ]);
    expect(mockCoinGecko.simplePrice).toHaveBeenCalledWith(['bitcoin'], 'aud');
  });

  it('returns an empty portfolio when nothing is held', async () => {
    mockSwyftx.fetchBalances.mockResolvedValue([]);

    const summary = await service.getPortfolio();

    expect(summary).toEqual({
      total_primary_value: 0,
      total_secondary_value: 0,
      total_change_24h: 0,
      assets: [],
      last_updated: '2026-03-01T10:00:00.000Z',
    });
    expect(mockCoinGecko.simplePrice).not.toHaveBeenCalled();
  });

  it('serves identical data from cache within the TTL', async () => {
    holdBtcAndAud();

    const first = await service.getPortfolio();
    clock.ms += 30_000;
    const second = await service.getPortfolio();

    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
    expect(mockSwyftx.fetchBalances).toHaveBeenCalledTimes(1);
    expect(mockCoinGecko.simplePrice).toHaveBeenCalledTimes(1);
  });

  it('runs one new upstream cycle after the TTL', async () => {
    holdBtcAndAud();

    await service.getPortfolio();
    clock.ms += 60_000;
    const refreshed = await service.getPortfolio();

    expect(mockSwyftx.fetchBalances).toHaveBeenCalledTimes(2);
    expect(mockCoinGecko.simplePrice).toHaveBeenCalledTimes(2);
    expect(refreshed.last_updated).toBe('2026-03-01T10:01:00.000Z');
  });

  it('surfaces a 401 login as UpstreamAuthError and leaves the cache alone', async () => {
    mockSwyftx.fetchBalances.mockRejectedValue(
      new UpstreamAuthError('swyftx', 'swyftx error: 401', 401),
    );
    const setSpy = jest.spyOn(store, 'set');

    const err = await service.getPortfolio().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(UpstreamAuthError);
    expect(err).toMatchObject({ upstreamStatus: 401 });
    expect(mockCoinGecko.simplePrice).not.toHaveBeenCalled();
    expect(setSpy).not.toHaveBeenCalled();
  });
});
