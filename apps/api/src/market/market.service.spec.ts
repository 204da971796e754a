import { NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { APP_ENV, loadEnv } from '../config/env';
import { AssetsService } from '../assets/assets.service';
import {
  ASSET_DESCRIPTORS,
  ASSET_DESCRIPTORS_TOKEN,
} from '../assets/asset-descriptors';
import { CoinGeckoClient } from '../prices/coingecko.client';
import { PricesService } from '../prices/prices.service';
import { MarketService } from './market.service';

describe('MarketService', () => {
  let service: MarketService;

  const mockCoinGecko = {
    simplePrice: jest.fn(),
    markets: jest.fn(),
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        MarketService,
        PricesService,
        AssetsService,
        { provide: ASSET_DESCRIPTORS_TOKEN, useValue: ASSET_DESCRIPTORS },
        { provide: APP_ENV, useValue: loadEnv({ SWYFTX_API_KEY: 'test-api-key' }) },
        { provide: CoinGeckoClient, useValue: mockCoinGecko },
      ],
    }).compile();

    service = module.get<MarketService>(MarketService);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('marketData', () => {
    it('maps coins, links known assets and sorts by volume', async () => {
      mockCoinGecko.markets.mockResolvedValue([
        {
          id: 'ethereum',
          symbol: 'eth',
          name: 'Ethereum',
          current_price: 4000,
          total_volume: 500,
          price_change_percentage_24h: -1,
          price_change_percentage_7d_in_currency: 4,
        },
        {
          id: 'some-new-coin',
          symbol: 'snc',
          name: 'Some New Coin',
          current_price: null,
          total_volume: 900,
          price_change_percentage_24h: null,
        },
        {
          id: 'bitcoin',
          symbol: 'btc',
          name: 'Bitcoin',
          current_price: 90000,
          total_volume: 100,
          price_change_percentage_24h: 2,
          price_change_percentage_7d_in_currency: null,
        },
      ]);

      const rows = await service.marketData(2);

      expect(mockCoinGecko.markets).toHaveBeenCalledWith('aud', 2);
      expect(rows).toEqual([
        {
          asset_id: null,
          code: 'SNC',
          name: 'Some New Coin',
          last_price: 0,
          change_24h: 0,
          change_7d: null,
          volume_24h: 900,
        },
        {
          asset_id: 5,
          code: 'ETH',
          name: 'Ethereum',
          last_price: 4000,
          change_24h: -1,
          change_7d: 4,
          volume_24h: 500,
        },
      ]);
    });

    it('defaults to the top 50', async () => {
      mockCoinGecko.markets.mockResolvedValue([]);

      await service.marketData();

      expect(mockCoinGecko.markets).toHaveBeenCalledWith('aud', 50);
    });
  });

  describe('assetDetail', () => {
    it('finds assets case-insensitively and reads the coin market row', async () => {
      mockCoinGecko.markets.mockResolvedValue([
        {
          id: 'solana',
          symbol: 'sol',
          name: 'Solana',
          current_price: 200,
          total_volume: 123456,
          high_24h: 210,
          low_24h: 190,
          price_change_percentage_24h: 5,
          price_change_percentage_7d_in_currency: -3.5,
        },
      ]);

      const detail = await service.assetDetail('sol');

      expect(mockCoinGecko.markets).toHaveBeenCalledWith('aud', 1, ['solana']);
      expect(mockCoinGecko.simplePrice).not.toHaveBeenCalled();
      expect(detail).toEqual({
        asset_id: 130,
        code: 'SOL',
        name: 'Solana',
        type: 'crypto',
        current_price_primary: 200,
        current_price_secondary: 130,
        change_24h: 5,
        change_7d: -3.5,
        high_24h: 210,
        low_24h: 190,
        volume_24h: 123456,
        price_source: 'coingecko',
      });
    });

    it('reports fiat with its fixed price and no market fields', async () => {
      const detail = await service.assetDetail('AUD');

      expect(detail).toEqual({
        asset_id: 1,
        code: 'AUD',
        name: 'Australian Dollar',
        type: 'fiat',
        current_price_primary: 1,
        current_price_secondary: 0.65,
        change_24h: 0,
        change_7d: null,
        high_24h: null,
        low_24h: null,
        volume_24h: null,
        price_source: 'fixed',
      });
      expect(mockCoinGecko.simplePrice).not.toHaveBeenCalled();
      expect(mockCoinGecko.markets).not.toHaveBeenCalled();
    });

    it('returns nulls when the coin cannot be priced', async () => {
      mockCoinGecko.markets.mockResolvedValue([]);

      const detail = await service.assetDetail('BTC');

      expect(detail).toEqual({
        asset_id: 3,
        code: 'BTC',
        name: 'Bitcoin',
        type: 'crypto',
        current_price_primary: null,
        current_price_secondary: null,
        change_24h: null,
        change_7d: null,
        high_24h: null,
        low_24h: null,
        volume_24h: null,
        price_source: null,
      });
    });

    it('throws NotFound for an unknown code', async () => {
      await expect(service.assetDetail('NOPE')).rejects.toBeInstanceOf(
        NotFoundException,
      );
    });
  });
});
