import { Injectable, Logger } from '@nestjs/common';
import type {
  AssetDescriptor,
  AssetId,
  ResolvedPrice,
} from '@holdings/valuation';
import { AssetsService } from '../assets/assets.service';
import { CoinGeckoClient } from './coingecko.client';

export const PRIMARY_CURRENCY = 'aud';

@Injectable()
export class PricesService {
  private readonly logger = new Logger(PricesService.name);

  constructor(
    private readonly assets: AssetsService,
    private readonly coingecko: CoinGeckoClient,
  ) {}

  /**
   * Prices every held asset. Fiat comes from the registry; everything else
   * is looked up in one batched CoinGecko call. Assets that cannot be priced
   * are left out of the result.
   */
  async resolve(
    heldIds: ReadonlySet<AssetId>,
  ): Promise<Map<AssetId, ResolvedPrice>> {
    const prices = new Map<AssetId, ResolvedPrice>();
    const external: Array<{ id: AssetId; coingeckoId: string }> = [];

    for (const id of heldIds) {
      const asset = this.assets.get(id);
      if (!asset) {
        this.logger.warn(`no descriptor for asset ${id}`);
        continue;
      }
      if (asset.fixedPrice != null) {
        prices.set(id, {
          assetId: id,
          price: asset.fixedPrice,
          change24h: 0,
          source: 'fixed',
        });
      } else if (asset.coingeckoId) {
        external.push({ id, coingeckoId: asset.coingeckoId });
      }
    }

    if (!external.length) return prices;

    const ids = [...new Set(external.map((a) => a.coingeckoId))];
    const data = await this.coingecko.simplePrice(ids, PRIMARY_CURRENCY);

    for (const a of external) {
      const quote = data[a.coingeckoId];
      const price = quote?.[PRIMARY_CURRENCY];

      if (!price) continue;

      prices.set(a.id, {
        assetId: a.id,
        price,
        change24h: quote?.[`${PRIMARY_CURRENCY}_24h_change`] ?? 0,
        source: 'coingecko',
      });
    }

    return prices;
  }

  async quote(asset: AssetDescriptor): Promise<ResolvedPrice | null> {
    const prices = await this.resolve(new Set([asset.id]));
    return prices.get(asset.id) ?? null;
  }
}
