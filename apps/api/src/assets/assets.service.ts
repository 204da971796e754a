import { Inject, Injectable } from '@nestjs/common';
import type { AssetDescriptor, AssetId } from '@holdings/valuation';
import { ASSET_DESCRIPTORS_TOKEN } from './asset-descriptors';

/** Static asset registry, built once at startup. */
@Injectable()
export class AssetsService {
  private readonly byId: ReadonlyMap<AssetId, AssetDescriptor>;
  private readonly byCode = new Map<string, AssetDescriptor>();
  private readonly byCoingeckoId = new Map<string, AssetDescriptor>();

  constructor(
    @Inject(ASSET_DESCRIPTORS_TOKEN)
    descriptors: readonly AssetDescriptor[],
  ) {
    const byId = new Map<AssetId, AssetDescriptor>();
    for (const d of descriptors) {
      const frozen = Object.freeze({ ...d });
      byId.set(d.id, frozen);
      this.byCode.set(d.code.toUpperCase(), frozen);
      if (d.coingeckoId) this.byCoingeckoId.set(d.coingeckoId, frozen);
    }
    this.byId = byId;
  }

  all(): ReadonlyMap<AssetId, AssetDescriptor> {
    return this.byId;
  }

  get(id: AssetId) {
    return this.byId.get(id);
  }

  findByCode(code: string) {
    return this.byCode.get(code.trim().toUpperCase());
  }

  findByCoingeckoId(coingeckoId: string) {
    return this.byCoingeckoId.get(coingeckoId);
  }
}
