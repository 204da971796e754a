import { Module } from '@nestjs/common';
import { AssetsModule } from '../assets/assets.module';
import { CoinGeckoClient } from './coingecko.client';
import { PricesService } from './prices.service';

@Module({
  imports: [AssetsModule],
  providers: [CoinGeckoClient, PricesService],
  exports: [CoinGeckoClient, PricesService],
})
export class PricesModule {}
