import { Module } from '@nestjs/common';
import { AssetsModule } from '../assets/assets.module';
import { PricesModule } from '../prices/prices.module';
import { MarketController } from './market.controller';
import { MarketService } from './market.service';

@Module({
  imports: [AssetsModule, PricesModule],
  controllers: [MarketController],
  providers: [MarketService],
})
export class MarketModule {}
