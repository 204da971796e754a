import { Controller, Get, Param, Query } from '@nestjs/common';
import { MarketDataQueryDto } from './dto/market-data-query.dto';
import { MarketService } from './market.service';

@Controller('api')
export class MarketController {
  constructor(private readonly marketService: MarketService) {}

  @Get('market-data')
  marketData(@Query() query: MarketDataQueryDto) {
    return this.marketService.marketData(query.limit);
  }

  @Get('asset/:code')
  asset(@Param('code') code: string) {
    return this.marketService.assetDetail(code);
  }
}
