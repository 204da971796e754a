import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { ConfigModule } from './config/config.module';
import { HealthModule } from './health/health.module';
import { PortfolioModule } from './portfolio/portfolio.module';
import { MarketModule } from './market/market.module';

@Module({
  imports: [ConfigModule, HealthModule, PortfolioModule, MarketModule],
  controllers: [AppController],
})
export class AppModule {}
