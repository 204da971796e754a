import { Module } from '@nestjs/common';
import { ASSET_DESCRIPTORS, ASSET_DESCRIPTORS_TOKEN } from './asset-descriptors';
import { AssetsService } from './assets.service';

@Module({
  providers: [
    { provide: ASSET_DESCRIPTORS_TOKEN, useValue: ASSET_DESCRIPTORS },
    AssetsService,
  ],
  exports: [AssetsService],
})
export class AssetsModule {}
