import { Module } from '@nestjs/common';
import { SwyftxClient } from './swyftx.client';

@Module({
  providers: [SwyftxClient],
  exports: [SwyftxClient],
})
export class SwyftxModule {}
