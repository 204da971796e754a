import { Controller, Get, Inject } from '@nestjs/common';
import { APP_ENV, type Env } from './config/env';

@Controller()
export class AppController {
  constructor(@Inject(APP_ENV) private readonly env: Env) {}

  @Get('/')
  root() {
    return {
      message: 'Swyftx Portfolio API',
      status: 'operational',
      version: this.env.APP_VERSION,
    };
  }
}
