import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { loadEnv } from './config/env';

async function bootstrap() {
  // fail before Nest starts when the brokerage key is missing
  const env = loadEnv();

  const origins = env.CORS_ORIGINS.split(',')
    .map((o) => o.trim())
    .filter(Boolean);

  const app = await NestFactory.create(AppModule, {
    cors: {
      origin: origins.includes('*') ? true : origins,
      credentials: true,
      methods: ['GET'],
    },
  });
  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
  app.enableShutdownHooks();

  await app.listen(env.PORT);
}

bootstrap().catch((e: unknown) => {
  new Logger('Bootstrap').error(e instanceof Error ? e.message : String(e));
  process.exitCode = 1;
});
