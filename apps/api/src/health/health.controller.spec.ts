import { loadEnv } from '../config/env';
import type { RedisService } from '../redis/redis.service';
import { AppController } from '../app.controller';
import { HealthController } from './health.controller';

describe('HealthController', () => {
  const env = loadEnv({ SWYFTX_API_KEY: 'test-api-key', APP_VERSION: '2.3.4' });

  it('reports healthy with a timestamp', () => {
    const redis = { enabled: false } as unknown as RedisService;
    const res = new HealthController(env, redis).health();

    expect(res.status).toBe('healthy');
    expect(res.cache).toBe('memory');
    expect(Number.isNaN(Date.parse(res.timestamp))).toBe(false);
  });

  it('pings redis for readiness only when it is the cache', async () => {
    const ping = jest.fn().mockResolvedValue('PONG');
    const redis = { enabled: true, redis: { ping } } as unknown as RedisService;

    await expect(new HealthController(env, redis).readyz()).resolves.toEqual({
      status: 'ready',
    });
    expect(ping).toHaveBeenCalledTimes(1);
  });

  it('serves the service banner at the root', () => {
    expect(new AppController(env).root()).toEqual({
      message: 'Swyftx Portfolio API',
      status: 'operational',
      version: '2.3.4',
    });
  });
});
