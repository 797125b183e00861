import { Inject, Injectable } from '@nestjs/common';
import Redis from 'ioredis';
import { REDIS_CLIENT, type KeyValueStore, type PutOptions } from './key-value-store.interface';

@Injectable()
export class RedisKeyValueStore implements KeyValueStore {
  constructor(
    @Inject(REDIS_CLIENT)
    private readonly redis: Redis,
  ) {}

  async get(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  async put(key: string, value: string, options: PutOptions = {}): Promise<void> {
    if (options.ttlSeconds !== undefined) {
      await this.redis.set(key, value, 'EX', options.ttlSeconds);
      return;
    }
    await this.redis.set(key, value);
  }
}
