import { Injectable } from '@nestjs/common';
import { InjectRedis } from '@nestjs-modules/ioredis';
import Redis from 'ioredis';
import { CacheUnavailableException } from '../common/exception/cache-unavailable.exception';
import { ICacheStore } from './cache-store.interface';

@Injectable()
export class RedisCacheService implements ICacheStore {
  constructor(@InjectRedis() private readonly redis: Redis) {}

  /**
   * Valor serializado ou null quando a chave não existe (ou expirou)
   */
  async get(key: string): Promise<string | null> {
    try {
      return await this.redis.get(key);
    } catch (error) {
      throw new CacheUnavailableException('get', error);
    }
  }

  /**
   * Salva o valor com TTL em segundos
   */
  async setex(key: string, ttlSeconds: number, value: string): Promise<void> {
    try {
      await this.redis.setex(key, ttlSeconds, value);
    } catch (error) {
      throw new CacheUnavailableException('setex', error);
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      const result = await this.redis.exists(key);
      return result === 1;
    } catch (error) {
      throw new CacheUnavailableException('exists', error);
    }
  }

  /**
   * Remove por padrão `${prefix}:*`
   */
  async deleteMatching(prefix: string): Promise<number> {
    try {
      const keys = await this.redis.keys(`${prefix}:*`);

      if (keys.length === 0) {
        return 0;
      }

      return await this.redis.del(...keys);
    } catch (error) {
      throw new CacheUnavailableException('deleteMatching', error);
    }
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.redis.ping()) === 'PONG';
    } catch {
      return false;
    }
  }
}
