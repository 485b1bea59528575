import { Module, Global } from '@nestjs/common';
import { RedisModule as IoRedisModule } from '@nestjs-modules/ioredis';
import { ConfigService } from '@nestjs/config';
import { RedisConfig } from '../config/app.config';
import { RedisCacheService } from './redis-cache.service';
import { redisClientOptions } from './redis.options';
import { CACHE_STORE } from './cache-store.interface';

@Global()
@Module({
  imports: [
    IoRedisModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        return {
          type: 'single',
          options: redisClientOptions(configService.getOrThrow<RedisConfig>('redis')),
        };
      },
    }),
  ],
  providers: [
    {
      provide: CACHE_STORE,
      useClass: RedisCacheService,
    },
  ],
  exports: [CACHE_STORE],
})
export class RedisModule {}
