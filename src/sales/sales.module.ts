import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SalesController } from './sales.controller';
import { SalesFacade } from './sales.facade';
import { DateRangeResolver } from './date-range.resolver';
import { WindowCacheService } from './window-cache.service';
import { MonthPrewarmService } from './month-prewarm.service';
import { SalesAggregateRepository } from './domain/sales-aggregate.repository';
import { SALES_AGGREGATE_REPOSITORY } from './domain/sales-aggregate.repository.interface';
import { WINDOW_CACHE_OPTIONS, WindowCacheOptions } from './window-cache.options';
import { CacheConfig } from '../config/app.config';

@Module({
  controllers: [SalesController],
  providers: [
    {
      provide: SALES_AGGREGATE_REPOSITORY,
      useClass: SalesAggregateRepository,
    },
    {
      provide: WINDOW_CACHE_OPTIONS,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): WindowCacheOptions => {
        const cache = configService.getOrThrow<CacheConfig>('cache');
        return { prefix: cache.prefix, ttlSeconds: cache.ttlSeconds };
      },
    },
    DateRangeResolver,
    WindowCacheService,
    MonthPrewarmService,
    SalesFacade,
  ],
})
export class SalesModule {}
