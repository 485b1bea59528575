import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { DatabaseModule } from './database/database.module';
import { RedisModule } from './redis/redis.module';
import { SalesModule } from './sales/sales.module';
import { HealthModule } from './health/health.module';
import { dbConfig } from './database/database.config';
import { appConfig, cacheConfig, redisConfig } from './config/app.config';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig, dbConfig, redisConfig, cacheConfig],
      envFilePath: ['.env', `.env.${process.env.NODE_ENV}`],
    }),
    EventEmitterModule.forRoot(),
    DatabaseModule,
    RedisModule,
    SalesModule,
    HealthModule,
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
