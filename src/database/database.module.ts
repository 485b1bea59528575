import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { DatabaseConfig } from './database.config';

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      useFactory: (configService: ConfigService) => ({
        type: 'postgres',
        ...configService.getOrThrow<DatabaseConfig>('database'),
        synchronize: false,
        // o schema de vendas pertence ao ERP; consultas são SQL puro via QueryRunner
        entities: [],
        // conexão aberta na primeira consulta: banco fora do ar no boot não impede a subida da API
        manualInitialization: true,
      }),
      inject: [ConfigService],
    }),
  ],
  controllers: [],
  providers: [],
})
export class DatabaseModule {}
