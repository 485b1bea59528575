import { Controller, Get, Inject } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { CACHE_STORE, ICacheStore } from '../redis/cache-store.interface';
import { nowInBusinessTimezone } from '../sales/domain/timestamp-window';

@ApiTags('Status')
@Controller()
export class HealthController {
  constructor(@Inject(CACHE_STORE) private readonly cacheStore: ICacheStore) {}

  @ApiOperation({ summary: 'Status da API' })
  @Get()
  root(): { message: string; status: string } {
    return { message: 'API Vendas Real Time', status: 'online' };
  }

  @ApiOperation({ summary: 'Health check', description: 'Inclui o estado da conexão com o Redis.' })
  @Get('health')
  async health(): Promise<{ status: string; timestamp: string; redis: 'connected' | 'disconnected' }> {
    const connected = await this.cacheStore.ping();

    return {
      status: 'healthy',
      timestamp: nowInBusinessTimezone(),
      redis: connected ? 'connected' : 'disconnected',
    };
  }
}
