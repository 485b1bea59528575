import { Injectable } from '@nestjs/common';
import { DateRangeResolver } from './date-range.resolver';
import { WindowCacheService } from './window-cache.service';
import { MonthPrewarmService } from './month-prewarm.service';
import { GetVendasRequest } from './dto/request/get-vendas-request';
import { VendasResponse } from './dto/response/vendas-response';
import { ClearCacheResponse } from './dto/response/clear-cache-response';
import { CacheUnavailableException } from '../common/exception/cache-unavailable.exception';

@Injectable()
export class SalesFacade {
  constructor(
    private readonly dateRangeResolver: DateRangeResolver,
    private readonly windowCacheService: WindowCacheService,
    private readonly monthPrewarmService: MonthPrewarmService,
  ) {}

  async getVendas(query: GetVendasRequest): Promise<VendasResponse> {
    const range = this.dateRangeResolver.resolve(query);

    const result = await this.windowCacheService.resolve(range.window);

    // consulta de um dia só costuma ser seguida pela do mês: aquece em segundo plano
    if (range.isSingleDay) {
      this.monthPrewarmService.trigger(range.referenceDate);
    }

    return VendasResponse.from(result);
  }

  async clearCache(): Promise<ClearCacheResponse> {
    try {
      const removed = await this.windowCacheService.clear();
      return ClearCacheResponse.of('Cache limpo com sucesso', removed);
    } catch (error) {
      if (error instanceof CacheUnavailableException) {
        return ClearCacheResponse.of('Redis não disponível, nada a limpar', 0);
      }
      throw error;
    }
  }
}
