import { Inject, Injectable, Logger } from '@nestjs/common';
import { CACHE_STORE, ICacheStore } from '../redis/cache-store.interface';
import {
  ISalesAggregateRepository,
  SALES_AGGREGATE_REPOSITORY,
} from './domain/sales-aggregate.repository.interface';
import { CachedResult, isSalesSnapshot, SalesSnapshot } from './domain/sales-aggregate';
import { buildCacheKey, formatBoundary, nowInBusinessTimezone, TimestampWindow } from './domain/timestamp-window';
import { WINDOW_CACHE_OPTIONS, WindowCacheOptions } from './window-cache.options';
import { errorMessage } from '../common/util/error-message';

/**
 * Read-through por janela de datas.
 *
 * O cache é best-effort: leitura com falha ou valor corrompido vira miss, escrita com falha é só logada.
 * Erros do banco sobem sem fallback.
 *
 * Sem lock de população: duas requisições simultâneas para a mesma janela sem cache
 * consultam o banco duas vezes e gravam a mesma chave duas vezes (vence a última).
 */
@Injectable()
export class WindowCacheService {
  private readonly logger = new Logger(WindowCacheService.name);

  constructor(
    @Inject(SALES_AGGREGATE_REPOSITORY)
    private readonly salesAggregateRepository: ISalesAggregateRepository,
    @Inject(CACHE_STORE)
    private readonly cacheStore: ICacheStore,
    @Inject(WINDOW_CACHE_OPTIONS)
    private readonly options: WindowCacheOptions,
  ) {}

  keyFor(window: TimestampWindow): string {
    return buildCacheKey(this.options.prefix, window);
  }

  async resolve(window: TimestampWindow): Promise<CachedResult> {
    const key = this.keyFor(window);

    // primeiro o cache
    const cached = await this.read(key);
    if (cached) {
      return { ...cached, fonte: 'cache' };
    }

    const vendas = await this.salesAggregateRepository.aggregate(window);

    const snapshot: SalesSnapshot = {
      data_consulta: nowInBusinessTimezone(),
      periodo_inicio: formatBoundary(window.start),
      periodo_fim: formatBoundary(window.end),
      total_registros: vendas.length,
      vendas,
    };

    await this.write(key, snapshot);

    return { ...snapshot, fonte: 'database' };
  }

  /**
   * Falha do Redis é propagada: quem chama decide se vale seguir sem saber
   */
  async isCached(window: TimestampWindow): Promise<boolean> {
    return this.cacheStore.exists(this.keyFor(window));
  }

  /**
   * Remove todas as janelas em cache
   * @returns quantidade de chaves removidas
   */
  async clear(): Promise<number> {
    const removed = await this.cacheStore.deleteMatching(this.options.prefix);
    this.logger.log(`Cache limpo: ${removed} chave(s) removida(s)`);
    return removed;
  }

  private async read(key: string): Promise<SalesSnapshot | null> {
    let raw: string | null;
    try {
      raw = await this.cacheStore.get(key);
    } catch (error) {
      this.logger.warn(`Erro ao buscar cache ${key}: ${errorMessage(error)}`);
      return null;
    }

    if (raw === null) {
      return null;
    }

    try {
      const parsed: unknown = JSON.parse(raw);
      if (isSalesSnapshot(parsed)) {
        return parsed;
      }
      this.logger.warn(`Valor em cache com formato inesperado em ${key}; consultando o banco`);
    } catch (error) {
      this.logger.warn(`Valor em cache ilegível em ${key}: ${errorMessage(error)}`);
    }

    return null;
  }

  private async write(key: string, snapshot: SalesSnapshot): Promise<void> {
    try {
      await this.cacheStore.setex(key, this.options.ttlSeconds, JSON.stringify(snapshot));
    } catch (error) {
      this.logger.warn(`Erro ao salvar cache ${key}: ${errorMessage(error)}`);
    }
  }
}
