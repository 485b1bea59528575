import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2, OnEvent } from '@nestjs/event-emitter';
import { monthWindow } from './domain/timestamp-window';
import { WindowCacheService } from './window-cache.service';
import { errorMessage } from '../common/util/error-message';

export const SALES_DAY_QUERIED = 'sales.day-queried';

export interface SalesDayQueriedEvent {
  referenceDate: string;
}

export type PrewarmOutcome = 'populated' | 'already-cached' | 'failed';

@Injectable()
export class MonthPrewarmService {
  private readonly logger = new Logger(MonthPrewarmService.name);

  constructor(
    private readonly windowCacheService: WindowCacheService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  /**
   * Agenda o aquecimento do mês da data consultada e retorna na hora.
   * O listener é assíncrono: roda depois que a resposta da requisição já saiu,
   * e não há como cancelá-lo nem retorno para quem disparou.
   */
  trigger(referenceDate: string): void {
    const event: SalesDayQueriedEvent = { referenceDate };
    this.eventEmitter.emit(SALES_DAY_QUERIED, event);
  }

  @OnEvent(SALES_DAY_QUERIED, { async: true })
  async handleDayQueried(event: SalesDayQueriedEvent): Promise<void> {
    await this.prewarm(event.referenceDate);
  }

  /**
   * Popula o cache do mês inteiro se ainda não existir.
   * Sem deduplicação entre requisições: dois dias do mesmo mês consultados ao mesmo tempo
   * podem disparar a consulta mensal duas vezes.
   */
  async prewarm(referenceDate: string): Promise<PrewarmOutcome> {
    try {
      const window = monthWindow(referenceDate);

      if (await this.windowCacheService.isCached(window)) {
        this.logger.debug(`Mês ${window.startDate} a ${window.endDate} já está em cache`);
        return 'already-cached';
      }

      const result = await this.windowCacheService.resolve(window);
      this.logger.log(`Cache do mês ${window.startDate} a ${window.endDate} aquecido (${result.total_registros} registros)`);
      return 'populated';
    } catch (error) {
      // falha aqui nunca afeta a requisição que disparou
      this.logger.error(`Falha ao aquecer cache do mês de ${referenceDate}: ${errorMessage(error)}`);
      return 'failed';
    }
  }
}
