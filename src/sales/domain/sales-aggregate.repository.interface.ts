import { SalesAggregate } from './sales-aggregate';
import { TimestampWindow } from './timestamp-window';

export const SALES_AGGREGATE_REPOSITORY = Symbol('SALES_AGGREGATE_REPOSITORY');

export interface ISalesAggregateRepository {
  /**
   * Vendas finalizadas da janela agrupadas por loja/região/pacote, maior faturamento primeiro.
   * Lança `StoreUnavailableException` (conexão) ou `QueryFailedException` (execução).
   */
  aggregate(window: TimestampWindow): Promise<SalesAggregate[]>;
}
