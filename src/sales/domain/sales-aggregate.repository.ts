import { Injectable, Logger } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource, ObjectLiteral, QueryRunner, SelectQueryBuilder } from 'typeorm';
import { QueryFailedException, StoreUnavailableException } from '../../common/exception/sales.exception';
import { ISalesAggregateRepository } from './sales-aggregate.repository.interface';
import { RawSalesRow, SalesAggregate, toSalesAggregate } from './sales-aggregate';
import { TimestampWindow } from './timestamp-window';
import { errorMessage } from '../../common/util/error-message';

/** itemvenda.status de venda finalizada */
export const FINALIZED_STATUS = 'F';

@Injectable()
export class SalesAggregateRepository implements ISalesAggregateRepository {
  private readonly logger = new Logger(SalesAggregateRepository.name);
  private initializing: Promise<DataSource> | null = null;

  constructor(@InjectDataSource() private readonly dataSource: DataSource) {}

  async aggregate(window: TimestampWindow): Promise<SalesAggregate[]> {
    await this.ensureInitialized();

    // uma conexão do pool por consulta, devolvida em qualquer saída
    const queryRunner = this.dataSource.createQueryRunner();

    try {
      await this.connect(queryRunner);

      let rows: RawSalesRow[];
      try {
        rows = await this.buildQuery(queryRunner, window).getRawMany<RawSalesRow>();
      } catch (error) {
        this.logger.error(`Falha na agregação de ${window.start} a ${window.end}: ${errorMessage(error)}`);
        throw new QueryFailedException(errorMessage(error));
      }

      return rows.map((row) => toSalesAggregate(row));
    } finally {
      await queryRunner.release();
    }
  }

  private buildQuery(queryRunner: QueryRunner, window: TimestampWindow): SelectQueryBuilder<ObjectLiteral> {
    return this.dataSource
      .createQueryBuilder(queryRunner)
      .select('u.codigo', 'codigo')
      .addSelect('u.nome', 'loja')
      .addSelect('r.nome', 'regiao')
      .addSelect('iv.pacoteid', 'pacote_id')
      .addSelect('COUNT(DISTINCT iv.vendaid)', 'qtd_vendas')
      .addSelect('SUM(iv.quantidade)', 'total_quantidade')
      .addSelect('SUM(iv.valortotal::double precision)', 'venda_total')
      .addSelect('SUM(iv.custototal::double precision)', 'custo_total')
      .addSelect('MAX(ms.ultima_sincronizacao)::text', 'ultima_sincronizacao')
      .from('itemvenda', 'iv')
      .leftJoin('unidadenegocio', 'u', 'u.id = iv.unidadenegocioid')
      .leftJoin('regiao', 'r', 'r.id = u.regiaoid')
      .leftJoin(
        (subQuery) =>
          subQuery
            .select('m.unidadenegocioid', 'unidadenegocioid')
            .addSelect('MAX(m.datahora)', 'ultima_sincronizacao')
            .from('monitoramento_sincronizacao', 'm')
            .groupBy('m.unidadenegocioid'),
        'ms',
        'ms.unidadenegocioid = u.id',
      )
      .where('iv.datahora >= :start', { start: window.start })
      .andWhere('iv.datahora <= :end', { end: window.end })
      .andWhere('iv.status = :status', { status: FINALIZED_STATUS })
      .groupBy('u.codigo')
      .addGroupBy('u.nome')
      .addGroupBy('r.nome')
      .addGroupBy('iv.pacoteid')
      .orderBy('venda_total', 'DESC');
  }

  private async connect(queryRunner: QueryRunner): Promise<void> {
    try {
      await queryRunner.connect();
    } catch (error) {
      this.logger.error(`Falha ao obter conexão do pool: ${errorMessage(error)}`);
      throw new StoreUnavailableException(errorMessage(error));
    }
  }

  /**
   * Inicializa o DataSource na primeira consulta; chamadas concorrentes aguardam a mesma tentativa
   */
  private async ensureInitialized(): Promise<void> {
    if (this.dataSource.isInitialized) {
      return;
    }

    if (!this.initializing) {
      this.initializing = this.dataSource.initialize().finally(() => {
        this.initializing = null;
      });
    }

    try {
      await this.initializing;
    } catch (error) {
      this.logger.error(`Falha ao conectar no banco: ${errorMessage(error)}`);
      throw new StoreUnavailableException(errorMessage(error));
    }
  }
}
