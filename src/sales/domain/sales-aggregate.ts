/**
 * Uma linha por loja + região + pacote
 */
export interface SalesAggregate {
  codigo: string;
  loja: string;
  regiao: string | null;
  pacote_id: string | null;
  qtd_vendas: number;
  total_quantidade: number;
  venda_total: number;
  custo_total: number;
  /** custo / venda × 100; 0 quando não há venda */
  cmv: number;
  ultima_sincronizacao: string | null;
}

type RawValue = string | number | null | undefined;

/**
 * Linha crua do driver pg: COUNT/SUM de numeric chegam como string, LEFT JOIN sem par chega null
 */
export interface RawSalesRow {
  codigo: RawValue;
  loja: RawValue;
  regiao: RawValue;
  pacote_id: RawValue;
  qtd_vendas: RawValue;
  total_quantidade: RawValue;
  venda_total: RawValue;
  custo_total: RawValue;
  ultima_sincronizacao: RawValue;
}

export type ResultSource = 'cache' | 'database';

/**
 * Valor guardado no cache. `fonte` não é persistida: é decidida a cada leitura.
 */
export interface SalesSnapshot {
  data_consulta: string;
  periodo_inicio: string;
  periodo_fim: string;
  total_registros: number;
  vendas: SalesAggregate[];
}

export interface CachedResult extends SalesSnapshot {
  fonte: ResultSource;
}

export function toNumber(value: RawValue): number {
  if (value === null || value === undefined) {
    return 0;
  }

  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : 0;
}

export function roundMoney(value: number): number {
  return Math.round(value * 100) / 100;
}

export function calculateCmv(custoTotal: number, vendaTotal: number): number {
  if (vendaTotal <= 0) {
    return 0;
  }

  return roundMoney((custoTotal / vendaTotal) * 100);
}

function toNullableString(value: RawValue): string | null {
  return value === null || value === undefined ? null : String(value);
}

export function toSalesAggregate(row: RawSalesRow): SalesAggregate {
  const vendaTotal = toNumber(row.venda_total);
  const custoTotal = toNumber(row.custo_total);

  return {
    codigo: String(row.codigo ?? ''),
    loja: String(row.loja ?? ''),
    regiao: toNullableString(row.regiao),
    pacote_id: toNullableString(row.pacote_id),
    qtd_vendas: toNumber(row.qtd_vendas),
    total_quantidade: toNumber(row.total_quantidade),
    venda_total: roundMoney(vendaTotal),
    custo_total: roundMoney(custoTotal),
    cmv: calculateCmv(custoTotal, vendaTotal),
    ultima_sincronizacao: toNullableString(row.ultima_sincronizacao),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNullableString(value: unknown): value is string | null {
  return value === null || typeof value === 'string';
}

function isSalesAggregate(value: unknown): value is SalesAggregate {
  return (
    isRecord(value) &&
    typeof value.codigo === 'string' &&
    typeof value.loja === 'string' &&
    isNullableString(value.regiao) &&
    isNullableString(value.pacote_id) &&
    typeof value.qtd_vendas === 'number' &&
    typeof value.total_quantidade === 'number' &&
    typeof value.venda_total === 'number' &&
    typeof value.custo_total === 'number' &&
    typeof value.cmv === 'number' &&
    isNullableString(value.ultima_sincronizacao)
  );
}

/**
 * Confere o formato de um valor lido do cache antes de devolvê-lo como está
 */
export function isSalesSnapshot(value: unknown): value is SalesSnapshot {
  return (
    isRecord(value) &&
    typeof value.data_consulta === 'string' &&
    typeof value.periodo_inicio === 'string' &&
    typeof value.periodo_fim === 'string' &&
    typeof value.total_registros === 'number' &&
    Array.isArray(value.vendas) &&
    value.vendas.every(isSalesAggregate)
  );
}
