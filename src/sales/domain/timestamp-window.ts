import * as dayjs from 'dayjs';
import * as utc from 'dayjs/plugin/utc';
import * as customParseFormat from 'dayjs/plugin/customParseFormat';

dayjs.extend(utc);
dayjs.extend(customParseFormat);

/** Fuso civil fixo do negócio (UTC-3). "Hoje" e "este mês" seguem o dia comercial, não o dia UTC. */
export const BUSINESS_UTC_OFFSET_MINUTES = -180;

export const DATE_FORMAT = 'YYYY-MM-DD';

const START_OF_DAY = '00:00:00.000000';
const END_OF_DAY = '23:59:59.999999';

/**
 * Janela fechada [start, end] em horário civil UTC-3, sem normalização para UTC.
 * start/end no formato `YYYY-MM-DD HH:mm:ss.SSSSSS`, comparáveis direto com `itemvenda.datahora`.
 */
export interface TimestampWindow {
  startDate: string;
  endDate: string;
  start: string;
  end: string;
}

export function isValidDate(value: string): boolean {
  return dayjs(value, DATE_FORMAT, true).isValid();
}

export function todayInBusinessTimezone(now: Date = new Date()): string {
  return dayjs(now).utcOffset(BUSINESS_UTC_OFFSET_MINUTES).format(DATE_FORMAT);
}

export function nowInBusinessTimezone(now: Date = new Date()): string {
  return dayjs(now).utcOffset(BUSINESS_UTC_OFFSET_MINUTES).format('YYYY-MM-DDTHH:mm:ss.SSSZ');
}

export function rangeWindow(startDate: string, endDate: string): TimestampWindow {
  return {
    startDate,
    endDate,
    start: `${startDate} ${START_OF_DAY}`,
    end: `${endDate} ${END_OF_DAY}`,
  };
}

export function dayWindow(date: string): TimestampWindow {
  return rangeWindow(date, date);
}

/**
 * Mês civil que contém a data (dias reais do mês, inclusive fevereiro bissexto)
 */
export function monthWindow(referenceDate: string): TimestampWindow {
  const reference = dayjs(referenceDate, DATE_FORMAT, true);

  return rangeWindow(reference.startOf('month').format(DATE_FORMAT), reference.endOf('month').format(DATE_FORMAT));
}

/** `YYYY-MM-DD HH:mm:ss` do limite; os microssegundos do fim do dia não entram. */
export function formatBoundary(timestamp: string): string {
  return timestamp.substring(0, 19);
}

/**
 * Chave canônica da janela. Depende só dos dois limites, não do caminho que gerou a janela:
 * `?data=2024-03-15` e `?data_inicio=2024-03-15&data_fim=2024-03-15` caem na mesma entrada.
 */
export function buildCacheKey(prefix: string, window: TimestampWindow): string {
  return `${prefix}:${formatBoundary(window.start)}:${formatBoundary(window.end)}`;
}
