import { Injectable } from '@nestjs/common';
import * as dayjs from 'dayjs';
import {
  IncompleteRangeException,
  InvalidDateFormatException,
  InvalidRangeException,
} from '../common/exception/sales.exception';
import { dayWindow, isValidDate, rangeWindow, TimestampWindow, todayInBusinessTimezone } from './domain/timestamp-window';

export interface DateRangeParams {
  data?: string;
  data_inicio?: string;
  data_fim?: string;
}

export type ResolvedRange =
  | {
      window: TimestampWindow;
      isSingleDay: true;
      /** dia consultado (YYYY-MM-DD), usado para aquecer o mês */
      referenceDate: string;
    }
  | {
      window: TimestampWindow;
      isSingleDay: false;
    };

/**
 * Único ponto que transforma parâmetros de data em janela. Puro: só lê o relógio quando nenhuma data é informada.
 */
@Injectable()
export class DateRangeResolver {
  resolve(params: DateRangeParams, now: Date = new Date()): ResolvedRange {
    const { data, data_inicio: dataInicio, data_fim: dataFim } = params;
    const hasStart = dataInicio !== undefined;
    const hasEnd = dataFim !== undefined;

    if (hasStart !== hasEnd) {
      throw new IncompleteRangeException();
    }

    // período explícito tem precedência sobre `data`
    if (dataInicio !== undefined && dataFim !== undefined) {
      this.assertDate(dataInicio);
      this.assertDate(dataFim);

      if (dayjs(dataInicio).isAfter(dayjs(dataFim))) {
        throw new InvalidRangeException(dataInicio, dataFim);
      }

      return { window: rangeWindow(dataInicio, dataFim), isSingleDay: false };
    }

    if (data !== undefined) {
      this.assertDate(data);
      return { window: dayWindow(data), isSingleDay: true, referenceDate: data };
    }

    const today = todayInBusinessTimezone(now);
    return { window: dayWindow(today), isSingleDay: true, referenceDate: today };
  }

  private assertDate(value: string): void {
    if (!isValidDate(value)) {
      throw new InvalidDateFormatException(value);
    }
  }
}
