import { DateRangeResolver } from '../date-range.resolver';
import {
  IncompleteRangeException,
  InvalidDateFormatException,
  InvalidRangeException,
} from '../../common/exception/sales.exception';

describe('DateRangeResolver', () => {
  const resolver = new DateRangeResolver();

  it('sem parâmetros consulta o dia atual em UTC-3', () => {
    const result = resolver.resolve({}, new Date('2024-03-16T02:00:00Z'));

    expect(result).toEqual({
      window: {
        startDate: '2024-03-15',
        endDate: '2024-03-15',
        start: '2024-03-15 00:00:00.000000',
        end: '2024-03-15 23:59:59.999999',
      },
      isSingleDay: true,
      referenceDate: '2024-03-15',
    });
  });

  it('com data consulta o dia inteiro informado', () => {
    const result = resolver.resolve({ data: '2024-03-15' });

    expect(result.isSingleDay).toBe(true);
    expect(result.window.start).toEqual('2024-03-15 00:00:00.000000');
    expect(result.window.end).toEqual('2024-03-15 23:59:59.999999');
    expect(result).toMatchObject({ referenceDate: '2024-03-15' });
  });

  it('data em formato inválido lança InvalidDateFormatException', () => {
    expect(() => resolver.resolve({ data: '2024-13-40' })).toThrow(InvalidDateFormatException);
    expect(() => resolver.resolve({ data: '2024-13-40' })).toThrow(
      "Data inválida: '2024-13-40'. Use o formato YYYY-MM-DD",
    );
  });

  it('com data_inicio e data_fim consulta o período', () => {
    const result = resolver.resolve({ data_inicio: '2024-03-01', data_fim: '2024-03-10' });

    expect(result).toEqual({
      window: {
        startDate: '2024-03-01',
        endDate: '2024-03-10',
        start: '2024-03-01 00:00:00.000000',
        end: '2024-03-10 23:59:59.999999',
      },
      isSingleDay: false,
    });
  });

  it('período de um dia não é tratado como dia único', () => {
    const result = resolver.resolve({ data_inicio: '2024-03-15', data_fim: '2024-03-15' });

    expect(result.isSingleDay).toBe(false);
    expect(result.window).toEqual(resolver.resolve({ data: '2024-03-15' }).window);
  });

  it('data_inicio maior que data_fim lança InvalidRangeException', () => {
    expect(() => resolver.resolve({ data_inicio: '2024-03-10', data_fim: '2024-03-01' })).toThrow(
      new InvalidRangeException('2024-03-10', '2024-03-01'),
    );
  });

  it('só data_inicio lança IncompleteRangeException', () => {
    expect(() => resolver.resolve({ data_inicio: '2024-03-01' })).toThrow(IncompleteRangeException);
  });

  it('só data_fim lança IncompleteRangeException', () => {
    expect(() => resolver.resolve({ data_fim: '2024-03-01' })).toThrow(IncompleteRangeException);
  });

  it('data_inicio ou data_fim inválidos lançam InvalidDateFormatException', () => {
    expect(() => resolver.resolve({ data_inicio: '2024-02-30', data_fim: '2024-03-01' })).toThrow(
      InvalidDateFormatException,
    );
    expect(() => resolver.resolve({ data_inicio: '2024-03-01', data_fim: '01/03/2024' })).toThrow(
      InvalidDateFormatException,
    );
  });

  it('período informado junto com data prevalece sobre data', () => {
    const result = resolver.resolve({ data: '2024-01-05', data_inicio: '2024-03-01', data_fim: '2024-03-31' });

    expect(result.isSingleDay).toBe(false);
    expect(result.window.startDate).toEqual('2024-03-01');
  });
});
