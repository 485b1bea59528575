import { calculateCmv, isSalesSnapshot, toNumber, toSalesAggregate } from '../domain/sales-aggregate';
import { lojaCentro, lojaShopping } from './fakes/sales-fixtures';

describe('SalesAggregate', () => {
  describe('toSalesAggregate', () => {
    it('converte a linha crua do banco, incluindo números vindos como string', () => {
      const result = toSalesAggregate({
        codigo: 1,
        loja: 'Loja Centro',
        regiao: 'Sul',
        pacote_id: 7,
        qtd_vendas: '40',
        total_quantidade: '120.5',
        venda_total: 5000.456,
        custo_total: '2000.111',
        ultima_sincronizacao: '2024-03-15 10:40:00',
      });

      expect(result).toEqual({
        codigo: '1',
        loja: 'Loja Centro',
        regiao: 'Sul',
        pacote_id: '7',
        qtd_vendas: 40,
        total_quantidade: 120.5,
        venda_total: 5000.46,
        custo_total: 2000.11,
        cmv: 40,
        ultima_sincronizacao: '2024-03-15 10:40:00',
      });
    });

    it('valores nulos viram zero ou string vazia', () => {
      const result = toSalesAggregate({
        codigo: null,
        loja: null,
        regiao: null,
        pacote_id: null,
        qtd_vendas: null,
        total_quantidade: null,
        venda_total: null,
        custo_total: null,
        ultima_sincronizacao: null,
      });

      expect(result).toEqual({
        codigo: '',
        loja: '',
        regiao: null,
        pacote_id: null,
        qtd_vendas: 0,
        total_quantidade: 0,
        venda_total: 0,
        custo_total: 0,
        cmv: 0,
        ultima_sincronizacao: null,
      });
    });

    it('venda_total zero resulta em cmv zero mesmo com custo', () => {
      const result = toSalesAggregate({
        codigo: '003',
        loja: 'Loja Sem Venda',
        regiao: null,
        pacote_id: null,
        qtd_vendas: '1',
        total_quantidade: '2',
        venda_total: 0,
        custo_total: 35,
        ultima_sincronizacao: null,
      });

      expect(result.cmv).toEqual(0);
      expect(result.custo_total).toEqual(35);
    });
  });

  describe('calculateCmv', () => {
    it('calcula custo sobre venda em percentual com duas casas', () => {
      expect(calculateCmv(1, 3)).toEqual(33.33);
      expect(calculateCmv(50, 200)).toEqual(25);
    });

    it('nunca divide por zero', () => {
      expect(calculateCmv(10, 0)).toEqual(0);
      expect(calculateCmv(0, 0)).toEqual(0);
    });
  });

  describe('toNumber', () => {
    it('texto não numérico vira zero', () => {
      expect(toNumber('abc')).toEqual(0);
      expect(toNumber(undefined)).toEqual(0);
      expect(toNumber('12.5')).toEqual(12.5);
    });
  });

  describe('isSalesSnapshot', () => {
    const snapshot = {
      data_consulta: '2024-03-15T10:45:00.000-03:00',
      periodo_inicio: '2024-03-15 00:00:00',
      periodo_fim: '2024-03-15 23:59:59',
      total_registros: 1,
      vendas: [lojaCentro],
    };

    it('aceita o formato gravado no cache', () => {
      expect(isSalesSnapshot(snapshot)).toBe(true);
      expect(isSalesSnapshot({ ...snapshot, vendas: [lojaCentro, lojaShopping] })).toBe(true);
    });

    it('rejeita região, pacote ou sincronização que não sejam texto ou null', () => {
      expect(isSalesSnapshot({ ...snapshot, vendas: [{ ...lojaCentro, regiao: 5 }] })).toBe(false);
      expect(isSalesSnapshot({ ...snapshot, vendas: [{ ...lojaCentro, pacote_id: 7 }] })).toBe(false);
      expect(isSalesSnapshot({ ...snapshot, vendas: [{ ...lojaCentro, ultima_sincronizacao: undefined }] })).toBe(false);
    });

    it('rejeita valores com formato diferente', () => {
      expect(isSalesSnapshot(null)).toBe(false);
      expect(isSalesSnapshot([snapshot])).toBe(false);
      expect(isSalesSnapshot({ ...snapshot, vendas: 'x' })).toBe(false);
      expect(isSalesSnapshot({ ...snapshot, vendas: [{ codigo: '001' }] })).toBe(false);
      expect(isSalesSnapshot({ ...snapshot, total_registros: '1' })).toBe(false);
    });
  });
});
