import { ApiProperty } from '@nestjs/swagger';
import { SalesAggregate } from '../../domain/sales-aggregate';

export class VendaItemDto {
  @ApiProperty({ description: 'Código da loja', example: '001' })
  codigo!: string;

  @ApiProperty({ description: 'Nome da loja', example: 'Loja Centro' })
  loja!: string;

  @ApiProperty({ description: 'Região da loja', example: 'Sul', nullable: true, type: String })
  regiao!: string | null;

  @ApiProperty({ description: 'Pacote dos itens vendidos', example: '12', nullable: true, type: String })
  pacote_id!: string | null;

  @ApiProperty({ description: 'Quantidade de vendas distintas', example: 42 })
  qtd_vendas!: number;

  @ApiProperty({ description: 'Quantidade total de itens', example: 130 })
  total_quantidade!: number;

  @ApiProperty({ description: 'Faturamento total', example: 5230.9 })
  venda_total!: number;

  @ApiProperty({ description: 'Custo total', example: 2615.45 })
  custo_total!: number;

  @ApiProperty({ description: 'CMV em % (custo / venda × 100)', example: 50 })
  cmv!: number;

  @ApiProperty({
    description: 'Última sincronização da loja',
    example: '2024-03-15 10:42:00',
    nullable: true,
    type: String,
  })
  ultima_sincronizacao!: string | null;

  static from(data: SalesAggregate): VendaItemDto {
    const item = new VendaItemDto();

    item.codigo = data.codigo;
    item.loja = data.loja;
    item.regiao = data.regiao;
    item.pacote_id = data.pacote_id;
    item.qtd_vendas = data.qtd_vendas;
    item.total_quantidade = data.total_quantidade;
    item.venda_total = data.venda_total;
    item.custo_total = data.custo_total;
    item.cmv = data.cmv;
    item.ultima_sincronizacao = data.ultima_sincronizacao;

    return item;
  }
}
