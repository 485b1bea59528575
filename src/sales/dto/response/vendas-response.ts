import { ApiProperty } from '@nestjs/swagger';
import { CachedResult, ResultSource } from '../../domain/sales-aggregate';
import { VendaItemDto } from './venda-item.dto';

export class VendasResponse {
  @ApiProperty({ description: 'Momento em que o banco foi consultado', example: '2024-03-15T10:45:00.000-03:00' })
  data_consulta!: string;

  @ApiProperty({ example: '2024-03-15 00:00:00' })
  periodo_inicio!: string;

  @ApiProperty({ example: '2024-03-15 23:59:59' })
  periodo_fim!: string;

  @ApiProperty({ example: 12 })
  total_registros!: number;

  @ApiProperty({ description: 'Origem do resultado', enum: ['cache', 'database'] })
  fonte!: ResultSource;

  @ApiProperty({ type: [VendaItemDto] })
  vendas!: VendaItemDto[];

  static from(result: CachedResult): VendasResponse {
    const response = new VendasResponse();

    response.data_consulta = result.data_consulta;
    response.periodo_inicio = result.periodo_inicio;
    response.periodo_fim = result.periodo_fim;
    response.total_registros = result.total_registros;
    response.fonte = result.fonte;
    response.vendas = result.vendas.map((item) => VendaItemDto.from(item));

    return response;
  }
}
