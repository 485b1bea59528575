import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsOptional, IsString } from 'class-validator';

export class GetVendasRequest {
  @ApiPropertyOptional({
    description: 'Dia consultado (YYYY-MM-DD). Sem parâmetros, consulta o dia atual (UTC-3)',
    example: '2024-03-15',
  })
  @IsOptional()
  @IsString()
  data?: string;

  @ApiPropertyOptional({
    description: 'Início do período (YYYY-MM-DD). Exige data_fim',
    example: '2024-03-01',
  })
  @IsOptional()
  @IsString()
  data_inicio?: string;

  @ApiPropertyOptional({
    description: 'Fim do período (YYYY-MM-DD). Exige data_inicio',
    example: '2024-03-31',
  })
  @IsOptional()
  @IsString()
  data_fim?: string;
}
