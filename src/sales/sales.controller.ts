import { Controller, Delete, Get, Query, UseGuards } from '@nestjs/common';
import { ApiHeader, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { SecretKeyGuard } from '../common/guard/secret-key.guard';
import { GetVendasRequest } from './dto/request/get-vendas-request';
import { VendasResponse } from './dto/response/vendas-response';
import { ClearCacheResponse } from './dto/response/clear-cache-response';
import { SalesFacade } from './sales.facade';

@ApiTags('Vendas')
@ApiHeader({ name: 'X-Secret-Key', required: true, description: 'Chave de autenticação' })
@UseGuards(SecretKeyGuard)
@Controller()
export class SalesController {
  constructor(private readonly salesFacade: SalesFacade) {}

  @ApiOperation({
    summary: 'Vendas por loja',
    description:
      'Vendas finalizadas agrupadas por loja no dia (data), no período (data_inicio + data_fim) ou no dia atual. ' +
      'Resultados ficam 5 minutos em cache no Redis.',
  })
  @ApiResponse({
    status: 200,
    description: 'Consulta realizada',
    type: VendasResponse,
  })
  @ApiResponse({ status: 400, description: 'Data ou período inválido' })
  @ApiResponse({ status: 401, description: 'Secret Key inválida' })
  @Get('vendas-realtime')
  async getVendas(@Query() query: GetVendasRequest): Promise<VendasResponse> {
    return this.salesFacade.getVendas(query);
  }

  @ApiOperation({
    summary: 'Limpar cache',
    description: 'Remove todas as janelas em cache, forçando nova consulta ao banco.',
  })
  @ApiResponse({
    status: 200,
    description: 'Cache limpo',
    type: ClearCacheResponse,
  })
  @Delete('cache')
  async clearCache(): Promise<ClearCacheResponse> {
    return this.salesFacade.clearCache();
  }
}
