import { ApiProperty } from '@nestjs/swagger';

export class ClearCacheResponse {
  @ApiProperty({ example: 'Cache limpo com sucesso' })
  message!: string;

  @ApiProperty({ description: 'Chaves removidas', example: 3 })
  removidos!: number;

  static of(message: string, removidos: number): ClearCacheResponse {
    const response = new ClearCacheResponse();
    response.message = message;
    response.removidos = removidos;
    return response;
  }
}
