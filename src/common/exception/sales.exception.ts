import { BadRequestException, InternalServerErrorException } from '@nestjs/common';

export class InvalidDateFormatException extends BadRequestException {
  constructor(value: string) {
    super(`Data inválida: '${value}'. Use o formato YYYY-MM-DD`);
    this.name = 'InvalidDateFormatException';
  }
}

export class IncompleteRangeException extends BadRequestException {
  constructor(message: string = 'Informe data_inicio e data_fim juntos para consultar um período') {
    super(message);
    this.name = 'IncompleteRangeException';
  }
}

export class InvalidRangeException extends BadRequestException {
  constructor(start: string, end: string) {
    super(`data_inicio (${start}) não pode ser maior que data_fim (${end})`);
    this.name = 'InvalidRangeException';
  }
}

export class StoreUnavailableException extends InternalServerErrorException {
  constructor(detail: string) {
    super(`Erro de conexão com o banco: ${detail}`);
    this.name = 'StoreUnavailableException';
  }
}

export class QueryFailedException extends InternalServerErrorException {
  constructor(detail: string) {
    super(`Erro ao consultar vendas: ${detail}`);
    this.name = 'QueryFailedException';
  }
}
