import { CanActivate, ExecutionContext, Injectable, InternalServerErrorException, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request } from 'express';
import { AppConfig } from '../../config/app.config';

export const SECRET_KEY_HEADER = 'x-secret-key';

/**
 * Autenticação por chave compartilhada no header X-Secret-Key
 */
@Injectable()
export class SecretKeyGuard implements CanActivate {
  private readonly secretKey: string;

  constructor(configService: ConfigService) {
    this.secretKey = configService.getOrThrow<AppConfig>('app').secretKey;
  }

  canActivate(context: ExecutionContext): boolean {
    if (!this.secretKey) {
      throw new InternalServerErrorException('SECRET_KEY não configurada no servidor');
    }

    const request = context.switchToHttp().getRequest<Request>();
    const provided = request.headers[SECRET_KEY_HEADER];

    if (provided !== this.secretKey) {
      throw new UnauthorizedException('Secret Key inválida');
    }

    return true;
  }
}
