import { ExecutionContext, InternalServerErrorException, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { SecretKeyGuard } from '../secret-key.guard';

function contextWithHeaders(headers: Record<string, string>): ExecutionContext {
  return new ExecutionContextHost([{ headers }]);
}

function guardWithSecret(secretKey: string): SecretKeyGuard {
  return new SecretKeyGuard(new ConfigService({ app: { port: 8083, secretKey } }));
}

describe('SecretKeyGuard', () => {
  it('libera com a chave correta', () => {
    const guard = guardWithSecret('test-secret');

    expect(guard.canActivate(contextWithHeaders({ 'x-secret-key': 'test-secret' }))).toBe(true);
  });

  it('chave errada lança UnauthorizedException', () => {
    const guard = guardWithSecret('test-secret');

    expect(() => guard.canActivate(contextWithHeaders({ 'x-secret-key': 'outra' }))).toThrow(
      new UnauthorizedException('Secret Key inválida'),
    );
  });

  it('sem header lança UnauthorizedException', () => {
    const guard = guardWithSecret('test-secret');

    expect(() => guard.canActivate(contextWithHeaders({}))).toThrow(UnauthorizedException);
  });

  it('sem SECRET_KEY no servidor lança InternalServerErrorException', () => {
    const guard = guardWithSecret('');

    expect(() => guard.canActivate(contextWithHeaders({ 'x-secret-key': '' }))).toThrow(
      new InternalServerErrorException('SECRET_KEY não configurada no servidor'),
    );
  });
});
