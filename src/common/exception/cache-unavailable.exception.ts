/**
 * Falha de comunicação com o Redis. Nunca chega ao cliente HTTP:
 * leituras viram cache miss e escritas são descartadas.
 */
export class CacheUnavailableException extends Error {
  constructor(operation: string, cause: unknown) {
    super(`Redis indisponível durante ${operation}: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = 'CacheUnavailableException';
  }
}
