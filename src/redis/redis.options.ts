import { RedisOptions } from 'ioredis';
import { RedisConfig } from '../config/app.config';

/** Intervalo máximo entre tentativas de reconexão */
export const MAX_RECONNECT_DELAY_MS = 3000;

export function redisClientOptions(redis: RedisConfig): RedisOptions {
  return {
    host: redis.host,
    port: redis.port,
    password: redis.password,
    db: redis.db,
    // reconecta sem limite de tentativas; o intervalo cresce 100ms por tentativa até 3s
    retryStrategy: (times: number) => Math.min(times * 100, MAX_RECONNECT_DELAY_MS),
    // desconectado, o comando é rejeitado na hora e a requisição segue para o banco
    enableOfflineQueue: false,
    maxRetriesPerRequest: 1,
    connectTimeout: 2000,
    enableReadyCheck: true,
    lazyConnect: false,
  };
}
