export interface AppConfig {
  port: number;
  /** Chave compartilhada exigida no header X-Secret-Key. Vazia quando não configurada. */
  secretKey: string;
}

export interface RedisConfig {
  host: string;
  port: number;
  password?: string;
  db: number;
}

export const appConfig = (): { app: AppConfig } => ({
  app: {
    port: Number(process.env.PORT) || 8083,
    secretKey: process.env.SECRET_KEY || '',
  },
});

export const redisConfig = (): { redis: RedisConfig } => ({
  redis: {
    host: process.env.REDIS_HOST || 'localhost',
    port: Number(process.env.REDIS_PORT) || 6379,
    password: process.env.REDIS_PASSWORD || undefined,
    db: Number(process.env.REDIS_DB) || 0,
  },
});

export interface CacheConfig {
  prefix: string;
  ttlSeconds: number;
}

export const CACHE_KEY_PREFIX = 'vendas_realtime';
export const CACHE_TTL_SECONDS = 300; // 5 minutos

export const cacheConfig = (): { cache: CacheConfig } => ({
  cache: {
    prefix: CACHE_KEY_PREFIX,
    ttlSeconds: CACHE_TTL_SECONDS,
  },
});
