export const WINDOW_CACHE_OPTIONS = Symbol('WINDOW_CACHE_OPTIONS');

export interface WindowCacheOptions {
  /** prefixo de todas as chaves de janela; também delimita o que `DELETE /cache` remove */
  prefix: string;
  ttlSeconds: number;
}
