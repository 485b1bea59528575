export const CACHE_STORE = Symbol('CACHE_STORE');

/**
 * Armazenamento chave/valor com expiração por chave.
 * Não conhece janelas nem formatos: vê apenas chaves, valores serializados e TTL.
 * Falhas de conexão são lançadas como `CacheUnavailableException`; quem chama decide como degradar.
 */
export interface ICacheStore {
  get(key: string): Promise<string | null>;

  setex(key: string, ttlSeconds: number, value: string): Promise<void>;

  exists(key: string): Promise<boolean>;

  /**
   * Remove todas as chaves `${prefix}:*`
   * @returns quantidade de chaves removidas
   */
  deleteMatching(prefix: string): Promise<number>;

  ping(): Promise<boolean>;
}
