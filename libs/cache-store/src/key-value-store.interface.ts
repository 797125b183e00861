export interface PutOptions {
  /** Entry reads as absent once this many seconds have passed. */
  ttlSeconds?: number;
}

export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  /** Replaces the whole value; there are no partial updates. */
  put(key: string, value: string, options?: PutOptions): Promise<void>;
}

export const KEY_VALUE_STORE = Symbol('KEY_VALUE_STORE');
export const REDIS_CLIENT = 'REDIS_CLIENT';
