/**
 * The node-redis commands this package sends. A connected
 * `createClient()` client satisfies it; replies are narrowed where used.
 */
export interface RedisCommands {
  set(key: string, value: string, options: { NX: true; PX: number }): Promise<unknown>;
  get(key: string): Promise<unknown>;
  del(key: string): Promise<unknown>;
  pExpire(key: string, ms: number): Promise<unknown>;
  lPush(key: string, element: string): Promise<unknown>;
  /** Blocks the connection for up to `timeout` seconds */
  brPop(key: string, timeout: number): Promise<unknown>;
}
