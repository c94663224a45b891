import type { Redis } from 'ioredis';

/**
 * In-process stand-in for the subset of the ioredis client the Redis backend
 * uses. Every command runs synchronously, so a MULTI batch is atomic here the
 * way it is on a real server. Expiry follows `Date.now()`.
 */

type Entry =
  | { type: 'string'; value: string; expiresAt: number | null }
  | { type: 'hash'; value: Map<string, string>; expiresAt: number | null }
  | { type: 'set'; value: Set<string>; expiresAt: number | null };

type BatchResult = [Error | null, unknown];

function globToRegExp(pattern: string): RegExp {
  const escaped = pattern.replace(/[.+^${}()|[\]\\]/g, '\\$&').replace(/\*/g, '.*').replace(/\?/g, '.');
  return new RegExp(`^${escaped}$`);
}

export class FakeRedisServer {
  private data = new Map<string, Entry>();
  /** Commands executed, for assertions on round trips. */
  readonly log: string[] = [];

  private entry(key: string): Entry | undefined {
    const entry = this.data.get(key);
    if (entry && entry.expiresAt !== null && entry.expiresAt <= Date.now()) {
      this.data.delete(key);
      return undefined;
    }
    return entry;
  }

  private hash(key: string, create: boolean): Map<string, string> | undefined {
    const entry = this.entry(key);
    if (entry) {
      if (entry.type !== 'hash') throw new Error('WRONGTYPE Operation against a key holding the wrong kind of value');
      return entry.value;
    }
    if (!create) return undefined;
    const value = new Map<string, string>();
    this.data.set(key, { type: 'hash', value, expiresAt: null });
    return value;
  }

  keys(): string[] {
    return [...this.data.keys()].filter((key) => this.entry(key) !== undefined);
  }

  ttl(key: string): number | null {
    const entry = this.entry(key);
    if (!entry || entry.expiresAt === null) return null;
    return Math.round((entry.expiresAt - Date.now()) / 1000);
  }

  hgetall(key: string): Record<string, string> {
    return Object.fromEntries(this.hash(key, false) ?? []);
  }

  // ── Commands ──────────────────────────────────────────────────────────

  hset(key: string, ...args: (string | Record<string, string>)[]): number {
    this.log.push('hset');
    const pairs: [string, string][] = [];
    const [first] = args;
    if (args.length === 1 && typeof first === 'object') {
      pairs.push(...Object.entries(first));
    } else {
      for (let i = 0; i < args.length; i += 2) {
        pairs.push([String(args[i]), String(args[i + 1])]);
      }
    }

    const hash = this.hash(key, true);
    let created = 0;
    for (const [field, value] of pairs) {
      if (!hash?.has(field)) created++;
      hash?.set(field, value);
    }
    return created;
  }

  hsetnx(key: string, field: string, value: string): number {
    this.log.push('hsetnx');
    const hash = this.hash(key, true);
    if (hash?.has(field)) return 0;
    hash?.set(field, value);
    return 1;
  }

  hget(key: string, field: string): string | null {
    this.log.push('hget');
    return this.hash(key, false)?.get(field) ?? null;
  }

  hmget(key: string, ...fields: string[]): (string | null)[] {
    this.log.push('hmget');
    const hash = this.hash(key, false);
    return fields.map((field) => hash?.get(field) ?? null);
  }

  del(...keys: string[]): number {
    this.log.push('del');
    let deleted = 0;
    for (const key of keys) {
      if (this.entry(key)) deleted++;
      this.data.delete(key);
    }
    return deleted;
  }

  expire(key: string, seconds: number): number {
    this.log.push('expire');
    const entry = this.entry(key);
    if (!entry) return 0;
    entry.expiresAt = Date.now() + seconds * 1000;
    return 1;
  }

  set(key: string, value: string, ...options: (string | number)[]): 'OK' | null {
    this.log.push('set');
    let expiresAt: number | null = null;
    let onlyIfAbsent = false;
    for (let i = 0; i < options.length; i++) {
      const option = String(options[i]).toUpperCase();
      if (option === 'EX') {
        expiresAt = Date.now() + Number(options[i + 1]) * 1000;
        i++;
      } else if (option === 'NX') {
        onlyIfAbsent = true;
      }
    }

    if (onlyIfAbsent && this.entry(key)) return null;
    this.data.set(key, { type: 'string', value, expiresAt });
    return 'OK';
  }

  get(key: string): string | null {
    this.log.push('get');
    const entry = this.entry(key);
    return entry?.type === 'string' ? entry.value : null;
  }

  sadd(key: string, ...members: string[]): number {
    this.log.push('sadd');
    let entry = this.entry(key);
    if (!entry) {
      entry = { type: 'set', value: new Set<string>(), expiresAt: null };
      this.data.set(key, entry);
    }
    if (entry.type !== 'set') throw new Error('WRONGTYPE Operation against a key holding the wrong kind of value');
    let added = 0;
    for (const member of members) {
      if (!entry.value.has(member)) added++;
      entry.value.add(member);
    }
    return added;
  }

  smembers(key: string): string[] {
    this.log.push('smembers');
    const entry = this.entry(key);
    return entry?.type === 'set' ? [...entry.value] : [];
  }

  /** One page holding every match; the cursor always comes back as '0'. */
  scan(_cursor: string, ...options: (string | number)[]): [string, string[]] {
    this.log.push('scan');
    const matchAt = options.findIndex((option) => String(option).toUpperCase() === 'MATCH');
    const pattern = matchAt >= 0 ? String(options[matchAt + 1]) : '*';
    const regexp = globToRegExp(pattern);
    return ['0', this.keys().filter((key) => regexp.test(key))];
  }
}

type CommandName = 'hset' | 'hsetnx' | 'hget' | 'hmget' | 'del' | 'expire' | 'set' | 'sadd';

/** Queued commands of a MULTI or pipeline, run back to back on `exec()`. */
export class FakeBatch {
  private queued: (() => unknown)[] = [];

  constructor(private readonly server: FakeRedisServer) {}

  private queue(name: CommandName, run: () => unknown): this {
    this.queued.push(() => {
      this.server.log.push(`batch:${name}`);
      return run();
    });
    return this;
  }

  hset(key: string, ...args: (string | Record<string, string>)[]): this {
    return this.queue('hset', () => this.server.hset(key, ...args));
  }

  hsetnx(key: string, field: string, value: string): this {
    return this.queue('hsetnx', () => this.server.hsetnx(key, field, value));
  }

  hget(key: string, field: string): this {
    return this.queue('hget', () => this.server.hget(key, field));
  }

  hmget(key: string, ...fields: string[]): this {
    return this.queue('hmget', () => this.server.hmget(key, ...fields));
  }

  del(...keys: string[]): this {
    return this.queue('del', () => this.server.del(...keys));
  }

  expire(key: string, seconds: number): this {
    return this.queue('expire', () => this.server.expire(key, seconds));
  }

  set(key: string, value: string, ...options: (string | number)[]): this {
    return this.queue('set', () => this.server.set(key, value, ...options));
  }

  sadd(key: string, ...members: string[]): this {
    return this.queue('sadd', () => this.server.sadd(key, ...members));
  }

  async exec(): Promise<BatchResult[]> {
    const results: BatchResult[] = [];
    for (const run of this.queued) {
      try {
        results.push([null, run()]);
      } catch (err) {
        results.push([err instanceof Error ? err : new Error(String(err)), null]);
      }
    }
    this.queued = [];
    return results;
  }
}

/** Client facade: async commands over a shared `FakeRedisServer`. */
export class FakeRedisClient {
  connected = false;
  failPing = false;

  constructor(readonly server = new FakeRedisServer()) {}

  multi(): FakeBatch {
    return new FakeBatch(this.server);
  }

  pipeline(): FakeBatch {
    return new FakeBatch(this.server);
  }

  async hset(key: string, ...args: (string | Record<string, string>)[]): Promise<number> {
    return this.server.hset(key, ...args);
  }

  async hget(key: string, field: string): Promise<string | null> {
    return this.server.hget(key, field);
  }

  async hmget(key: string, ...fields: string[]): Promise<(string | null)[]> {
    return this.server.hmget(key, ...fields);
  }

  async del(...keys: string[]): Promise<number> {
    return this.server.del(...keys);
  }

  async set(key: string, value: string, ...options: (string | number)[]): Promise<'OK' | null> {
    return this.server.set(key, value, ...options);
  }

  async get(key: string): Promise<string | null> {
    return this.server.get(key);
  }

  async smembers(key: string): Promise<string[]> {
    return this.server.smembers(key);
  }

  async scan(cursor: string, ...options: (string | number)[]): Promise<[string, string[]]> {
    return this.server.scan(cursor, ...options);
  }

  async ping(): Promise<string> {
    if (this.failPing) throw new Error('Connection is closed.');
    return 'PONG';
  }

  async connect(): Promise<void> {
    this.connected = true;
  }

  async quit(): Promise<'OK'> {
    this.connected = false;
    return 'OK';
  }

  on(): this {
    return this;
  }
}

/** A fake client typed as the real one, for code that takes an ioredis `Redis`. */
export function createFakeRedis(server = new FakeRedisServer()): { client: FakeRedisClient; redis: Redis } {
  const client = new FakeRedisClient(server);
  return { client, redis: client as unknown as Redis };
}
