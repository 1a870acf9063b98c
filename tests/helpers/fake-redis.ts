import type { RedisListClient } from "../../src/infrastructure/storage/redis-client.js";

/**
 * In-process stand-in for the Redis list commands the history store uses.
 * Expiry follows the `now` field (epoch ms) instead of the wall clock.
 */
export class FakeRedisClient implements RedisListClient {
  readonly lists = new Map<string, string[]>();
  readonly expiries = new Map<string, number>();
  readonly calls: string[] = [];
  now = 0;
  down = false;
  disconnected = false;

  private command(name: string): void {
    this.calls.push(name);
    if (this.down) {
      throw Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:6379"), { code: "ECONNREFUSED" });
    }
    for (const [key, at] of this.expiries) {
      if (at <= this.now) {
        this.lists.delete(key);
        this.expiries.delete(key);
      }
    }
  }

  private range(length: number, start: number, stop: number): [number, number] {
    const from = Math.max(start < 0 ? length + start : start, 0);
    const to = Math.min(stop < 0 ? length + stop : stop, length - 1);
    return [from, to];
  }

  private remove(key: string): boolean {
    this.expiries.delete(key);
    return this.lists.delete(key);
  }

  async rpush(key: string, ...values: string[]): Promise<number> {
    this.command("rpush");
    const list = this.lists.get(key) ?? [];
    list.push(...values);
    this.lists.set(key, list);
    return list.length;
  }

  async ltrim(key: string, start: number, stop: number): Promise<string> {
    this.command("ltrim");
    const list = this.lists.get(key);
    if (list) {
      const [from, to] = this.range(list.length, start, stop);
      if (from > to) {
        this.remove(key);
      } else {
        this.lists.set(key, list.slice(from, to + 1));
      }
    }
    return "OK";
  }

  async expire(key: string, seconds: number): Promise<number> {
    this.command("expire");
    if (!this.lists.has(key)) return 0;
    this.expiries.set(key, this.now + seconds * 1000);
    return 1;
  }

  async lrange(key: string, start: number, stop: number): Promise<string[]> {
    this.command("lrange");
    const list = this.lists.get(key) ?? [];
    const [from, to] = this.range(list.length, start, stop);
    return from > to ? [] : list.slice(from, to + 1);
  }

  async llen(key: string): Promise<number> {
    this.command("llen");
    return this.lists.get(key)?.length ?? 0;
  }

  async rpop(key: string): Promise<string | null> {
    this.command("rpop");
    const list = this.lists.get(key);
    const value = list?.pop() ?? null;
    if (list && list.length === 0) {
      this.remove(key);
    }
    return value;
  }

  async del(...keys: string[]): Promise<number> {
    this.command("del");
    return keys.filter((key) => this.remove(key)).length;
  }

  async ttl(key: string): Promise<number> {
    this.command("ttl");
    if (!this.lists.has(key)) return -2;
    const at = this.expiries.get(key);
    return at === undefined ? -1 : Math.ceil((at - this.now) / 1000);
  }

  async ping(): Promise<string> {
    this.command("ping");
    return "PONG";
  }

  disconnect(): void {
    this.disconnected = true;
  }
}
