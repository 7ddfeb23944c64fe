import type { RedisClient } from '../../infra/redis.js';
import type { Logger } from '../../infra/logger.js';
import type { LedgerSnapshot } from './snapshot.js';

/** Durable home of the committed ledger state. `load` resolves to null when nothing is stored. */
export interface SnapshotStore {
  load(): Promise<unknown>;
  save(snapshot: LedgerSnapshot): Promise<void>;
}

export const SNAPSHOT_KEY = 'collateral-ledger:state';

export class RedisSnapshotStore implements SnapshotStore {
  private readonly redis: RedisClient;
  private readonly logger: Logger;
  private readonly key: string;

  constructor(redis: RedisClient, logger: Logger, key = SNAPSHOT_KEY) {
    this.redis = redis;
    this.logger = logger;
    this.key = key;
  }

  async load(): Promise<unknown> {
    const raw = await this.redis.get(this.key);
    if (raw === null) return null;

    const parsed: unknown = JSON.parse(raw);
    this.logger.debug({ key: this.key, bytes: raw.length }, 'Ledger snapshot loaded');
    return parsed;
  }

  async save(snapshot: LedgerSnapshot): Promise<void> {
    await this.redis.set(this.key, JSON.stringify(snapshot));
    this.logger.debug(
      { key: this.key, positionCount: snapshot.positions.length },
      'Ledger snapshot persisted',
    );
  }
}

/** Keeps the last snapshot in process. Used when no Redis URL is configured. */
export class MemorySnapshotStore implements SnapshotStore {
  private latest: string | null = null;

  async load(): Promise<unknown> {
    return this.latest === null ? null : JSON.parse(this.latest);
  }

  async save(snapshot: LedgerSnapshot): Promise<void> {
    this.latest = JSON.stringify(snapshot);
  }
}
