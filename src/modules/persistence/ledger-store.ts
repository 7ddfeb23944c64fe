import type { Container } from '../../infra/container.js';
import type { EventBus } from '../../services/event-bus.js';
import type { LedgerState } from '../../types/ledger.js';
import type { LedgerEvent } from '../../types/events.js';
import { isLedgerError } from '../../common/errors.js';
import type { SnapshotStore } from './snapshot-store.js';
import { cloneState, createInitialState, deserializeState, serializeState } from './snapshot.js';

/** Staging area handed to a transaction body. */
export interface TransactionContext {
  draft: LedgerState;
  now: number;
  emit(event: LedgerEvent): void;
}

/**
 * Owns the committed ledger state. Mutations run one at a time against a cloned
 * draft; the draft replaces the committed state only after the snapshot is
 * persisted, and events are published only after that swap.
 */
export class LedgerStore {
  private readonly container: Container;
  private readonly snapshots: SnapshotStore;
  private readonly eventBus: EventBus;
  private state: LedgerState;
  private tail: Promise<void> = Promise.resolve();

  constructor(container: Container, snapshots: SnapshotStore, eventBus: EventBus) {
    this.container = container;
    this.snapshots = snapshots;
    this.eventBus = eventBus;
    this.state = createInitialState(container.ledgerConfig.initialRiskParams);
  }

  async load(): Promise<void> {
    const { logger } = this.container;
    const raw = await this.snapshots.load();
    if (raw === null) {
      logger.info('No ledger snapshot found, starting from an empty ledger');
      return;
    }

    this.state = deserializeState(raw);
    logger.info(
      {
        positionCount: this.state.positions.size,
        initialized: this.state.initialized,
        nextPositionId: this.state.nextPositionId,
      },
      'Ledger state restored',
    );
  }

  read<T>(fn: (state: Readonly<LedgerState>) => T): T {
    return fn(this.state);
  }

  transact<T>(operation: string, body: (tx: TransactionContext) => T): Promise<T> {
    const run = this.tail.then(() => this.commit(operation, body));
    // The queue only orders work; the caller receives the rejection through `run`.
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async commit<T>(operation: string, body: (tx: TransactionContext) => T): Promise<T> {
    const { logger, clock } = this.container;
    const draft = cloneState(this.state);
    const events: LedgerEvent[] = [];

    let result: T;
    try {
      result = body({
        draft,
        now: clock.now(),
        emit: (event) => {
          events.push(event);
        },
      });
      // Every state change publishes an event; a body that published none left
      // the draft as it found it.
      if (events.length > 0) {
        await this.snapshots.save(serializeState(draft));
      }
    } catch (err) {
      if (isLedgerError(err)) {
        logger.warn({ operation, code: err.code, reason: err.message }, 'Ledger operation rejected');
      } else {
        logger.error({ err, operation }, 'Ledger transaction aborted');
      }
      throw err;
    }

    this.state = draft;
    for (const event of events) {
      this.eventBus.emit(event);
    }
    return result;
  }
}
