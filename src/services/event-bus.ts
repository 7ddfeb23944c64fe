import { EventEmitter } from 'node:events';
import type { LedgerEvent, LedgerEventType } from '../types/events.js';
import type { Logger } from '../infra/logger.js';

type EventHandler = (event: LedgerEvent) => void | Promise<void>;
type Listener = (event: LedgerEvent) => void;

export class EventBus {
  private readonly emitter: EventEmitter;
  private readonly logger: Logger;
  private readonly listeners: Map<EventHandler, Listener> = new Map();

  constructor(logger: Logger) {
    this.emitter = new EventEmitter();
    this.emitter.setMaxListeners(100);
    this.logger = logger;
  }

  emit(event: LedgerEvent): void {
    this.logger.debug({ eventType: event.type, at: event.at }, 'Event emitted');
    this.emitter.emit('event', event);
    this.emitter.emit(event.type, event);
  }

  on(handler: EventHandler): void {
    this.emitter.on('event', this.guard(handler));
  }

  onType(type: LedgerEventType, handler: EventHandler): void {
    this.emitter.on(type, this.guard(handler));
  }

  off(handler: EventHandler): void {
    const listener = this.listeners.get(handler);
    if (!listener) return;
    this.emitter.off('event', listener);
    for (const name of this.emitter.eventNames()) {
      this.emitter.off(name, listener);
    }
    this.listeners.delete(handler);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
    this.listeners.clear();
  }

  // Events fire after a commit, so a failing subscriber must not reach the emitter.
  private guard(handler: EventHandler): Listener {
    const existing = this.listeners.get(handler);
    if (existing) return existing;

    const listener: Listener = (event) => {
      try {
        const pending = handler(event);
        if (pending instanceof Promise) {
          pending.catch((err: unknown) => {
            this.logger.error({ err, eventType: event.type }, 'Event handler failed');
          });
        }
      } catch (err) {
        this.logger.error({ err, eventType: event.type }, 'Event handler failed');
      }
    };
    this.listeners.set(handler, listener);
    return listener;
  }
}
