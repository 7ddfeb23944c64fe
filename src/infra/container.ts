import type { Logger } from './logger.js';
import type { LogicalClock } from './clock.js';
import type { LedgerConfig } from '../types/ledger.js';

export interface Container {
  logger: Logger;
  clock: LogicalClock;
  ledgerConfig: LedgerConfig;
}
