import { LedgerError } from './errors.js';
import type { LedgerConfig } from '../types/ledger.js';

export function requireAdministrator(config: Pick<LedgerConfig, 'administrator'>, caller: string): void {
  if (caller !== config.administrator) {
    throw new LedgerError('Unauthorized', `${caller} is not the administrator`);
  }
}
