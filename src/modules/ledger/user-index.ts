import { LedgerError } from '../../common/errors.js';

type UserIndex = Map<string, number[]>;

export function appendToIndex(index: UserIndex, user: string, positionId: number, capacity: number): void {
  const ids = index.get(user) ?? [];
  if (ids.length >= capacity) {
    throw new LedgerError('InvalidAmount', `${user} already has ${capacity} active positions`);
  }
  index.set(user, [...ids, positionId]);
}

export function removeFromIndex(index: UserIndex, user: string, positionId: number): void {
  const ids = index.get(user);
  if (!ids) return;

  const remaining = ids.filter((id) => id !== positionId);
  if (remaining.length === 0) {
    index.delete(user);
  } else {
    index.set(user, remaining);
  }
}

export function clearIndex(index: UserIndex, user: string): void {
  index.delete(user);
}
