import { ContractViolationError, describeRequest } from './errors';

/** Orders two task ids: negative, zero or positive, like `Array.prototype.sort`. */
export type CompareIds<Id> = (a: Id, b: Id) => number;

/**
 * The default task id order: numbers, strings and bigints compare natively.
 * Ids of mixed or other types need an explicit comparator.
 */
export function compareTaskIds(a: unknown, b: unknown): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === 'bigint' && typeof b === 'bigint') {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  throw new ContractViolationError(
    'incomparable-task-ids',
    `Task ids ${describeRequest(a)} and ${describeRequest(b)} have no natural order; pass compareIds`,
  );
}

interface Entry<Id, T> {
  readonly id: Id;
  value: T;
}

/**
 * An ordered map from task id to live task. Iteration is always in
 * ascending id order, whatever the insertion order was.
 */
export class TaskTable<Id, T> {
  private readonly entries: Entry<Id, T>[] = [];

  constructor(private readonly compare: CompareIds<Id> = compareTaskIds) {}

  get size(): number {
    return this.entries.length;
  }

  get isEmpty(): boolean {
    return this.entries.length === 0;
  }

  has(id: Id): boolean {
    return this.locate(id).found;
  }

  get(id: Id): T | undefined {
    const { index, found } = this.locate(id);
    return found ? this.entries[index].value : undefined;
  }

  /**
   * Inserts or replaces the task under `id`.
   * @returns `true` if an existing task was replaced.
   */
  set(id: Id, value: T): boolean {
    const { index, found } = this.locate(id);
    if (found) {
      this.entries[index].value = value;
      return true;
    }
    this.entries.splice(index, 0, { id, value });
    return false;
  }

  delete(id: Id): boolean {
    const { index, found } = this.locate(id);
    if (found) {
      this.entries.splice(index, 1);
    }
    return found;
  }

  ids(): Id[] {
    return this.entries.map((entry) => entry.id);
  }

  /** A snapshot of the entries in ascending id order. */
  snapshot(): Array<readonly [Id, T]> {
    return this.entries.map((entry) => [entry.id, entry.value] as const);
  }

  // Binary search for the first entry whose id is not below `id`.
  private locate(id: Id): { index: number; found: boolean } {
    let low = 0;
    let high = this.entries.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if (this.compare(this.entries[mid].id, id) < 0) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    const found = low < this.entries.length && this.compare(this.entries[low].id, id) === 0;
    return { index: low, found };
  }
}
