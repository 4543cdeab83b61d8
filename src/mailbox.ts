import { type Result, ok, err } from 'neverthrow';
import { MailboxEmptyError } from './errors';

/**
 * A single-slot cell carrying the most recent result from a handler (or the
 * scheduler) back to a suspended computation.
 *
 * The same instance is shared by a computation and every handler layer
 * wrapped around it. There is no queue: a second `put` before the owner's
 * next `take` replaces the first value.
 *
 * @example
 * ```typescript
 * const box = new Mailbox<number>();
 * box.put(1);
 * box.put(2);
 * box.take(); // 2
 * box.take(); // undefined
 * ```
 */
export class Mailbox<T> {
  private slot: { readonly value: T } | undefined = undefined;

  /** Stores `value`, discarding any value that was not taken yet. */
  put(value: T): void {
    this.slot = { value };
  }

  /** Returns and clears the stored value, or `undefined` when the slot is empty. */
  take(): T | undefined {
    const slot = this.slot;
    this.slot = undefined;
    return slot?.value;
  }

  /**
   * Like `take`, but reports emptiness as an `Err`. Use this when `undefined`
   * is a legitimate value of `T`.
   */
  takeSafe(): Result<T, MailboxEmptyError> {
    const slot = this.slot;
    if (!slot) {
      return err(new MailboxEmptyError());
    }
    this.slot = undefined;
    return ok(slot.value);
  }

  /** Returns the stored value without clearing it. */
  peek(): T | undefined {
    return this.slot?.value;
  }

  get isEmpty(): boolean {
    return this.slot === undefined;
  }
}
