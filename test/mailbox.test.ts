import { describe, it, expect } from 'vitest';
import { Mailbox } from '../src/mailbox';
import { MailboxEmptyError } from '../src/errors';

describe('Mailbox', () => {
  it('should return the stored value once and then be empty', () => {
    const box = new Mailbox<string>();
    box.put('a');

    expect(box.take()).toBe('a');
    expect(box.take()).toBeUndefined();
    expect(box.isEmpty).toBe(true);
  });

  it('should keep only the last of two puts', () => {
    const box = new Mailbox<number>();
    box.put(1);
    box.put(2);

    expect(box.take()).toBe(2);
    expect(box.take()).toBeUndefined();
  });

  it('should leave the value in place on peek', () => {
    const box = new Mailbox<number>();
    box.put(7);

    expect(box.peek()).toBe(7);
    expect(box.isEmpty).toBe(false);
    expect(box.take()).toBe(7);
  });

  describe('takeSafe', () => {
    it('should report an empty slot as an Err', () => {
      const box = new Mailbox<number>();
      const result = box.takeSafe();

      expect(result.isErr()).toBe(true);
      expect(result._unsafeUnwrapErr()).toBeInstanceOf(MailboxEmptyError);
    });

    it('should tell a stored undefined apart from an empty slot', () => {
      const box = new Mailbox<undefined>();
      box.put(undefined);

      expect(box.isEmpty).toBe(false);
      const result = box.takeSafe();
      expect(result.isOk()).toBe(true);
      expect(box.takeSafe().isErr()).toBe(true);
    });
  });
});
