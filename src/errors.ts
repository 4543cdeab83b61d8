/**
 * @module
 * Error types raised by the runtime. Only broken contracts are thrown here:
 * a handler declining a request is a typed `err(...)`, and a handler's own
 * failure travels through the layers untouched.
 */

import { serialize } from 'seroval';

/**
 * The contract that was broken when a `ContractViolationError` is raised.
 */
export type ContractViolationReason =
  | 'resume-after-completion'
  | 'resume-after-failure'
  | 'concurrent-resume'
  | 'moved'
  | 'missing-reply'
  | 'incomparable-task-ids'
  | 'unhandled';

/**
 * Thrown when a computation is driven in a way its state machine forbids.
 * These are programming errors, never recoverable conditions.
 */
export class ContractViolationError extends Error {
  public readonly _tag: string = 'ContractViolationError';
  public readonly reason: ContractViolationReason;

  constructor(reason: ContractViolationReason, message: string) {
    super(message);
    this.name = 'ContractViolationError';
    this.reason = reason;
    Object.setPrototypeOf(this, ContractViolationError.prototype);
  }
}

/**
 * Thrown when a request reaches a layer that was supposed to leave nothing
 * unhandled: `run()` on a computation that yields anyway, or any yield below
 * `assertHandled()`.
 */
export class UnhandledEffectError extends ContractViolationError {
  public readonly _tag: string = 'UnhandledEffectError';
  public readonly request: unknown;

  constructor(request: unknown, layer?: string) {
    super(
      'unhandled',
      `Unhandled effect${layer ? ` in ${layer}` : ''}: ${describeRequest(request)}`,
    );
    this.name = 'UnhandledEffectError';
    this.request = request;
    Object.setPrototypeOf(this, UnhandledEffectError.prototype);
  }
}

/**
 * Thrown by the scheduler when a spawn reuses a live task id and the
 * duplicate policy is `'reject'`.
 */
export class DuplicateTaskError extends Error {
  public readonly _tag = 'DuplicateTaskError' as const;
  public readonly taskId: unknown;

  constructor(taskId: unknown) {
    super(`Task ${describeRequest(taskId)} is already live`);
    this.name = 'DuplicateTaskError';
    this.taskId = taskId;
    Object.setPrototypeOf(this, DuplicateTaskError.prototype);
  }
}

/**
 * The error side of `Mailbox.takeSafe()`.
 */
export class MailboxEmptyError extends Error {
  public readonly _tag = 'MailboxEmptyError' as const;

  constructor() {
    super('Mailbox is empty');
    this.name = 'MailboxEmptyError';
    Object.setPrototypeOf(this, MailboxEmptyError.prototype);
  }
}

/**
 * Type guard to check if an error is a ContractViolationError (including
 * UnhandledEffectError).
 */
export function isContractViolation(error: unknown): error is ContractViolationError {
  return error instanceof ContractViolationError;
}

/**
 * Type guard to check if an error is an UnhandledEffectError.
 */
export function isUnhandledEffect(error: unknown): error is UnhandledEffectError {
  return error instanceof UnhandledEffectError;
}

/**
 * Renders a request (or any value) as JavaScript source for error messages.
 * Falls back to `String()` for values seroval refuses, such as functions
 * holding native state.
 */
export function describeRequest(value: unknown): string {
  try {
    return serialize(value);
  } catch {
    return String(value);
  }
}
