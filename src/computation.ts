/**
 * @module
 * The restartable computation: a state machine that suspends at every effect
 * request and is resumed, one step at a time, by whoever wraps it.
 *
 * A computation is built from a generator function that receives its own
 * mailbox. Each `yield` is a request; the value answering it is read from the
 * mailbox on the next resume. Handler layers wrap a computation and consume
 * it: the wrapped instance is marked *moved* and only the new layer may drive
 * it from then on.
 */

import { type Tagged, type Remainder, partition, inject } from './algebra';
import { type EffectHandler } from './handlers';
import { type Logger, noopLogger } from './logger';
import { Mailbox } from './mailbox';
import { ContractViolationError, UnhandledEffectError } from './errors';

// =================================================================
// Section 1: Core Types
// =================================================================

/**
 * Where a computation is in its lifecycle.
 * - `created`: not resumed yet.
 * - `suspended`: waiting at a request.
 * - `running`: inside `resume()`.
 * - `completed`: finished; terminal.
 * - `failed`: its body (or a handler it runs) threw; terminal.
 */
export type ComputationState = 'created' | 'suspended' | 'running' | 'completed' | 'failed';

/**
 * The builder entry point: receives the computation's mailbox and returns
 * the iterator (usually a generator) that makes up its body.
 *
 * @template Y The requests it yields.
 * @template In The results its mailbox carries.
 * @template R Its completion value.
 */
export type Builder<Y extends Tagged, In, R> = (mailbox: Mailbox<In>) => Iterator<Y, R, undefined>;

/** Advances a detached computation by one step. */
export type Stepper<Y, R> = () => IteratorResult<Y, R>;

/**
 * Options for `Computation.handle`.
 */
export interface HandleOptions {
  /** Used in log lines and error messages. Defaults to the handled tags. */
  name?: string;
  logger?: Logger;
}

// =================================================================
// Section 2: The Computation
// =================================================================

/**
 * A restartable unit of control flow that suspends at effect requests.
 *
 * At most one suspension is outstanding at a time. Resuming after
 * completion, after failure, re-entrantly, or after the computation was
 * consumed by a layer throws `ContractViolationError`.
 *
 * @template Y The requests still unhandled at this layer.
 * @template In The results carried by the shared mailbox.
 * @template R The completion value.
 */
export class Computation<Y extends Tagged, In, R = void> {
  private status: ComputationState = 'created';
  private moved = false;

  constructor(
    public readonly mailbox: Mailbox<In>,
    private readonly body: Iterator<Y, R, undefined>,
  ) {}

  get state(): ComputationState {
    return this.status;
  }

  /** True once a layer took over this computation. */
  get isMoved(): boolean {
    return this.moved;
  }

  /**
   * Advances one step: returns the next pending request, or the completion
   * value once the body finishes.
   */
  resume(): IteratorResult<Y, R> {
    if (this.moved) {
      throw new ContractViolationError(
        'moved',
        'This computation was consumed by a wrapping layer; resume the layer instead',
      );
    }
    return this.advance();
  }

  /** Stores a result for the body to read on its next resume. */
  put(value: In): void {
    this.mailbox.put(value);
  }

  /**
   * Drives a computation that provably yields nothing to completion and
   * returns its completion value.
   *
   * @throws {UnhandledEffectError} If it yields anyway.
   */
  run(this: Computation<never, In, R>): R {
    const step = this.resume();
    if (step.done) {
      return step.value;
    }
    throw new UnhandledEffectError(step.value);
  }

  /**
   * Hands the right to resume this computation to a wrapping layer. After
   * this call `resume()` on this instance throws; the returned stepper is
   * the only way to advance it.
   *
   * @internal Used by `handle`, `assertHandled` and the task scheduler.
   */
  detach(): Stepper<Y, R> {
    if (this.moved) {
      throw new ContractViolationError('moved', 'This computation was already consumed by another layer');
    }
    this.moved = true;
    return () => this.advance();
  }

  /**
   * Wraps this computation with one handler. Requests selected by the
   * handler never reach the caller: the handler's reply goes into the
   * mailbox and the inner computation is resumed again. Everything else,
   * and every request the handler declines, is yielded by the new layer.
   *
   * The handler's own exceptions are not caught.
   *
   * @example
   * ```typescript
   * const pure = program
   *   .handle(io.handlers({ print: (text) => void lines.push(text) }))
   *   .handle(io.handlers({ readLine: () => 'input' }));
   * pure.run();
   * ```
   */
  handle<Part extends Tagged, Reply extends In, Declined extends Tagged = never>(
    handler: EffectHandler<Part, Reply, Declined>,
    options: HandleOptions = {},
  ): Computation<Remainder<Y, Part> | Declined, In, R> {
    const name = options.name ?? `handle(${[...handler.selector.tags].join('|')})`;
    const logger = options.logger ?? noopLogger;
    const mailbox = this.mailbox;
    const inner = this.detach();

    function* layer(): Generator<Remainder<Y, Part> | Declined, R, unknown> {
      for (;;) {
        const step = inner();
        if (step.done) {
          logger.debug(`[${name}] inner computation completed`);
          return step.value;
        }
        const split = partition(step.value, handler.selector);
        if (split.isErr()) {
          yield split.error;
          continue;
        }
        const outcome = handler.handle(split.value);
        if (outcome.isErr()) {
          logger.debug(`[${name}] declined "${step.value._tag}"`);
          yield outcome.error;
          continue;
        }
        logger.debug(`[${name}] handled "${step.value._tag}"`);
        mailbox.put(inject<In, Reply>(outcome.value));
      }
    }

    return new Computation<Remainder<Y, Part> | Declined, In, R>(mailbox, layer());
  }

  /**
   * Seals this computation: any request that still reaches this layer
   * raises `UnhandledEffectError`. Use it to call `run()` on computations
   * whose request type could not be narrowed to `never`.
   */
  assertHandled(name = 'assertHandled'): Computation<never, In, R> {
    const inner = this.detach();

    function* sealed(): Generator<never, R, unknown> {
      const step = inner();
      if (step.done) {
        return step.value;
      }
      throw new UnhandledEffectError(step.value, name);
    }

    return new Computation<never, In, R>(this.mailbox, sealed());
  }

  private advance(): IteratorResult<Y, R> {
    switch (this.status) {
      case 'completed':
        throw new ContractViolationError('resume-after-completion', 'Cannot resume a completed computation');
      case 'failed':
        throw new ContractViolationError('resume-after-failure', 'Cannot resume a computation that threw');
      case 'running':
        throw new ContractViolationError('concurrent-resume', 'Computation is already running; resume is not re-entrant');
    }

    this.status = 'running';
    let step: IteratorResult<Y, R>;
    try {
      step = this.body.next();
    } catch (error) {
      this.status = 'failed';
      throw error;
    }
    this.status = step.done ? 'completed' : 'suspended';
    return step;
  }
}

// =================================================================
// Section 3: Entry Points
// =================================================================

/**
 * Creates a computation: allocates its mailbox and hands it to `builder`.
 * This is the standard way to stand up a root computation or a spawned task.
 *
 * @example
 * ```typescript
 * const program = computation(function* (mailbox: Mailbox<EffectResult<Console>>) {
 *   const line = yield* io.perform(io.effects.readLine(), mailbox);
 *   yield* io.perform(io.effects.print(line.toUpperCase()), mailbox);
 * });
 * ```
 */
export function computation<Y extends Tagged, In, R = void>(
  builder: Builder<Y, In, R>,
): Computation<Y, In, R> {
  const mailbox = new Mailbox<In>();
  return new Computation<Y, In, R>(mailbox, builder(mailbox));
}

/**
 * Drives a computation from the outside, answering every request it
 * yields with `respond`. A `undefined` answer leaves the mailbox untouched,
 * for requests that expect no result.
 *
 * @returns The completion value.
 */
export function drive<Y extends Tagged, In, R>(
  target: Computation<Y, In, R>,
  respond: (request: Y) => In | undefined,
): R {
  for (;;) {
    const step = target.resume();
    if (step.done) {
      return step.value;
    }
    const reply = respond(step.value);
    if (reply !== undefined) {
      target.put(reply);
    }
  }
}

