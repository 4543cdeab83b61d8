/**
 * @module
 * This module declares effect kinds and the handlers that answer them.
 *
 * ---
 *
 * ### Recommended Usage
 *
 * - Describe a family of effects with `createEffectSuite<Schema>()`, where
 *   `Schema` maps effect names to function signatures. The suite builds
 *   requests, results, selectors and handlers that agree with each other.
 * - For handlers with private state (open connections, counters), implement
 *   the `EffectHandler` interface on a class.
 * - For one-off functions over hand-written tagged unions, use
 *   `createHandler`.
 */

import { type Result, ok } from 'neverthrow';
import { type Selector, type Tagged, makeSelector } from './algebra';
import { type Mailbox } from './mailbox';
import { ContractViolationError } from './errors';

// =================================================================
// Section 1: Core Types
// =================================================================

/** The shape of any effect signature. */
export type AnyFn = (...args: never[]) => unknown;

/**
 * An object type where keys are effect names and values are their
 * signatures. Declare it with `type`, not `interface`, so it satisfies the
 * index signature.
 */
export type EffectSchema = Record<string, AnyFn>;

/** The effect names of a schema. */
export type EffectName<S extends EffectSchema> = keyof S & string;

/**
 * The request union of a schema (or of the names `K` within it). A request
 * carries the effect's arguments as a tuple.
 */
export type EffectRequest<S extends EffectSchema, K extends EffectName<S> = EffectName<S>> = {
  [P in K]: { readonly _tag: P; readonly args: Parameters<S[P]> };
}[K];

/**
 * The result union of a schema, index-aligned with `EffectRequest`: the
 * result for name `P` carries `ReturnType<S[P]>`.
 */
export type EffectResult<S extends EffectSchema, K extends EffectName<S> = EffectName<S>> = {
  [P in K]: { readonly _tag: P; readonly value: ReturnType<S[P]> };
}[K];

/** The implementation of one effect: the signature with its types resolved. */
export type Implementation<S extends EffectSchema, K extends EffectName<S>> = (
  ...args: Parameters<S[K]>
) => ReturnType<S[K]>;

/** Implementations for the names `K` of a schema. */
export type Implementations<S extends EffectSchema, K extends EffectName<S>> = {
  [P in K]: Implementation<S, P>;
};

/**
 * The handler contract. A handler owns a selector naming the requests it
 * takes and answers each one with `ok(reply)`, or declines with
 * `err(declined)`. Declining usually hands back the original request, but a
 * handler may also translate it into another request for an outer layer.
 *
 * A handler may keep private state across calls.
 *
 * @template Part The requests this handler takes.
 * @template Reply The results it produces.
 * @template Declined What it yields outward when it declines.
 */
export interface EffectHandler<Part extends Tagged, Reply, Declined extends Tagged = never> {
  readonly selector: Selector<Part>;
  handle(request: Part): Result<Reply, Declined>;
}

/** Request constructors of a suite, keyed by effect name. */
export type SuiteEffects<S extends EffectSchema> = {
  readonly [K in EffectName<S>]: (...args: Parameters<S[K]>) => EffectRequest<S, K>;
};

/**
 * The tools returned by `createEffectSuite<S>()`.
 */
export interface EffectSuite<S extends EffectSchema> {
  /** Request constructors, e.g. `effects.print('hi')`. */
  readonly effects: SuiteEffects<S>;
  /** Builds the result for effect `name`. */
  reply<K extends EffectName<S>>(name: K, value: ReturnType<S[K]>): EffectResult<S, K>;
  /** A selector for the requests of the given names. */
  select<K extends EffectName<S>>(...names: K[]): Selector<EffectRequest<S, K>>;
  /**
   * A total handler built from implementations keyed by effect name. It
   * selects exactly the names present in `implementations`.
   */
  handlers<K extends EffectName<S>>(
    implementations: Implementations<S, K>,
  ): EffectHandler<EffectRequest<S, K>, EffectResult<S, K>>;
  /**
   * Yields `request` and returns the value of its result, read from
   * `mailbox`. Use with `yield*` inside a computation builder.
   */
  perform<K extends EffectName<S>>(
    request: { readonly _tag: K; readonly args: Parameters<S[K]> },
    mailbox: Mailbox<EffectResult<S>>,
  ): Generator<EffectRequest<S, K>, ReturnType<S[K]>, unknown>;
}

// =================================================================
// Section 2: Effect Suites
// =================================================================

function isResultOf<S extends EffectSchema, K extends EffectName<S>>(
  result: Tagged,
  name: K,
): result is { readonly _tag: K; readonly value: ReturnType<S[K]> } {
  return result._tag === name && 'value' in result;
}

/**
 * Creates a complete, type-safe suite for a family of effects.
 *
 * @template S A `type` that maps effect names to their signatures.
 *
 * @example
 * ```typescript
 * type Console = {
 *   print: (text: string) => void;
 *   readLine: () => string;
 * };
 *
 * const io = createEffectSuite<Console>();
 * const { print, readLine } = io.effects;
 *
 * const greet = computation(function* (mailbox: Mailbox<EffectResult<Console>>) {
 *   const name = yield* io.perform(readLine(), mailbox);
 *   yield* io.perform(print(`hello ${name}`), mailbox);
 * });
 *
 * greet
 *   .handle(io.handlers({ readLine: () => 'world', print: (text) => console.log(text) }))
 *   .run();
 * ```
 */
export function createEffectSuite<S extends EffectSchema>(): EffectSuite<S> {
  const constructors = new Map<string, (...args: unknown[]) => Tagged>();

  const effects = new Proxy({} as SuiteEffects<S>, {
    get(_target, prop) {
      if (typeof prop !== 'string') {
        return undefined;
      }
      let constructor = constructors.get(prop);
      if (!constructor) {
        constructor = (...args: unknown[]) => ({ _tag: prop, args });
        Object.defineProperty(constructor, 'name', { value: prop, configurable: true });
        constructors.set(prop, constructor);
      }
      return constructor;
    },
  });

  function* perform<K extends EffectName<S>>(
    request: { readonly _tag: K; readonly args: Parameters<S[K]> },
    mailbox: Mailbox<EffectResult<S>>,
  ): Generator<EffectRequest<S, K>, ReturnType<S[K]>, unknown> {
    yield request;
    const taken = mailbox.takeSafe();
    if (taken.isErr()) {
      throw new ContractViolationError(
        'missing-reply',
        `No result was delivered for effect "${request._tag}"`,
      );
    }
    const result: Tagged = taken.value;
    if (!isResultOf<S, K>(result, request._tag)) {
      throw new ContractViolationError(
        'missing-reply',
        `Expected a result for effect "${request._tag}", got "${result._tag}"`,
      );
    }
    return result.value;
  }

  function reply<K extends EffectName<S>>(name: K, value: ReturnType<S[K]>): EffectResult<S, K> {
    return { _tag: name, value };
  }

  function select<K extends EffectName<S>>(...names: K[]): Selector<EffectRequest<S, K>> {
    return makeSelector<EffectRequest<S, K>>(names);
  }

  function handlers<K extends EffectName<S>>(
    implementations: Implementations<S, K>,
  ): EffectHandler<EffectRequest<S, K>, EffectResult<S, K>> {
    return {
      selector: makeSelector<EffectRequest<S, K>>(Object.keys(implementations)),
      handle(request: { readonly _tag: K; readonly args: Parameters<S[K]> }) {
        const implementation: Implementation<S, K> = implementations[request._tag];
        return ok(reply(request._tag, implementation(...request.args)));
      },
    };
  }

  return { effects, reply, select, handlers, perform };
}

// =================================================================
// Section 3: Standalone Helpers
// =================================================================

/**
 * Adapts a function to the handler contract, for requests that are not
 * declared through a suite.
 *
 * @example
 * ```typescript
 * const printer = createHandler(selectTags('print'), (request) =>
 *   request.text.length > 0 ? ok(printed) : err(request),
 * );
 * ```
 */
export function createHandler<Part extends Tagged, Reply, Declined extends Tagged = never>(
  selector: Selector<Part>,
  handle: (request: Part) => Result<Reply, Declined>,
): EffectHandler<Part, Reply, Declined> {
  return { selector, handle };
}
