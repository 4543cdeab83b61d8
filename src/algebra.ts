/**
 * @module
 * The effect algebra: how a sum-typed request is split into the slice one
 * handler layer deals with and the remainder that travels outward.
 *
 * Requests are tagged unions (`{ _tag: ... }`). A `Selector<Part>` names a
 * closed set of tags at runtime and stands for the union members `Part` at
 * compile time, so classification (`partition`) and the type arithmetic
 * (`Exclude<Whole, Part>`) always agree. Once every kind has been selected the
 * remainder is `never` and nothing can fall through.
 */

import { type Result, ok, err } from 'neverthrow';

// =================================================================
// Section 1: Core Types
// =================================================================

/**
 * The shape every request, result and scheduler message shares: a string
 * discriminant under `_tag`.
 */
export interface Tagged<Tag extends string = string> {
  readonly _tag: Tag;
}

/**
 * A runtime description of a closed set of request kinds. `tags` holds the
 * discriminants; `matches` is the type guard that ties them to `Part`.
 *
 * @template Part The union members selected by this selector.
 */
export interface Selector<Part extends Tagged> {
  readonly tags: ReadonlySet<string>;
  matches(value: Tagged): value is Part;
}

/**
 * The part of `Whole` a selector for `Part` classifies as "mine".
 */
export type Selected<Whole, Part> = Whole & Part;

/**
 * Everything in `Whole` a selector for `Part` leaves for outer layers.
 */
export type Remainder<Whole, Part> = Exclude<Whole, Part>;

// =================================================================
// Section 2: Building Selectors
// =================================================================

/**
 * Creates a selector over an explicit list of tags. It selects every union
 * member whose `_tag` is one of them.
 *
 * @example
 * ```typescript
 * const io = selectTags('read', 'write');
 * io.matches({ _tag: 'read' }); // true
 * ```
 */
export function selectTags<Tag extends string>(...tags: Tag[]): Selector<Tagged<Tag>> {
  return makeSelector<Tagged<Tag>>(tags);
}

/**
 * Creates a selector for `Part` from the tags that identify it. The caller is
 * responsible for passing exactly the tags of `Part`; every other helper in
 * the library goes through this function.
 */
export function makeSelector<Part extends Tagged>(tags: Iterable<string>): Selector<Part> {
  const set: ReadonlySet<string> = new Set(tags);
  return {
    tags: set,
    matches: (value: Tagged): value is Part => set.has(value._tag),
  };
}

/**
 * Joins two selectors into one that selects either part.
 */
export function combineSelectors<A extends Tagged, B extends Tagged>(
  first: Selector<A>,
  second: Selector<B>,
): Selector<A | B> {
  return makeSelector<A | B>([...first.tags, ...second.tags]);
}

// =================================================================
// Section 3: Select and CoSelect
// =================================================================

/**
 * Classifies a concrete request as exactly one of "selected" (`Ok`) or
 * "remainder" (`Err`). Pure and total: the value is returned unchanged on
 * either side.
 *
 * @example
 * ```typescript
 * const split = partition(request, io.select('print'));
 * if (split.isOk()) {
 *   // split.value is the print request
 * } else {
 *   // split.error is one of the other kinds
 * }
 * ```
 */
export function partition<Whole extends Tagged, Part extends Tagged>(
  value: Whole,
  selector: Selector<Part>,
): Result<Selected<Whole, Part>, Remainder<Whole, Part>>;
export function partition(value: Tagged, selector: Selector<Tagged>): Result<Tagged, Tagged> {
  return selector.matches(value) ? ok(value) : err(value);
}

/**
 * Rebuilds an outer result from the result of one of its parts. Part results
 * are already members of the outer union, so this is an upcast.
 */
export function inject<Whole, Part extends Whole>(part: Part): Whole {
  return part;
}
