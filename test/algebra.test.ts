import { describe, it, expect, expectTypeOf } from 'vitest';
import {
  selectTags,
  makeSelector,
  combineSelectors,
  partition,
  inject,
  type Remainder,
} from '../src/algebra';

type Print = { readonly _tag: 'print'; readonly text: string };
type Read = { readonly _tag: 'read' };
type Exit = { readonly _tag: 'exit'; readonly code: number };
type Request = Print | Read | Exit;

describe('Selectors', () => {
  it('should match exactly the listed tags', () => {
    const selector = selectTags('print', 'read');

    expect([...selector.tags]).toEqual(['print', 'read']);
    expect(selector.matches({ _tag: 'print' })).toBe(true);
    expect(selector.matches({ _tag: 'exit' })).toBe(false);
  });

  it('should combine two selectors into their union', () => {
    const combined = combineSelectors(makeSelector<Print>(['print']), makeSelector<Exit>(['exit']));

    expect(combined.matches({ _tag: 'print' })).toBe(true);
    expect(combined.matches({ _tag: 'exit' })).toBe(true);
    expect(combined.matches({ _tag: 'read' })).toBe(false);
  });
});

describe('partition', () => {
  const prints = makeSelector<Print>(['print']);

  it('should return a selected request on the Ok side unchanged', () => {
    const request: Request = { _tag: 'print', text: 'hi' };
    const split = partition(request, prints);

    expect(split.isOk()).toBe(true);
    expect(split._unsafeUnwrap()).toBe(request);
  });

  it('should return any other request on the Err side unchanged', () => {
    const request: Request = { _tag: 'exit', code: 3 };
    const split = partition(request, prints);

    expect(split.isErr()).toBe(true);
    expect(split._unsafeUnwrapErr()).toBe(request);
  });

  it('should leave the other kinds as the remainder type', () => {
    expectTypeOf<Remainder<Request, Print>>().toEqualTypeOf<Read | Exit>();
    expectTypeOf<Remainder<Request, Request>>().toBeNever();
  });
});

describe('inject', () => {
  it('should return the part result itself', () => {
    type Outcome = { readonly _tag: 'printed' } | { readonly _tag: 'line'; readonly text: string };
    const line = { _tag: 'line', text: 'x' } as const;

    const whole = inject<Outcome, typeof line>(line);
    expect(whole).toBe(line);
    expectTypeOf(whole).toEqualTypeOf<Outcome>();
  });
});
