import { describe, it, expect, vi } from 'vitest';
import { ok } from 'neverthrow';
import { selectTags, makeSelector, type Tagged } from '../src/algebra';
import { Computation, computation, drive } from '../src/computation';
import { createHandler } from '../src/handlers';
import {
  ContractViolationError,
  UnhandledEffectError,
  isContractViolation,
  isUnhandledEffect,
  type ContractViolationReason,
} from '../src/errors';
import { type Logger } from '../src/logger';

type Ping = { readonly _tag: 'ping' };
type Ask = { readonly _tag: 'ask'; readonly question: string };

const ping: Ping = { _tag: 'ping' };
const ask = (question: string): Ask => ({ _tag: 'ask', question });

const pong = createHandler(makeSelector<Ping>(['ping']), () => ok<number, never>(0));

function reasonOf(fn: () => unknown): ContractViolationReason | undefined {
  try {
    fn();
  } catch (error) {
    return isContractViolation(error) ? error.reason : undefined;
  }
  return undefined;
}

function createLogger(): Logger & { debug: ReturnType<typeof vi.fn> } {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('Computation', () => {
  describe('Lifecycle', () => {
    it('should move from created through suspended to completed', () => {
      const counter = computation<Ping, number, number>(function* (mailbox) {
        yield ping;
        return (mailbox.take() ?? 0) + 1;
      });

      expect(counter.state).toBe('created');
      expect(counter.resume()).toEqual({ done: false, value: ping });
      expect(counter.state).toBe('suspended');

      counter.put(41);
      expect(counter.resume()).toEqual({ done: true, value: 42 });
      expect(counter.state).toBe('completed');
    });

    it('should reject a resume after completion', () => {
      const done = computation<never, number>(function* () {});
      done.resume();

      expect(reasonOf(() => done.resume())).toBe('resume-after-completion');
    });

    it('should propagate a thrown error and reject later resumes', () => {
      const failing = computation<Ping, number>(function* () {
        throw new Error('boom');
      });

      expect(() => failing.resume()).toThrow('boom');
      expect(failing.state).toBe('failed');
      expect(reasonOf(() => failing.resume())).toBe('resume-after-failure');
    });

    it('should reject a re-entrant resume', () => {
      let self: Computation<Ping, number> | undefined;
      const reentrant = computation<Ping, number>(function* () {
        self?.resume();
        yield ping;
      });
      self = reentrant;

      expect(reasonOf(() => reentrant.resume())).toBe('concurrent-resume');
    });

    it('should reject resuming a computation consumed by a layer', () => {
      const inner = computation<Ping, number>(function* () {
        yield ping;
      });
      inner.handle(pong);

      expect(inner.isMoved).toBe(true);
      expect(reasonOf(() => inner.resume())).toBe('moved');
      expect(reasonOf(() => inner.handle(pong))).toBe('moved');
    });
  });

  describe('handle', () => {
    it('should answer selected requests without surfacing them', () => {
      const program = computation<Ping | Ask, number | string, string>(function* (mailbox) {
        yield ping;
        const first = mailbox.take();
        yield ask('name?');
        return `${String(first)}:${String(mailbox.take())}`;
      });

      const layered = program.handle(pong);
      expect(layered.resume()).toEqual({ done: false, value: ask('name?') });

      layered.put('ada');
      expect(layered.resume()).toEqual({ done: true, value: '0:ada' });
    });

    it('should not catch errors thrown by a handler', () => {
      const broken = createHandler<Tagged<'ping'>, number>(selectTags('ping'), (): never => {
        throw new Error('handler broke');
      });
      const layered = computation<Ping, number>(function* () {
        yield ping;
      }).handle(broken);

      expect(() => layered.run()).toThrow('handler broke');
      expect(layered.state).toBe('failed');
    });

    it('should log handled requests and completion at debug', () => {
      const logger = createLogger();
      computation<Ping, number>(function* () {
        yield ping;
      })
        .handle(pong, { logger })
        .run();

      expect(logger.debug.mock.calls).toEqual([
        ['[handle(ping)] handled "ping"'],
        ['[handle(ping)] inner computation completed'],
      ]);
    });

    it('should use the layer name in log lines', () => {
      const logger = createLogger();
      computation<Ping, number>(function* () {})
        .handle(pong, { name: 'pinger', logger })
        .run();

      expect(logger.debug).toHaveBeenCalledWith('[pinger] inner computation completed');
    });
  });

  describe('assertHandled', () => {
    it('should run a computation that yields nothing', () => {
      const sealed = computation<Ping, number, number>(function* () {
        return 3;
      }).assertHandled();

      expect(sealed.run()).toBe(3);
    });

    it('should raise UnhandledEffectError naming the request', () => {
      const sealed = computation<Ask, number>(function* () {
        yield ask('why?');
      }).assertHandled('sealed');

      try {
        sealed.run();
        expect.unreachable();
      } catch (error) {
        expect(isUnhandledEffect(error)).toBe(true);
        if (error instanceof UnhandledEffectError) {
          expect(error.request).toEqual(ask('why?'));
          expect(error.reason).toBe('unhandled');
          expect(error.message.startsWith('Unhandled effect in sealed: ')).toBe(true);
        }
      }
    });
  });

  describe('drive', () => {
    it('should answer every request and return the completion value', () => {
      const quiz = computation<Ask, number, number>(function* (mailbox) {
        yield ask('a');
        const a = mailbox.take() ?? 0;
        yield ask('b');
        const b = mailbox.take() ?? 0;
        return a * b;
      });

      const answers: Record<string, number> = { a: 6, b: 7 };
      expect(drive(quiz, (request) => answers[request.question])).toBe(42);
    });

    it('should leave the mailbox untouched when the answer is undefined', () => {
      const program = computation<Ask, string, string>(function* (mailbox) {
        yield ask('first');
        yield ask('second');
        return mailbox.take() ?? 'empty';
      });

      const replies = ['one', undefined];
      expect(drive(program, () => replies.shift())).toBe('one');
    });
  });

  it('should treat UnhandledEffectError as a ContractViolationError', () => {
    const error = new UnhandledEffectError(ping);
    expect(error).toBeInstanceOf(ContractViolationError);
    expect(error.name).toBe('UnhandledEffectError');
  });
});
