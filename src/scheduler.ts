/**
 * @module
 * A cooperative task scheduler. It multiplexes a root computation with a
 * set of sub-computations (tasks) the root spawns while it runs, all on one
 * logical thread.
 *
 * The root yields `spawnTask(descriptor)` to start a task. A task yields
 * `output(value)` to hand a value to the root. Any other request, from the
 * root or a task, is forwarded outward to the next handler layer. The
 * scheduler shares the root's mailbox, so every reply lands there unless
 * `replies: 'task'` asks for replies to task requests to go to the task.
 *
 * ---
 *
 * ### One tick
 *
 * 1. If the root is alive, resume it once. A spawn inserts a task. A
 *    forwarded request is surfaced before any task is polled.
 * 2. Poll every live task once, in ascending task id order. A forwarded
 *    request is surfaced before the next task is polled. Completed tasks
 *    are dropped. Outputs go into the root's mailbox, and a later
 *    output in the same tick overwrites an earlier one.
 * 3. Stop once the root has completed and no task is left.
 */

import { type Selector, type Tagged, makeSelector, partition } from './algebra';
import { Computation, type Stepper } from './computation';
import { DuplicateTaskError, describeRequest } from './errors';
import { type Logger, noopLogger } from './logger';
import { type Mailbox } from './mailbox';
import { type CompareIds, TaskTable, compareTaskIds } from './task-table';

// =================================================================
// Section 1: Scheduler Messages
// =================================================================

/** Tag of the message a root yields to start a task. */
export const SPAWN = '@@spawn';

/** Tag of the message a task yields to hand a value to the root. */
export const OUTPUT = '@@output';

/** Asks the scheduler to start a task described by `task`. */
export interface SpawnRequest<D> {
  readonly _tag: typeof SPAWN;
  readonly task: D;
}

/** Delivers `value` into the root's mailbox. */
export interface OutputRequest<O> {
  readonly _tag: typeof OUTPUT;
  readonly value: O;
}

/** Builds a spawn request. Use as `yield spawnTask(descriptor)`. */
export function spawnTask<D>(task: D): SpawnRequest<D> {
  return { _tag: SPAWN, task };
}

/** Builds an output. Use as `yield output(value)` inside a task. */
export function output<O>(value: O): OutputRequest<O> {
  return { _tag: OUTPUT, value };
}

/** The task descriptors a root may spawn, read off its request union. */
export type DescriptorOf<Y> = Y extends SpawnRequest<infer D> ? D : never;

/**
 * Builds the sub-computation for one spawned task. It may yield outputs for
 * the root and any requests `TF` it wants forwarded outward.
 */
export type TaskFactory<D, TF extends Tagged, In, TR = void> = (
  descriptor: D,
) => Computation<TF | OutputRequest<In>, In, TR>;

/** What a scheduler built over root requests `Y` and task requests `TF` yields. */
export type SchedulerYield<Y extends Tagged, TF extends Tagged, In> =
  | Exclude<Y, SpawnRequest<DescriptorOf<Y>>>
  | Exclude<TF | OutputRequest<In>, OutputRequest<In>>;

// =================================================================
// Section 2: Options
// =================================================================

/**
 * What to do when a spawn reuses the id of a live task.
 * - `replace`: the new task takes the slot; the old one is discarded.
 * - `keep`: the spawn is ignored.
 * - `reject`: throw `DuplicateTaskError`.
 */
export type DuplicatePolicy = 'replace' | 'keep' | 'reject';

/**
 * Where the reply to a request forwarded by a task is delivered.
 * - `root`: the root's mailbox, like every other reply.
 * - `task`: moved from the root's mailbox into the task's own mailbox, so
 *   the task can read it (for instance through `perform`).
 */
export type ReplyDelivery = 'root' | 'task';

/** Passed to `onTick` after every tick. */
export interface TickReport<Id> {
  /** 1-based tick counter. */
  tick: number;
  /** Whether the root is still alive after this tick. */
  rootAlive: boolean;
  /** Ids polled this tick, in poll order. */
  polled: Id[];
  /** Ids still live after this tick. */
  live: Id[];
}

export interface TaskSchedulerOptions<D, Id> {
  /** Extracts the unique id of a task from its descriptor. */
  taskId: (descriptor: D) => Id;
  /** Order of task ids. Defaults to `compareTaskIds`. */
  compareIds?: CompareIds<Id>;
  /** @default 'replace' */
  onDuplicate?: DuplicatePolicy;
  /** @default 'root' */
  replies?: ReplyDelivery;
  onTick?: (report: TickReport<Id>) => void;
  logger?: Logger;
  /** Used in log lines. @default 'spawn' */
  name?: string;
}

// =================================================================
// Section 3: The Scheduler
// =================================================================

interface LiveTask<T extends Tagged, In, TR> {
  readonly step: Stepper<T, TR>;
  readonly mailbox: Mailbox<In>;
}

function descriptorOf<D>(request: SpawnRequest<D>): D {
  return request.task;
}

function outputValue<O>(request: OutputRequest<O>): O {
  return request.value;
}

/**
 * The computation produced by `spawn`. It shares the root's mailbox.
 */
export class TaskScheduler<Y extends Tagged, In, R, Id> extends Computation<Y, In, R> {
  constructor(
    mailbox: Mailbox<In>,
    body: Iterator<Y, R, undefined>,
    private readonly listIds: () => Id[],
  ) {
    super(mailbox, body);
  }

  /**
   * Ids of the live tasks, in poll order. While suspended in the middle of a
   * tick, tasks that completed earlier in that tick are already gone.
   */
  liveTaskIds(): Id[] {
    return this.listIds();
  }
}

/**
 * Wraps `root` in a task scheduler. The root is consumed.
 *
 * @example
 * ```typescript
 * type Job = { id: number; steps: number };
 *
 * const root = computation(function* (mailbox: Mailbox<number>) {
 *   yield spawnTask<Job>({ id: 1, steps: 3 });
 * });
 *
 * const scheduler = spawn(root, (job) => computation(function* () {
 *   for (let i = 0; i < job.steps; i++) yield output(i);
 * }), { taskId: (job) => job.id });
 *
 * scheduler.run();
 * ```
 */
export function spawn<Y extends Tagged, In, R, Id, TF extends Tagged = never, TR = void>(
  root: Computation<Y, In, R>,
  factory: TaskFactory<DescriptorOf<Y>, TF, In, TR>,
  options: TaskSchedulerOptions<DescriptorOf<Y>, Id>,
): TaskScheduler<SchedulerYield<Y, TF, In>, In, R, Id> {
  const name = options.name ?? 'spawn';
  const logger = options.logger ?? noopLogger;
  const onDuplicate = options.onDuplicate ?? 'replace';
  const compare: CompareIds<Id> = options.compareIds ?? compareTaskIds;
  const replies = options.replies ?? 'root';

  const spawns: Selector<SpawnRequest<DescriptorOf<Y>>> = makeSelector<SpawnRequest<DescriptorOf<Y>>>([SPAWN]);
  const outputs: Selector<OutputRequest<In>> = makeSelector<OutputRequest<In>>([OUTPUT]);

  const rootMailbox = root.mailbox;
  const resumeRoot = root.detach();
  const tasks = new TaskTable<Id, LiveTask<TF | OutputRequest<In>, In, TR>>(compare);

  function deliver(target: Mailbox<In>): void {
    const reply = rootMailbox.takeSafe();
    if (reply.isOk()) {
      target.put(reply.value);
    }
  }

  function admit(descriptor: DescriptorOf<Y>): void {
    const id = options.taskId(descriptor);
    if (tasks.has(id)) {
      switch (onDuplicate) {
        case 'reject':
          throw new DuplicateTaskError(id);
        case 'keep':
          logger.warn(`[${name}] task ${describeRequest(id)} is already live; spawn ignored`);
          return;
        case 'replace':
          logger.warn(`[${name}] replacing live task ${describeRequest(id)}`);
          break;
      }
    }
    const task = factory(descriptor);
    tasks.set(id, { step: task.detach(), mailbox: task.mailbox });
    logger.debug(`[${name}] spawned task ${describeRequest(id)}`);
  }

  function* schedule(): Generator<SchedulerYield<Y, TF, In>, R, unknown> {
    let completion: { readonly value: R } | undefined;

    for (let tick = 1; ; tick++) {
      if (completion === undefined) {
        const step = resumeRoot();
        if (step.done) {
          completion = { value: step.value };
          logger.debug(`[${name}] root completed`);
        } else {
          const split = partition(step.value, spawns);
          if (split.isOk()) {
            admit(descriptorOf<DescriptorOf<Y>>(split.value));
          } else {
            yield split.error;
          }
        }
      }

      // Only the root spawns, so the table changes during polling by removal alone.
      const polled: Id[] = [];
      for (const [id, task] of tasks.snapshot()) {
        polled.push(id);
        const step = task.step();
        if (step.done) {
          tasks.delete(id);
          logger.debug(`[${name}] task ${describeRequest(id)} completed`);
          continue;
        }
        const split = partition(step.value, outputs);
        if (split.isErr()) {
          yield split.error;
          if (replies === 'task') {
            deliver(task.mailbox);
          }
          continue;
        }
        if (completion === undefined) {
          rootMailbox.put(outputValue<In>(split.value));
        } else {
          logger.warn(`[${name}] root has completed; dropped output of task ${describeRequest(id)}`);
        }
      }

      const live = tasks.ids();
      logger.debug(`[${name}] tick ${tick}: polled ${polled.length}, ${live.length} live`);
      options.onTick?.({ tick, rootAlive: completion === undefined, polled, live });

      if (completion !== undefined && tasks.isEmpty) {
        return completion.value;
      }
    }
  }

  return new TaskScheduler<SchedulerYield<Y, TF, In>, In, R, Id>(rootMailbox, schedule(), () => tasks.ids());
}
