import { createStore as createVanillaStore } from "zustand/vanilla";
import type { Logger } from "@/lib/logger";
import { toError } from "@/lib/errors";

/**
 * Feature store runtime.
 *
 * Reducers are pure: they return the next state plus a list of commands
 * (plain data). The store keeps state in a zustand vanilla store and runs
 * each reduction's commands concurrently through the feature's executor,
 * which reports results back as actions.
 */

export interface ReduceResult<S, C> {
  state: S;
  commands: C[];
}

/** Outcome of an effect, sent back to the reducer as an action payload */
export type TaskResult<T> = { ok: true; value: T } | { ok: false; error: Error };

export type Reducer<S, A, C, D> = (state: S, action: A, deps: D) => ReduceResult<S, C>;

export interface StoreTask {
  /** Resolves once every command started by the action has settled. Never rejects. */
  readonly finished: Promise<void>;
}

export interface CommandContext<A> {
  send(action: A): StoreTask;
  /** Aborted when the store is torn down */
  signal: AbortSignal;
}

export type CommandExecutor<A, C> = (command: C, context: CommandContext<A>) => Promise<void>;

export interface Store<S, A> {
  getState(): S;
  send(action: A): StoreTask;
  subscribe(listener: (state: S, previous: S) => void): () => void;
  /** Wait until no command is in flight, including ones started while waiting */
  settle(): Promise<void>;
  teardown(): void;
}

export interface StoreOptions<S, A, C, D> {
  name: string;
  initialState: S;
  reducer: Reducer<S, A, C, D>;
  deps: D;
  execute: CommandExecutor<A, C>;
  logger: Logger;
  describeCommand?: (command: C) => string;
  onCommandError?: (error: Error, command: C) => void;
}

export function noCommands<S, C>(state: S): ReduceResult<S, C> {
  return { state, commands: [] };
}

const settledTask: StoreTask = { finished: Promise.resolve() };

export function createStore<S, A, C, D>(options: StoreOptions<S, A, C, D>): Store<S, A> {
  const { name, reducer, deps, execute, logger, describeCommand, onCommandError } = options;
  const state = createVanillaStore<S>()(() => options.initialState);
  const controller = new AbortController();
  const inFlight = new Set<Promise<void>>();

  const runCommand = async (command: C): Promise<void> => {
    try {
      await execute(command, { send, signal: controller.signal });
    } catch (thrown) {
      const error = toError(thrown);
      logger.error(`[${name}] Command failed`, {
        command: describeCommand ? describeCommand(command) : undefined,
        error,
      });
      onCommandError?.(error, command);
    }
  };

  function send(action: A): StoreTask {
    if (controller.signal.aborted) {
      logger.debug(`[${name}] Ignoring action after teardown`);
      return settledTask;
    }

    const result = reducer(state.getState(), action, deps);
    if (result.state !== state.getState()) {
      state.setState(result.state, true);
    }
    if (result.commands.length === 0) return settledTask;

    const finished = Promise.allSettled(result.commands.map(runCommand)).then(() => undefined);
    inFlight.add(finished);
    void finished.finally(() => inFlight.delete(finished));
    return { finished };
  }

  return {
    getState: () => state.getState(),
    send,
    subscribe: (listener) => state.subscribe(listener),
    async settle() {
      while (inFlight.size > 0) {
        await Promise.all([...inFlight]);
      }
    },
    teardown() {
      controller.abort();
    },
  };
}
