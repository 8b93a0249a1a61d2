/**
 * Mini Store implementation (Redux-like pattern)
 *
 * Dispatches are processed one at a time: an action dispatched while
 * another one is being processed (from a listener or a hook) is queued
 * and reduced afterwards, in submission order.
 */
import type winston from 'winston';

import type { HookRegistry } from '../hooks';
import {
  DispatchInProgressError,
  InvalidActionError,
  ReducerError,
} from '../lib/errors';
import { isAction, runChainedHooks, runHooks } from '../lib/utils';

export type Listener = () => void;
export type Reducer<S, A extends Action = Action> = (state: S, action: A) => S;

export interface Action<T extends string = string> {
  readonly type: T;
}

export interface StoreOptions<S> {
  logger?: winston.Logger;
  hooks?: HookRegistry<S>;
}

export class Store<S> {
  private state: S;
  private reducer: Reducer<S>;
  private listeners: Set<Listener> = new Set();
  private queue: Action[] = [];
  private dispatching = false;
  private reducing = false;
  private logger?: winston.Logger;
  private hooks?: HookRegistry<S>;

  constructor(
    reducer: Reducer<S>,
    initialState: S,
    options: StoreOptions<S> = {}
  ) {
    this.reducer = reducer;
    this.state = initialState;
    this.logger = options.logger;
    this.hooks = options.hooks;
  }

  getState(): S {
    return this.state;
  }

  dispatch<A extends Action>(action: A): void {
    if (!isAction(action)) {
      throw new InvalidActionError(
        'Actions must be plain objects with a non-empty string type'
      );
    }
    if (this.reducing) throw new DispatchInProgressError();

    this.queue.push(action);
    if (this.dispatching) {
      this.logger?.debug(`Queued ${action.type} behind the running dispatch`);
      return;
    }

    this.dispatching = true;
    try {
      let next = this.queue.shift();
      while (next) {
        this.process(next);
        next = this.queue.shift();
      }
    } finally {
      // After a failure, whatever was queued behind it is dropped
      this.queue = [];
      this.dispatching = false;
    }
  }

  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    // Return unsubscribe function
    return () => {
      this.listeners.delete(listener);
    };
  }

  replaceReducer(reducer: Reducer<S>): void {
    this.reducer = reducer;
  }

  private process(received: Action): void {
    const action = runChainedHooks(this.hooks?.beforedispatch, received);
    if (!isAction(action)) {
      throw new InvalidActionError(
        `A beforedispatch hook returned an invalid action for ${received.type}`
      );
    }

    const previous = this.state;
    let next: S;
    this.reducing = true;
    try {
      next = this.reducer(previous, action);
    } catch (err) {
      if (err instanceof DispatchInProgressError) throw err;
      throw new ReducerError(action.type, err);
    } finally {
      this.reducing = false;
    }
    this.state = next;
    this.logger?.debug(`Reduced ${action.type}`);

    runHooks(this.hooks?.afterdispatch, action, previous, next);

    // Only notify if state actually changed
    if (previous === next) return;
    runHooks(this.hooks?.statechange, next, previous);
    // Copy, so that (un)subscribing from a listener applies next time
    for (const listener of [...this.listeners]) {
      listener();
    }
  }
}
