/**
 * Types for hooks
 *
 * Hooks run synchronously inside a dispatch: a hook that throws aborts it.
 */
import type { Action } from './store/Store';

export type ChainedHook<T> = (arg: T) => T;
export type VoidHook<T extends unknown[]> = (...args: T) => void;

/**
 * All available hooks
 */
export interface Hooks<S = unknown> {
  // receives the action before the reducer, returns the action to reduce
  beforedispatch?: ChainedHook<Action>;
  // (action, previous, next), run after every reducer call
  afterdispatch?: VoidHook<[Action, S, S]>;
  // (next, previous), run only when the reducer returned a new reference
  statechange?: VoidHook<[S, S]>;
}

export type HookName = keyof Hooks;

export type HookRegistry<S = unknown> = {
  [K in HookName]-?: NonNullable<Hooks<S>[K]>[];
};

export const createHookRegistry = <S>(): HookRegistry<S> => ({
  beforedispatch: [],
  afterdispatch: [],
  statechange: [],
});
