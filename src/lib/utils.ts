/**
 * @file src/lib/utils.ts
 * @description Utility functions
 */
import type { Action } from '../store/Store';

import { PluginError } from './errors';

export const isPlainObject = (
  value: unknown
): value is Record<string, unknown> => {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};

export const isAction = (value: unknown): value is Action =>
  isPlainObject(value) &&
  typeof value.type === 'string' &&
  value.type.length > 0;

// Freezes value and everything reachable from it, in place
export const deepFreeze = <T>(value: T, seen = new WeakSet<object>()): T => {
  if (typeof value !== 'object' || value === null || seen.has(value)) {
    return value;
  }
  seen.add(value);
  Object.freeze(value);
  for (const child of Object.values(value)) {
    deepFreeze<unknown>(child, seen);
  }
  return value;
};

// runHooks gives the same arguments to each hook, in registration order
export const runHooks = <A extends unknown[]>(
  hooks: ((...args: A) => void)[] | undefined,
  ...args: A
): void => {
  if (hooks) {
    for (const hook of hooks) {
      hook(...args);
    }
  }
};

// runChainedHooks gives each hook the result of the previous one
// Any error stops the process
export const runChainedHooks = <T>(
  hooks: ((arg: T) => T)[] | undefined,
  arg: T
): T => {
  if (hooks) {
    for (const hook of hooks) {
      arg = hook(arg);
    }
  }
  return arg;
};

// checkHook returns the hook, refusing anything that is not a function
export const checkHook = <F>(
  hook: F | undefined,
  description: string
): F | undefined => {
  if (hook !== undefined && typeof hook !== 'function') {
    throw new PluginError(`${description} is invalid`);
  }
  return hook;
};

// Top-level keys whose value is not the same reference in both objects
export const changedKeys = (previous: object, next: object): string[] => {
  const before = new Map<string, unknown>(Object.entries(previous));
  return Object.entries(next)
    .filter(([key, value]) => before.get(key) !== value)
    .map(([key]) => key);
};
