/**
 * Action types and action creators
 *
 * Creators are pure and return frozen records: payload fields sit next
 * to the type, e.g. addTodo('buy groceries') gives
 * { type: 'ADD_TODO', todo: 'buy groceries' }.
 */

import { isPlainObject } from '../lib/utils';

export const Actions = {
  INCREASE_COUNT: 'INCREASE_COUNT',
  DECREASE_COUNT: 'DECREASE_COUNT',
  SET_COUNT: 'SET_COUNT',
  ADD_TODO: 'ADD_TODO',
  TOGGLE_TODO: 'TOGGLE_TODO',
  REMOVE_TODO: 'REMOVE_TODO',
  RESET: 'RESET',
} as const;

export interface IncreaseCountAction {
  readonly type: typeof Actions.INCREASE_COUNT;
}

export interface DecreaseCountAction {
  readonly type: typeof Actions.DECREASE_COUNT;
}

export interface SetCountAction {
  readonly type: typeof Actions.SET_COUNT;
  readonly count: number;
}

export interface AddTodoAction {
  readonly type: typeof Actions.ADD_TODO;
  readonly todo: string;
}

export interface ToggleTodoAction {
  readonly type: typeof Actions.TOGGLE_TODO;
  readonly index: number;
}

export interface RemoveTodoAction {
  readonly type: typeof Actions.REMOVE_TODO;
  readonly index: number;
}

export interface ResetAction {
  readonly type: typeof Actions.RESET;
}

export type AppAction =
  | IncreaseCountAction
  | DecreaseCountAction
  | SetCountAction
  | AddTodoAction
  | ToggleTodoAction
  | RemoveTodoAction
  | ResetAction;

export const increaseCount = (): IncreaseCountAction =>
  Object.freeze({ type: Actions.INCREASE_COUNT });

export const decreaseCount = (): DecreaseCountAction =>
  Object.freeze({ type: Actions.DECREASE_COUNT });

export const setCount = (count: number): SetCountAction =>
  Object.freeze({ type: Actions.SET_COUNT, count });

export const addTodo = (todo: string): AddTodoAction =>
  Object.freeze({ type: Actions.ADD_TODO, todo });

export const toggleTodo = (index: number): ToggleTodoAction =>
  Object.freeze({ type: Actions.TOGGLE_TODO, index });

export const removeTodo = (index: number): RemoveTodoAction =>
  Object.freeze({ type: Actions.REMOVE_TODO, index });

export const reset = (): ResetAction => Object.freeze({ type: Actions.RESET });

const isIndex = (value: unknown): value is number =>
  typeof value === 'number' && Number.isInteger(value) && value >= 0;

/**
 * Checks that an untyped value (e.g. parsed from JSON) is one of the
 * actions above, payload included
 */
export function isAppAction(value: unknown): value is AppAction {
  if (!isPlainObject(value)) return false;
  switch (value.type) {
    case Actions.INCREASE_COUNT:
    case Actions.DECREASE_COUNT:
    case Actions.RESET:
      return true;
    case Actions.SET_COUNT:
      return typeof value.count === 'number' && Number.isFinite(value.count);
    case Actions.ADD_TODO:
      return typeof value.todo === 'string';
    case Actions.TOGGLE_TODO:
    case Actions.REMOVE_TODO:
      return isIndex(value.index);
    default:
      return false;
  }
}
