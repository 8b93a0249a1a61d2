/**
 * Reducers for application state management
 */

import type { Action, Reducer } from './Store';
import { Actions, isAppAction } from './actions';

export interface Todo {
  text: string;
  done: boolean;
}

export interface AppState {
  count: number;
  todos: readonly Todo[];
}

export const initialState: AppState = {
  count: 0,
  todos: [],
};

export type ReducersMapObject<S> = {
  [K in keyof S]: Reducer<S[K]>;
};

/**
 * Builds a reducer over an object state from one reducer per key.
 * Returns the input state itself when no slice changed.
 */
export function combineReducers<S extends object>(
  reducers: ReducersMapObject<S>
): Reducer<S> {
  return (state: S, action: Action): S => {
    let changed = false;
    const next: S = { ...state };
    for (const key in reducers) {
      const previousSlice = state[key];
      const nextSlice = reducers[key](previousSlice, action);
      next[key] = nextSlice;
      if (nextSlice !== previousSlice) changed = true;
    }
    return changed ? next : state;
  };
}

export function counterReducer(count: number, action: Action): number {
  if (!isAppAction(action)) return count;
  switch (action.type) {
    case Actions.INCREASE_COUNT:
      return count + 1;
    case Actions.DECREASE_COUNT:
      return count - 1;
    case Actions.SET_COUNT:
      return action.count;
    default:
      return count;
  }
}

export function todosReducer(
  todos: readonly Todo[],
  action: Action
): readonly Todo[] {
  if (!isAppAction(action)) return todos;
  switch (action.type) {
    case Actions.ADD_TODO:
      return [...todos, { text: action.todo, done: false }];

    case Actions.TOGGLE_TODO: {
      if (action.index >= todos.length) return todos;
      return todos.map((todo, i) =>
        i === action.index ? { ...todo, done: !todo.done } : todo
      );
    }

    case Actions.REMOVE_TODO: {
      if (action.index >= todos.length) return todos;
      return todos.filter((_, i) => i !== action.index);
    }

    default:
      return todos;
  }
}

const slicesReducer = combineReducers<AppState>({
  count: counterReducer,
  todos: todosReducer,
});

export function rootReducer(
  state: AppState = initialState,
  action: Action
): AppState {
  if (isAppAction(action) && action.type === Actions.RESET) {
    return initialState;
  }
  return slicesReducer(state, action);
}
