import { expect } from 'chai';

import { Store } from '../../src/store/Store';
import {
  addTodo,
  decreaseCount,
  increaseCount,
  removeTodo,
  reset,
  setCount,
  toggleTodo,
} from '../../src/store/actions';
import {
  combineReducers,
  counterReducer,
  initialState,
  rootReducer,
  todosReducer,
  type AppState,
} from '../../src/store/reducers';
import { deepFreeze } from '../../src/lib/utils';

describe('Reducers', () => {
  const state = (count: number, texts: string[] = []): AppState =>
    deepFreeze({
      count,
      todos: texts.map(text => ({ text, done: false })),
    });

  describe('rootReducer', () => {
    it('should increase the count', () => {
      expect(rootReducer({ count: 0, todos: [] }, { type: 'INCREASE_COUNT' }))
        .to.deep.equal({ count: 1, todos: [] });
    });

    it('should start from the initial state', () => {
      expect(rootReducer(undefined, increaseCount())).to.deep.equal({
        count: 1,
        todos: [],
      });
    });

    it('should return the same state for unknown actions', () => {
      const before = state(3, ['a']);
      expect(rootReducer(before, { type: 'UNKNOWN_ACTION' })).to.equal(before);
    });

    it('should return the same state for malformed payloads', () => {
      const before = state(3, ['a']);
      expect(rootReducer(before, { type: 'ADD_TODO' })).to.equal(before);
      expect(rootReducer(before, { type: 'TOGGLE_TODO' })).to.equal(before);
    });

    it('should leave count unchanged when adding a todo', () => {
      const next = rootReducer(state(5), addTodo('buy groceries'));
      expect(next).to.deep.equal({
        count: 5,
        todos: [{ text: 'buy groceries', done: false }],
      });
    });

    it('should reset to the initial state', () => {
      expect(rootReducer(state(5, ['a']), reset())).to.equal(initialState);
    });

    it('should not mutate its input', () => {
      // inputs are frozen: any mutation would throw
      const before = state(1, ['a', 'b']);
      const next = rootReducer(before, toggleTodo(1));
      expect(before.todos[1].done).to.be.false;
      expect(next.todos[1].done).to.be.true;
      expect(next.todos[0]).to.equal(before.todos[0]);
    });
  });

  describe('counterReducer', () => {
    it('should follow count actions', () => {
      expect(counterReducer(1, increaseCount())).to.equal(2);
      expect(counterReducer(1, decreaseCount())).to.equal(0);
      expect(counterReducer(1, setCount(9))).to.equal(9);
      expect(counterReducer(1, addTodo('x'))).to.equal(1);
    });
  });

  describe('todosReducer', () => {
    const todos = state(0, ['a', 'b', 'c']).todos;

    it('should toggle a todo', () => {
      const next = todosReducer(todos, toggleTodo(0));
      expect(next.map(t => t.done)).to.deep.equal([true, false, false]);
      expect(todosReducer(next, toggleTodo(0))[0].done).to.be.false;
    });

    it('should remove a todo', () => {
      expect(todosReducer(todos, removeTodo(1)).map(t => t.text)).to.deep.equal(
        ['a', 'c']
      );
    });

    it('should ignore out of range indexes', () => {
      expect(todosReducer(todos, toggleTodo(3))).to.equal(todos);
      expect(todosReducer(todos, removeTodo(10))).to.equal(todos);
    });
  });

  describe('combineReducers', () => {
    const combined = combineReducers<{ a: number; b: string }>({
      a: (a, action) => (action.type === 'A' ? a + 1 : a),
      b: (b, action) => (action.type === 'B' ? `${b}!` : b),
    });

    it('should only rebuild when a slice changes', () => {
      const before = { a: 0, b: 'x' };
      expect(combined(before, { type: 'NONE' })).to.equal(before);
      expect(combined(before, { type: 'A' })).to.deep.equal({ a: 1, b: 'x' });
      expect(combined(before, { type: 'B' })).to.deep.equal({ a: 0, b: 'x!' });
      expect(before).to.deep.equal({ a: 0, b: 'x' });
    });
  });

  describe('with a store', () => {
    it('should be cumulative, not idempotent', () => {
      const store = new Store<AppState>(rootReducer, initialState);
      store.dispatch(increaseCount());
      store.dispatch(increaseCount());
      expect(store.getState().count).to.equal(2);
    });

    it('should leave dispatched actions untouched', () => {
      const store = new Store<AppState>(rootReducer, initialState);
      const action = addTodo('buy groceries');
      store.dispatch(action);
      store.dispatch(action);
      store.dispatch(increaseCount());
      expect(action).to.deep.equal({ type: 'ADD_TODO', todo: 'buy groceries' });
      expect(store.getState().todos).to.have.length(2);
    });
  });
});
