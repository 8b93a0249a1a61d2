import { expect } from 'chai';

import {
  Actions,
  addTodo,
  decreaseCount,
  increaseCount,
  isAppAction,
  removeTodo,
  reset,
  setCount,
  toggleTodo,
} from '../../src/store/actions';

describe('Action creators', () => {
  it('should build payload-less actions', () => {
    expect(increaseCount()).to.deep.equal({ type: 'INCREASE_COUNT' });
    expect(decreaseCount()).to.deep.equal({ type: 'DECREASE_COUNT' });
    expect(reset()).to.deep.equal({ type: 'RESET' });
  });

  it('should put the payload next to the type', () => {
    expect(addTodo('buy groceries')).to.deep.equal({
      type: 'ADD_TODO',
      todo: 'buy groceries',
    });
    expect(setCount(42)).to.deep.equal({ type: 'SET_COUNT', count: 42 });
    expect(toggleTodo(3)).to.deep.equal({ type: 'TOGGLE_TODO', index: 3 });
    expect(removeTodo(0)).to.deep.equal({ type: 'REMOVE_TODO', index: 0 });
  });

  it('should keep the fixed tag whatever the payload', () => {
    for (const todo of ['', 'a', 'walk the dog', '  spaced  ']) {
      const action = addTodo(todo);
      expect(action.type).to.equal(Actions.ADD_TODO);
      expect(action.todo).to.equal(todo);
    }
  });

  it('should return a new frozen record on each call', () => {
    const first = addTodo('buy groceries');
    const second = addTodo('buy groceries');
    expect(first).to.not.equal(second);
    expect(Object.isFrozen(first)).to.be.true;
    expect(() => {
      Object.assign(first, { todo: 'changed' });
    }).to.throw(TypeError);
    expect(first.todo).to.equal('buy groceries');
  });

  describe('isAppAction', () => {
    it('should accept actions built by the creators', () => {
      for (const action of [
        increaseCount(),
        decreaseCount(),
        setCount(-1),
        addTodo('x'),
        toggleTodo(0),
        removeTodo(1),
        reset(),
      ]) {
        expect(isAppAction(action), action.type).to.be.true;
      }
    });

    it('should accept the same actions parsed from JSON', () => {
      expect(isAppAction(JSON.parse('{"type":"ADD_TODO","todo":"x"}'))).to.be
        .true;
      expect(isAppAction(JSON.parse('{"type":"SET_COUNT","count":7}'))).to.be
        .true;
    });

    it('should reject unknown tags and malformed payloads', () => {
      expect(isAppAction({ type: 'UNKNOWN_ACTION' })).to.be.false;
      expect(isAppAction({ type: 'ADD_TODO' })).to.be.false;
      expect(isAppAction({ type: 'ADD_TODO', todo: 12 })).to.be.false;
      expect(isAppAction({ type: 'SET_COUNT', count: '1' })).to.be.false;
      expect(isAppAction({ type: 'SET_COUNT', count: Infinity })).to.be.false;
      expect(isAppAction({ type: 'TOGGLE_TODO', index: -1 })).to.be.false;
      expect(isAppAction({ type: 'REMOVE_TODO', index: 1.5 })).to.be.false;
      expect(isAppAction('INCREASE_COUNT')).to.be.false;
      expect(isAppAction(null)).to.be.false;
      expect(isAppAction([{ type: 'RESET' }])).to.be.false;
    });
  });
});
