/**
 * @module core/freeze
 * Deep-freezes dispatched actions and installed states, so that a
 * reducer or listener mutating them throws
 */
import Plugin from '../abstract/plugin';
import type { ActionFlow } from '../bin';
import type { Hooks } from '../hooks';
import type { AppState } from '../store/reducers';
import { deepFreeze } from '../lib/utils';

export default class Freeze extends Plugin {
  name = 'freeze';

  hooks: Hooks<AppState> = {
    beforedispatch: action => deepFreeze(action),
    afterdispatch: (_action, _previous, next) => {
      deepFreeze(next);
    },
  };

  constructor(server: ActionFlow) {
    super(server);
    deepFreeze(server.getState());
  }
}
