/**
 * @module core/actionLogger
 * Logs every dispatched action (debug) and the state keys it changed (info)
 */
import Plugin from '../abstract/plugin';
import type { Hooks } from '../hooks';
import type { AppState } from '../store/reducers';
import { changedKeys } from '../lib/utils';

export default class ActionLogger extends Plugin {
  name = 'actionLogger';

  hooks: Hooks<AppState> = {
    afterdispatch: (action, previous, next) => {
      this.logger.debug(`Dispatched ${action.type}`);
      if (previous === next) return;
      this.logger.info(
        `${action.type} changed ${changedKeys(previous, next).join(', ')}`
      );
    },
  };
}
