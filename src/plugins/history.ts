/**
 * @module core/history
 * Keeps the states replaced by dispatches, for debugging.
 * At most history_limit states are kept, oldest dropped first.
 */
import Plugin from '../abstract/plugin';
import type { Hooks } from '../hooks';
import type { AppState } from '../store/reducers';

export default class History extends Plugin {
  name = 'history';

  private states: AppState[] = [];

  hooks: Hooks<AppState> = {
    statechange: (_next, previous) => {
      this.record(previous);
    },
  };

  // oldest first
  past(): readonly AppState[] {
    return [...this.states];
  }

  clear(): void {
    this.states = [];
  }

  private record(state: AppState): void {
    const limit = this.config.history_limit;
    if (limit === 0) return;
    this.states.push(state);
    if (this.states.length > limit) {
      this.states.splice(0, this.states.length - limit);
    }
  }
}
