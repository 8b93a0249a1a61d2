/**
 * Abstract class for plugins
 */
import type winston from 'winston';

import type { ActionFlow, Config } from '../bin';
import type { Hooks } from '../hooks';
import type { AppState } from '../store/reducers';

export default abstract class Plugin {
  /**
   * Properties inherited from parent (ActionFlow)
   */

  /* parent object (ActionFlow runtime) */
  server: ActionFlow;
  /* Global configuration */
  config: Config;
  /* Logger */
  logger: winston.Logger;

  /**
   * Interfaces
   */

  /* Hooks to register */
  hooks?: Hooks<AppState>;

  /* Needed plugins: name => plugin to load when missing */
  dependencies?: Record<string, string>;

  /* Uniq name of this plugin */
  abstract name: string;

  /**
   * Constructor
   * @param server ActionFlow object
   */
  constructor(server: ActionFlow) {
    this.server = server;
    this.config = server.config;
    this.logger = server.logger;
  }
}
