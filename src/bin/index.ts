/**
 * @packageDocumentation actionflow
 *
 * Runtime file
 * It parses the configuration, builds the logger and the store, and
 * loads plugins
 *
 * @example
 * const flow = new ActionFlow();
 *
 * await flow.ready;
 * flow.dispatch(addTodo('buy groceries'));
 */
import { readFile } from 'fs/promises';

import type winston from 'winston';

import { parseConfig } from '../lib/parseConfig';
import configArgs, { type Config } from '../config/args';
import { createHookRegistry, type HookRegistry } from '../hooks';
import Plugin from '../abstract/plugin';
import { buildLogger } from '../logger/winston';
import { Store, type Action, type Listener } from '../store/Store';
import { isAppAction } from '../store/actions';
import { initialState, rootReducer, type AppState } from '../store/reducers';
import { InvalidActionError, PluginError } from '../lib/errors';
import { checkHook, isAction } from '../lib/utils';

export type { Config };
export * from '../store/Store';
export * from '../store/actions';
export * from '../store/reducers';
export type { Hooks, HookRegistry, ChainedHook, VoidHook } from '../hooks';
export {
  ActionFlowError,
  InvalidActionError,
  DispatchInProgressError,
  ReducerError,
  PluginError,
  ConfigError,
} from '../lib/errors';
export { Plugin };

type PluginClass = new (server: ActionFlow) => Plugin;

const corePlugins = new Map<string, () => Promise<{ default: PluginClass }>>([
  ['actionLogger', () => import('../plugins/actionLogger')],
  ['freeze', () => import('../plugins/freeze')],
  ['history', () => import('../plugins/history')],
]);

const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);

// "path/to/plugin:alias" => ["path/to/plugin", "alias"]
const splitPluginSpec = (spec: string): [string, string | undefined] => {
  const pos = spec.lastIndexOf(':');
  if (pos > 0 && /^[\w-]+$/.test(spec.substring(pos + 1))) {
    return [spec.substring(0, pos), spec.substring(pos + 1)];
  }
  return [spec, undefined];
};

const defaultExport = (mod: unknown): unknown =>
  typeof mod === 'object' && mod !== null && 'default' in mod
    ? mod.default
    : mod;

// Arrow functions have no prototype and cannot be constructed
const isPluginClass = (value: unknown): value is PluginClass =>
  typeof value === 'function' && value.prototype instanceof Plugin;

/**
 * @class ActionFlow
 */
export class ActionFlow {
  config: Config;
  logger: winston.Logger;
  ready: Promise<void>;
  hooks: HookRegistry<AppState> = createHookRegistry<AppState>();
  loadedPlugins: Map<string, Plugin> = new Map();
  store: Store<AppState>;
  private loading: Set<string> = new Set();

  constructor(argv: string[] = process.argv, logger?: winston.Logger) {
    this.config = parseConfig(configArgs, argv);
    this.logger = logger ?? buildLogger(this.config);
    this.store = new Store<AppState>(
      rootReducer,
      { ...initialState, count: this.config.initial_count },
      { logger: this.logger, hooks: this.hooks }
    );
    this.ready = this.loadPlugins(this.config.plugin);
  }

  getState(): AppState {
    return this.store.getState();
  }

  dispatch<A extends Action>(action: A): void {
    this.store.dispatch(action);
  }

  subscribe(listener: Listener): () => void {
    return this.store.subscribe(listener);
  }

  /**
   * Dispatches actions in order
   * @returns the final state
   */
  replay(actions: readonly Action[]): AppState {
    for (const action of actions) {
      this.dispatch(action);
    }
    return this.getState();
  }

  /**
   * Reads a JSON array of actions
   */
  async loadActions(file: string): Promise<Action[]> {
    const content = await readFile(file, 'utf8');
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      throw new InvalidActionError(
        `${file} is not valid JSON: ${errorMessage(err)}`
      );
    }
    if (!Array.isArray(parsed)) {
      throw new InvalidActionError(`${file} must contain an array of actions`);
    }
    const actions: Action[] = [];
    parsed.forEach((value: unknown, index: number) => {
      if (!isAction(value)) {
        throw new InvalidActionError(
          `Entry #${index} of ${file} is not an action`
        );
      }
      if (!isAppAction(value)) {
        this.logger.notice(
          `Entry #${index} of ${file} (${value.type}) is ignored by the reducer`
        );
      }
      actions.push(value);
    });
    this.logger.debug(`Read ${actions.length} actions from ${file}`);
    return actions;
  }

  getPlugin(name: string): Plugin | undefined {
    return this.loadedPlugins.get(name);
  }

  // Plugins are loaded one after the other, since hooks run in load order
  private async loadPlugins(specs: string[]): Promise<void> {
    try {
      for (const spec of specs) {
        await this.loadPlugin(spec);
      }
    } catch (err) {
      this.logger.error(`Error loading plugins: ${errorMessage(err)}`);
      throw err;
    }
  }

  async loadPlugin(spec: string): Promise<boolean> {
    const [pluginName, alias] = splitPluginSpec(spec);
    if (this.loading.has(pluginName)) {
      throw new PluginError(`Circular plugin dependency on ${pluginName}`);
    }
    this.logger.debug(`Loading plugin ${pluginName}`);
    this.loading.add(pluginName);
    try {
      const PluginCtor = await this.importPlugin(pluginName);
      const obj = new PluginCtor(this);
      const registered = await this.registerPlugin(pluginName, obj, alias);
      if (registered) this.logger.debug(`Plugin ${obj.name} loaded`);
      return registered;
    } finally {
      this.loading.delete(pluginName);
    }
  }

  async registerPlugin(
    pluginName: string,
    obj: Plugin,
    alias?: string
  ): Promise<boolean> {
    if (!obj.name) obj.name = pluginName;
    if (alias) obj.name = alias;
    if (this.loadedPlugins.has(obj.name)) {
      this.logger.info(`Plugin ${pluginName} already loaded as ${obj.name}`);
      return false;
    }
    this.logger.debug(`Registering plugin ${pluginName} as ${obj.name}`);
    if (obj.dependencies) {
      for (const [dependency, spec] of Object.entries(obj.dependencies)) {
        if (!this.loadedPlugins.has(dependency)) {
          this.logger.debug(
            `Plugin ${obj.name} depends on ${dependency}, loading it first`
          );
          await this.loadPlugin(spec);
        }
      }
    }
    if (obj.hooks) {
      const prefix = `Plugin ${obj.name}: hook`;
      const before = checkHook(
        obj.hooks.beforedispatch,
        `${prefix} beforedispatch`
      );
      const after = checkHook(
        obj.hooks.afterdispatch,
        `${prefix} afterdispatch`
      );
      const change = checkHook(obj.hooks.statechange, `${prefix} statechange`);
      if (before) this.hooks.beforedispatch.push(before);
      if (after) this.hooks.afterdispatch.push(after);
      if (change) this.hooks.statechange.push(change);
    }
    this.loadedPlugins.set(obj.name, obj);
    return true;
  }

  private async importPlugin(pluginName: string): Promise<PluginClass> {
    if (pluginName.startsWith('core/')) {
      const loader = corePlugins.get(pluginName.substring('core/'.length));
      if (!loader) throw new PluginError(`Unknown core plugin ${pluginName}`);
      return (await loader()).default;
    }
    let mod: unknown;
    try {
      mod = await import(pluginName);
    } catch (err) {
      throw new PluginError(
        `Failed to load plugin ${pluginName}: ${errorMessage(err)}`
      );
    }
    const candidate = defaultExport(mod);
    if (!isPluginClass(candidate)) {
      throw new PluginError(`${pluginName} does not export a plugin class`);
    }
    return candidate;
  }
}
