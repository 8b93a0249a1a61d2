/**
 * Command line runner: replays the actions file given by --actions
 * and writes the resulting state to `out`. Logs go to the runtime
 * logger, never to `out`.
 */
import type { ActionFlow } from './index';
import { ConfigError } from '../lib/errors';

export const runCli = async (
  flow: ActionFlow,
  out: NodeJS.WritableStream = process.stdout
): Promise<number> => {
  try {
    await flow.ready;
    if (!flow.config.actions) {
      throw new ConfigError('No actions file given, use --actions <file>');
    }
    const actions = await flow.loadActions(flow.config.actions);
    const state = flow.replay(actions);
    out.write(`${JSON.stringify(state, null, 2)}\n`);
    return 0;
  } catch (err) {
    flow.logger.error(err instanceof Error ? err.message : String(err));
    return 1;
  }
};
