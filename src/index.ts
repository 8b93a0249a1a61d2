import { ActionFlow } from './bin';
import { runCli } from './bin/cli';

process.exitCode = await runCli(new ActionFlow());
