import { fileURLToPath } from 'url';

import Plugin from '../../../src/abstract/plugin';

export default class CycleA extends Plugin {
  name = 'cycleA';
  dependencies = {
    cycleB: fileURLToPath(new URL('../cycleB/index.ts', import.meta.url)),
  };
}
