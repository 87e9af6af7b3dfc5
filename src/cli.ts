#!/usr/bin/env node
import { createRequire } from 'node:module';

import { buildProgram } from './cli/program.js';
import { harvestOrchestrator } from './index.js';

const require = createRequire(import.meta.url);
// eslint-disable-next-line @typescript-eslint/no-var-requires -- package.json access for CLI metadata
const pkg = require('../package.json') as { version?: string };

const program = buildProgram({
  version: pkg.version ?? '0.0.0',
  run: (config) => harvestOrchestrator(config),
});

await program.parseAsync(process.argv);
