#!/usr/bin/env node

/**
 * raw-transfer - upload and download directory trees to a raw artifact repository
 */

import { createRequire } from 'module';
import { runCli } from './cli.js';

const require = createRequire(import.meta.url);
const pkg: unknown = require('../package.json');
const version =
  typeof pkg === 'object' && pkg !== null && typeof Reflect.get(pkg, 'version') === 'string'
    ? String(Reflect.get(pkg, 'version'))
    : '0.0.0';

process.exitCode = await runCli(process.argv, { version });
