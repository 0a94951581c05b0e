#!/usr/bin/env node
import { loadEnvDefaults, main } from './cli.js';

loadEnvDefaults();
process.exitCode = await main(process.argv.slice(2), process.env);
