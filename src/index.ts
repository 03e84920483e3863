#!/usr/bin/env node
import { createCLI } from './adapters/cli/index.js';

await createCLI().parseAsync(process.argv);
