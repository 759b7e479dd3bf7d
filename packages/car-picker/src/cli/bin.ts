#!/usr/bin/env node
import { createCLI } from './index.js';

await createCLI().parseAsync(process.argv);
