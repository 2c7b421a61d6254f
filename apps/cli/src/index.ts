#!/usr/bin/env node

import { createProgram } from './program.js';
import { FileHouseholdStore } from './store.js';
import { resolveHouseholdPath } from './config.js';
import type { GlobalOptions } from './helpers.js';

// The household path depends on --file, which is only known once parsing starts
const program = createProgram(new FileHouseholdStore(() => resolveHouseholdPath(program.opts<GlobalOptions>().file)));

program.parse();
