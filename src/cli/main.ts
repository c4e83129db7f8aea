#!/usr/bin/env node
// src/cli/main.ts

import { run } from './index.js';

await run();
