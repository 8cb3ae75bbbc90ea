#!/usr/bin/env node

/**
 * @fileoverview Entrypoint for the `chainreq` binary.
 */

import { run } from './run.ts';

// eslint-disable-next-line antfu/no-top-level-await
await run();
