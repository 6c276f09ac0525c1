#!/usr/bin/env node
/**
 * devtree CLI
 *
 * Main entry point for the devtree command.
 */

import { main } from './program.js';

await main();
