#!/usr/bin/env node

/**
 * Daybook CLI entry point
 */

import { run } from "./program.js";

process.exitCode = await run(process.argv);
