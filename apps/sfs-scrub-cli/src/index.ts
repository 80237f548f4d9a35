#!/usr/bin/env -S npx tsx
/**
 * sfs-scrub
 *
 * Usage: sfs-scrub <file> [parts...]
 */

import { main } from "./main.js";

process.exitCode = main(process.argv);
