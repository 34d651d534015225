#!/usr/bin/env node
import { main } from '../cli.js';

try {
  process.exitCode = main(process.argv.slice(2));
} catch (err) {
  console.error('Fatal error:', err);
  process.exitCode = 1;
}
