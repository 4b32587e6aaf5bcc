#!/usr/bin/env node
/**
 * kvfn executable
 *
 * @module kv-function-runtime/cli/bin
 */

import 'dotenv/config';
import { handleError, program } from './cli.js';

try {
  await program.parseAsync(process.argv);
} catch (error) {
  handleError(error);
}
