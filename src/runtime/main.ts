/**
 * Bare process entry: `node dist/runtime/main.js`
 */

import 'dotenv/config';
import { main } from './entry.js';

await main();
