/**
 * @polybridge/cli - inspect hierarchy files
 */

import { createProgram } from './program.js';

await createProgram().parseAsync();
