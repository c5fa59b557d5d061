import { createProgram } from './program.js';
import { handleError } from './utils.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    process.exitCode = handleError(error);
  });
