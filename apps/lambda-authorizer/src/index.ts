import 'dotenv/config';
import { createHandler, createRuntime } from './handler.js';
import { createLogger } from './logger.js';

const runtime = createRuntime(process.env);

if (runtime.isErr()) {
  createLogger('fatal').fatal(
    { variable: runtime.error.variable },
    `Invalid configuration: ${runtime.error.message}`
  );
  throw new Error(runtime.error.message);
}

export const handler = createHandler(runtime.value);
