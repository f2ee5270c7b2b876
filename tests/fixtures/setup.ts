import { afterEach } from 'vitest';
import { ensureDataDirectory } from './db-utils.js';

// Ensure data directory exists
ensureDataDirectory();

afterEach(() => {
  // Commands under test set the exit status; keep it from failing the run
  process.exitCode = undefined;
});
