import path from 'node:path';
import dotenv from 'dotenv';

const DEFAULT_ENV_PATH = path.resolve('.env');

/** Loads `.env` into process.env without overriding variables already set. A missing file is fine. */
export function loadEnvironment(envPath = DEFAULT_ENV_PATH): void {
  const result = dotenv.config({ path: path.resolve(envPath) });
  if (result.error && (result.error as NodeJS.ErrnoException).code !== 'ENOENT') {
    throw result.error;
  }
}
