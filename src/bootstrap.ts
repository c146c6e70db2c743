// Imported first by the CLI entry so LOG_LEVEL and NODE_ENV from .env reach the logger.
import { loadEnvironment } from './utils/env.js';

loadEnvironment();
