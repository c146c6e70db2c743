// Keep the logger silent and off the pretty transport during Vitest runs.
process.env.NODE_ENV = 'test';
