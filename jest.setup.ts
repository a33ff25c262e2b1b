// jest.setup.ts
import 'reflect-metadata';

process.env.LOG_LEVEL = 'silent';
process.env.LOG_TO_CONSOLE = 'false';
process.env.LOG_TO_FILE = 'false';
