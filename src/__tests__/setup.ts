/**
 * Jest test setup. Runs before each test file is loaded.
 */
import 'reflect-metadata';

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
process.env.DEFAULT_MODEL_PROVIDER = 'gemini';
process.env.DEFAULT_MODEL_ID = 'gemini-1.5-flash';
process.env.DELEGATOR_MODEL_ID = 'gemini-1.5-flash';
