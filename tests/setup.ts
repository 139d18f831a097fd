import { setLogHandler } from '../src/logger';

// Keep test output clean; logging tests install their own handler.
setLogHandler(() => undefined);
