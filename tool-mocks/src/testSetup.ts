import { applyLogLevel } from './logger.js';

// Tests run with a silent logger and spy on its methods.
applyLogLevel('silent');
