import { configureAgentLogger } from '../src/tracing';

// Keep test output readable; individual tests attach a customHandler when they need logs
configureAgentLogger({ consoleOutput: false, level: 'debug' });
