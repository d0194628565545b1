import { pino } from 'pino';
import { config } from './config.js';

export const logger = pino({
    name: 'radius-dictionary',
    level: config.logLevel,
});

export type Logger = typeof logger;
