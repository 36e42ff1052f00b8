import pino from 'pino';
import { logLevelFromEnv } from './config';

/*
 **  Diagnostics go to stderr so the host's stdout stays untouched
 */
export const logger = pino({
    name: 'id3-tagkit',
    level: logLevelFromEnv(),
}, pino.destination(2));
