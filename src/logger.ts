import pino from 'pino';
import { CFG } from './config';

export const log = pino({
  level: CFG.logLevel,
  base: undefined, // keeps logs small (no pid/hostname)
  timestamp: pino.stdTimeFunctions.isoTime,
});
