import winston from 'winston';
import { Logger } from '@fxledger/utils';

/** Logger over a silent winston sink, so tests can spy on the sink's methods */
export function silentLogger(namespace = 'test'): { logger: Logger; sink: winston.Logger } {
  const sink = winston.createLogger({ silent: true });
  return { logger: new Logger(namespace, sink), sink };
}
