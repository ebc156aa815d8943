import pino from 'pino';

type Level = 'error' | 'warn' | 'info' | 'debug' | 'trace';

export interface Logger {
  child(bindings?: Record<string, unknown>): Logger;
  error(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  debug(msg: string, meta?: Record<string, unknown>): void;
  trace(msg: string, meta?: Record<string, unknown>): void;
}

const root = pino({
  level: process.env.EINSUM_IR_LOG_LEVEL ?? 'silent',
  base: null,
});

function wrap(instance: pino.Logger): Logger {
  const call = (lvl: Level, msg: string, meta?: Record<string, unknown>) => {
    instance[lvl](meta ?? {}, msg);
  };

  return {
    child: (bindings) => wrap(instance.child(bindings ?? {})),
    error: (m, meta) => call('error', m, meta),
    warn: (m, meta) => call('warn', m, meta),
    info: (m, meta) => call('info', m, meta),
    debug: (m, meta) => call('debug', m, meta),
    trace: (m, meta) => call('trace', m, meta),
  };
}

export const logger: Logger = wrap(root);

/**
 * Scoped logger for one component
 *
 * @example
 * const log = makeLogger('assembler');
 * log.debug('program assembled', { name: 'dot', ops: 1 });
 */
export function makeLogger(component: string): Logger {
  return logger.child({ component });
}
