import pino from 'pino';

/** Pipeline stages that log under their own `component` binding. */
export type LogComponent = 'run' | 'day' | 'parser' | 'publisher' | 'history' | 'securities' | 'pool' | 'startup-env';

const logger: pino.Logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  base: { app: 'insti-flow' },
  formatters: {
    level(label: string) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

const componentLoggers = new Map<LogComponent, pino.Logger>();

/**
 * Child logger bound to one pipeline stage. Children are cached, so every
 * module asking for the same component shares one instance.
 */
export function componentLogger(component: LogComponent): pino.Logger {
  let child = componentLoggers.get(component);
  if (!child) {
    child = logger.child({ component });
    componentLoggers.set(component, child);
  }
  return child;
}

export default logger;
