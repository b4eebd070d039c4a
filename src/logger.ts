import pino, { type Logger, type LoggerOptions } from 'pino';

export function createLogger(level: string, options: { pretty?: boolean } = {}): Logger {
  const loggerOptions: LoggerOptions = {
    level,
    base: undefined
  };

  // MCP stdio requires stdout to be reserved for JSON-RPC frames only.
  // Send logs to stderr to avoid corrupting protocol messages.
  const stderrDestination = pino.destination({ fd: 2, sync: false });

  if (options.pretty) {
    return pino(
      loggerOptions,
      pino.transport({
        target: 'pino-pretty',
        options: {
          colorize: false,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2
        }
      })
    );
  }

  return pino(loggerOptions, stderrDestination);
}
