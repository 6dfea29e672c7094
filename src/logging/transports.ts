/**
 * Logging Transports
 *
 * The console transport writes every level to stderr: stdout belongs to the
 * command's own output (tables, JSON, prompts).
 */

import winston from 'winston';

export interface LogTransport {
  name: string;
  createWinstonTransport(): winston.transport;
}

const ALL_LEVELS = ['error', 'warn', 'info', 'debug', 'trace'];

/**
 * Text format:
 * WARN  2026-02-10T14:30:15.042Z [aggregator] Release source failed
 */
export function buildTextFormat(): winston.Logform.Format {
  return winston.format.printf((info) => {
    const level = info.level.toUpperCase().padEnd(5);
    const component = typeof info['component'] === 'string' ? ` [${info['component']}]` : '';
    const errorStack = typeof info['errorStack'] === 'string' ? info['errorStack'] : undefined;
    let line = `${level} ${new Date().toISOString()}${component} ${String(info.message)}`;
    if (errorStack) {
      line += '\n' + errorStack;
    }
    return line;
  });
}

export class ConsoleTransport implements LogTransport {
  name = 'console';

  constructor(private format: 'text' | 'json') {}

  createWinstonTransport(): winston.transport {
    return new winston.transports.Console({
      format:
        this.format === 'json'
          ? winston.format.combine(winston.format.timestamp(), winston.format.json())
          : buildTextFormat(),
      stderrLevels: ALL_LEVELS,
    });
  }
}

export class FileTransport implements LogTransport {
  name = 'file';

  constructor(
    private filePath: string,
    private format: 'text' | 'json'
  ) {}

  createWinstonTransport(): winston.transport {
    return new winston.transports.File({
      filename: this.filePath,
      format:
        this.format === 'json'
          ? winston.format.combine(winston.format.timestamp(), winston.format.json())
          : buildTextFormat(),
      maxsize: 10 * 1024 * 1024, // 10 MB
      maxFiles: 5,
    });
  }
}
