// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

// ============================================================================
// Logger
// ============================================================================

/**
 * Diagnostics go to stderr: stdout belongs to the MCP transport.
 */
export type LogLevel = 'info' | 'warn' | 'error';

export type LogSink = (line: string) => void;

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const stderrSink: LogSink = (line) => {
  process.stderr.write(line);
};

export function formatLogLine(scope: string, level: LogLevel, message: string): string {
  const marker = level === 'info' ? '' : ` ${level.toUpperCase()}`;
  return `[${scope}]${marker} ${message}\n`;
}

export function createLogger(scope: string, sink: LogSink = stderrSink): Logger {
  const write = (level: LogLevel, message: string) => {
    sink(formatLogLine(scope, level, message));
  };

  return {
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
  };
}
