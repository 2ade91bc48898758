import fs from 'node:fs';
import path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

type LogMethod = (fieldsOrMsg?: LogFields | string, msg?: string) => void;

// Pino-compatible (levels-only) surface:
// - logger.info('install.start')
// - logger.info({ stepNum: 2 }, 'install.step.ok')
// - logger.child({ planId: 'dev' }) binds fields onto every record it writes
export type InstallLogger = {
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  child: (bindings: LogFields) => InstallLogger;
};

export const DEFAULT_LOG_FILE = path.join('.cache', 'install.log');

export function levelToNumber(level: LogLevel): number {
  // Align with pino numeric levels.
  switch (level) {
    case 'debug':
      return 20;
    case 'info':
      return 30;
    case 'warn':
      return 40;
    case 'error':
      return 50;
  }
}

/**
 * One JSON line per record, appended synchronously.
 *
 * Record shape: `{ level, time, msg, ...bindings, ...fields }`; call-site fields
 * win over bindings.
 */
export function createInstallLogger(opts: { filePath: string; bindings?: LogFields }): InstallLogger {
  const { filePath } = opts;
  fs.mkdirSync(path.dirname(filePath), { recursive: true });

  const build = (bindings: LogFields): InstallLogger => {
    const write = (level: LogLevel, fieldsOrMsg?: LogFields | string, msg?: string): void => {
      const fields = typeof fieldsOrMsg === 'string' ? {} : fieldsOrMsg ?? {};
      const text = typeof fieldsOrMsg === 'string' ? fieldsOrMsg : msg ?? '';
      const record = { level: levelToNumber(level), time: Date.now(), msg: text, ...bindings, ...fields };
      fs.appendFileSync(filePath, JSON.stringify(record) + '\n', 'utf8');
    };

    return {
      debug: (fieldsOrMsg, msg) => write('debug', fieldsOrMsg, msg),
      info: (fieldsOrMsg, msg) => write('info', fieldsOrMsg, msg),
      warn: (fieldsOrMsg, msg) => write('warn', fieldsOrMsg, msg),
      error: (fieldsOrMsg, msg) => write('error', fieldsOrMsg, msg),
      child: (more) => build({ ...bindings, ...more })
    };
  };

  return build(opts.bindings ?? {});
}
