import os from 'node:os';
import { execa, type Options as ExecaOptions } from 'execa';

export type ExecOptions = ExecaOptions;

export type ExecResult = {
  ok: boolean;
  exitCode: number;
  stdout: string;
  stderr: string;
  // Set when the child was terminated by a signal (exitCode is then 128 + signo).
  signal?: string;
  // Set when the process never started (missing executable, EACCES, bad cwd).
  launchError?: string;
};

// Shell convention for "command not found / could not be executed".
export const LAUNCH_FAILED_EXIT_CODE = 127;

function normalizeText(value: unknown): string {
  if (value === undefined || value === null) return '';
  return String(value).trim();
}

export function signalExitCode(signal: string): number {
  const entry = Object.entries(os.constants.signals).find(([name]) => name === signal);
  const signo: unknown = entry?.[1];
  return typeof signo === 'number' ? 128 + signo : 1;
}

function readLaunchError(res: object): string | undefined {
  if (!('failed' in res) || res.failed !== true) return undefined;
  if ('exitCode' in res && typeof res.exitCode === 'number') return undefined;
  if ('signal' in res && typeof res.signal === 'string') return undefined;
  if ('originalMessage' in res && typeof res.originalMessage === 'string' && res.originalMessage) {
    return res.originalMessage;
  }
  if (res instanceof Error) return res.message;
  return 'Command could not be started';
}

export async function execCmd(
  file: string,
  args: readonly string[] = [],
  options: ExecOptions = {}
): Promise<ExecResult> {
  const res = await execa(file, [...args], {
    encoding: 'utf8',
    reject: false,
    ...options
  });

  const stdout = normalizeText(res.stdout);
  const stderr = normalizeText(res.stderr);

  const launchError = readLaunchError(res);
  if (launchError !== undefined) {
    return { ok: false, exitCode: LAUNCH_FAILED_EXIT_CODE, stdout, stderr, launchError };
  }

  if (typeof res.signal === 'string' && typeof res.exitCode !== 'number') {
    return { ok: false, exitCode: signalExitCode(res.signal), stdout, stderr, signal: res.signal };
  }

  const exitCode = typeof res.exitCode === 'number' ? res.exitCode : 1;
  return { ok: exitCode === 0, exitCode, stdout, stderr };
}
