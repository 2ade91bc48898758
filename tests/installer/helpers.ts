/**
 * Test helpers for installer tests
 */

import { promises as fs, readFileSync, existsSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import type { ExecResult } from '../../scripts/lib/process.js';
import { createInstallLogger, type InstallLogger } from '../../scripts/install/logger.js';
import type { CommandExecutor } from '../../scripts/install/types.js';
import type { Printer } from '../../scripts/utils.js';

const TEMP_PREFIX = 'hdl21-installer-';

/**
 * Create a temporary directory for testing
 */
export async function createTempWorkspace(prefix = `${TEMP_PREFIX}test-`): Promise<string> {
  // realpath: on macOS tmpdir() is a symlink and child processes report the resolved path.
  return await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), prefix)));
}

/**
 * Clean up temporary workspace
 */
export async function cleanupTempWorkspace(workspacePath: string): Promise<void> {
  // Only ever delete our own temp dirs.
  const base = path.basename(workspacePath);
  if (!workspacePath || !base.startsWith(TEMP_PREFIX)) {
    throw new Error(`Safety check: Only cleaning up ${TEMP_PREFIX}* temp test directories`);
  }
  try {
    await fs.rm(workspacePath, { recursive: true, force: true });
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`Warning: Failed to cleanup ${workspacePath}: ${message}`);
  }
}

/**
 * Lay out the directories the dev plan walks through, as they look after the clone:
 *
 *   <root>/Hdl21/{SampleSitePdks,pdks/Sky130}
 *   <root>/Vlsir/{bindings/python,VlsirTools}
 *
 * Returns the Hdl21 checkout (the dev plan's start directory).
 */
export async function createDevWorkspaceLayout(root: string): Promise<string> {
  for (const dir of [
    'Hdl21/SampleSitePdks',
    'Hdl21/pdks/Sky130',
    'Vlsir/bindings/python',
    'Vlsir/VlsirTools'
  ]) {
    await fs.mkdir(path.join(root, dir), { recursive: true });
  }
  return path.join(root, 'Hdl21');
}

export type RecordedCall = { file: string; args: string[]; cwd: string };

export type FakeResponse = number | Partial<ExecResult> | Error;

/**
 * Executor that records calls instead of spawning processes.
 *
 * `respond` gets each call and its index; a number is an exit code, an Error is thrown.
 */
export function createFakeExecutor(respond: (call: RecordedCall, index: number) => FakeResponse = () => 0): {
  exec: CommandExecutor;
  calls: RecordedCall[];
} {
  const calls: RecordedCall[] = [];

  const exec: CommandExecutor = async (command, { cwd }) => {
    const call: RecordedCall = { file: command.file, args: [...command.args], cwd };
    const index = calls.length;
    calls.push(call);

    const response = respond(call, index);
    if (response instanceof Error) throw response;

    const base: ExecResult = { ok: true, exitCode: 0, stdout: '', stderr: '' };
    if (typeof response === 'number') {
      return { ...base, ok: response === 0, exitCode: response };
    }
    return { ...base, ...response };
  };

  return { exec, calls };
}

export type LogRecord = { level: number; time: number; msg: string; [key: string]: unknown };

export function readLogRecords(filePath: string): LogRecord[] {
  if (!existsSync(filePath)) return [];
  return readFileSync(filePath, 'utf8')
    .split('\n')
    .filter((line) => line.trim().length > 0)
    .map((line) => JSON.parse(line) as LogRecord);
}

export function createTestLogger(dir: string): { logger: InstallLogger; filePath: string; records: () => LogRecord[] } {
  const filePath = path.join(dir, '.cache', 'install.log');
  const logger = createInstallLogger({ filePath });
  return { logger, filePath, records: () => readLogRecords(filePath) };
}

export const silentPrint: Printer = () => {};

export function createCapturePrinter(): { print: Printer; lines: string[] } {
  const lines: string[] = [];
  return { print: (message) => void lines.push(message), lines };
}
