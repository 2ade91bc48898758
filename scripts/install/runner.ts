import fs from 'node:fs';
import path from 'node:path';

import { execCmd, LAUNCH_FAILED_EXIT_CODE, type ExecResult } from '../lib/process.js';
import { symbols } from '../utils.js';
import { DirectoryError, INTERRUPTED_EXIT_CODE, StepExecutionError } from './errors.js';
import type { CommandExecutor, InstallPlan, InstallStep, RunContext, RunPlanResult, StepCommand } from './types.js';

// Characters a POSIX shell leaves alone inside an unquoted word.
const SAFE_SHELL_WORD = /^[\w@%+=:,./-]+$/;

export function formatCommand(command: StepCommand): string {
  return [command.file, ...command.args]
    .map((word) => (SAFE_SHELL_WORD.test(word) ? word : `'${word.replace(/'/g, `'\\''`)}'`))
    .join(' ');
}

/**
 * Runs the command in `cwd` with the terminal attached, so clone/pip/make output streams through.
 */
export const inheritStdioExecutor: CommandExecutor = (command, { cwd, signal }) =>
  execCmd(command.file, command.args, { cwd, stdio: 'inherit', signal });

/**
 * Directory each step runs in. Resolution is cumulative: a step's relative
 * `workingDirectory` is taken from where the previous step ran.
 */
export function resolveStepDirectories(plan: InstallPlan, startDirectory: string): string[] {
  const dirs: string[] = [];
  let cwd = path.resolve(startDirectory);
  for (const step of plan.steps) {
    cwd = path.resolve(cwd, step.workingDirectory);
    dirs.push(cwd);
  }
  return dirs;
}

function checkDirectory(step: InstallStep, directory: string): DirectoryError | null {
  let stat: fs.Stats;
  try {
    stat = fs.statSync(directory);
  } catch (e) {
    return new DirectoryError(
      'DIRECTORY_NOT_FOUND',
      `Directory not found: ${directory}`,
      step.name,
      directory,
      { cause: e }
    );
  }

  if (!stat.isDirectory()) {
    return new DirectoryError('NOT_A_DIRECTORY', `Not a directory: ${directory}`, step.name, directory);
  }

  try {
    fs.accessSync(directory, fs.constants.R_OK | fs.constants.X_OK);
  } catch (e) {
    return new DirectoryError(
      'DIRECTORY_NOT_ACCESSIBLE',
      `Directory not accessible: ${directory}`,
      step.name,
      directory,
      { cause: e }
    );
  }

  return null;
}

function interruptedError(step: InstallStep, directory: string, launched: boolean): StepExecutionError {
  const message = launched ? `Interrupted while running "${formatCommand(step.command)}"` : 'Interrupted before the step started';
  return new StepExecutionError('STEP_FAILED', message, step.name, directory, INTERRUPTED_EXIT_CODE);
}

async function executeStep(
  step: InstallStep,
  directory: string,
  exec: CommandExecutor,
  signal: AbortSignal | undefined
): Promise<StepExecutionError | null> {
  const commandLine = formatCommand(step.command);

  let res: ExecResult;
  try {
    res = await exec(step.command, { cwd: directory, signal });
  } catch (e) {
    if (signal?.aborted) return interruptedError(step, directory, true);
    return new StepExecutionError(
      'STEP_LAUNCH_FAILED',
      `Failed to launch "${commandLine}": ${e instanceof Error ? e.message : String(e)}`,
      step.name,
      directory,
      LAUNCH_FAILED_EXIT_CODE,
      { cause: e }
    );
  }

  // Whatever the child reported, an interrupted step never counts as a success.
  if (signal?.aborted) return interruptedError(step, directory, true);
  if (res.ok) return null;

  if (res.launchError !== undefined) {
    return new StepExecutionError(
      'STEP_LAUNCH_FAILED',
      `Failed to launch "${commandLine}": ${res.launchError}`,
      step.name,
      directory,
      res.exitCode
    );
  }

  const reason = res.signal ? `was terminated by ${res.signal}` : `exited with code ${res.exitCode}`;
  // Only a custom executor reports ok: false with exit code 0.
  const exitCode = res.exitCode === 0 ? 1 : res.exitCode;
  return new StepExecutionError('STEP_FAILED', `"${commandLine}" ${reason}`, step.name, directory, exitCode);
}

export async function runPlan(plan: InstallPlan, ctx: RunContext): Promise<RunPlanResult> {
  const { exec, print, signal } = ctx;
  const logger = ctx.logger.child({ planId: plan.id });
  const total = plan.steps.length;
  let cwd = path.resolve(ctx.startDirectory);

  logger.info({ cwd, steps: total }, 'install.start');

  for (const [idx, step] of plan.steps.entries()) {
    const stepNum = idx + 1;
    const directory = path.resolve(cwd, step.workingDirectory);
    const commandLine = formatCommand(step.command);
    const stepLog = logger.child({ step: step.name, stepNum });

    if (signal?.aborted) {
      const error = interruptedError(step, directory, false);
      stepLog.warn({ directory, exitCode: error.exitCode }, 'install.interrupted');
      return { status: 'failed', stepIndex: idx, step, error, finalDirectory: cwd, stepsRun: idx };
    }

    print(`\n[Step ${stepNum}/${total}] ${step.name}`, 'cyan');
    print(`  ${symbols.info} ${directory}$ ${commandLine}`, 'cyan');
    stepLog.info({ directory, command: commandLine }, 'install.step.start');

    const dirError = checkDirectory(step, directory);
    if (dirError) {
      stepLog.error({ directory, code: dirError.code, error: dirError.message }, 'install.step.failed');
      return { status: 'failed', stepIndex: idx, step, error: dirError, finalDirectory: cwd, stepsRun: idx };
    }
    cwd = directory;

    const stepError = await executeStep(step, directory, exec, signal);
    if (stepError) {
      stepLog.error(
        { directory, code: stepError.code, exitCode: stepError.exitCode, error: stepError.message },
        'install.step.failed'
      );
      return { status: 'failed', stepIndex: idx, step, error: stepError, finalDirectory: cwd, stepsRun: stepNum };
    }

    print(`  ${symbols.success} ${step.name}`, 'green');
    stepLog.info('install.step.ok');
  }

  logger.info({ finalDirectory: cwd }, 'install.completed');
  return { status: 'completed', finalDirectory: cwd, stepsRun: total };
}
