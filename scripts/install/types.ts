import type { ExecResult } from '../lib/process.js';
import type { Printer } from '../utils.js';
import type { DirectoryError, StepExecutionError } from './errors.js';
import type { InstallLogger } from './logger.js';

export type InstallPlanId = 'dev' | 'sky130-pdk';

export type StepCommand = {
  readonly file: string;
  readonly args: readonly string[];
};

export type InstallStep = {
  readonly name: string;
  // Resolved against the directory the previous step ran in.
  readonly workingDirectory: string;
  readonly command: StepCommand;
  readonly description?: string;
};

export type InstallPlan = {
  readonly id: InstallPlanId;
  readonly title: string;
  readonly steps: readonly InstallStep[];
};

// `signal` aborts when the run is interrupted; executors kill the child on abort.
export type CommandExecutor = (
  command: StepCommand,
  options: { cwd: string; signal?: AbortSignal }
) => Promise<ExecResult>;

export type RunContext = {
  startDirectory: string;
  logger: InstallLogger;
  exec: CommandExecutor;
  print: Printer;
  signal?: AbortSignal;
};

export type StepFailure = StepExecutionError | DirectoryError;

export type RunPlanResult =
  | { status: 'completed'; finalDirectory: string; stepsRun: number }
  | {
      status: 'failed';
      stepIndex: number;
      step: InstallStep;
      error: StepFailure;
      finalDirectory: string;
      stepsRun: number;
    };
