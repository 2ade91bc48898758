// sysexits EX_NOINPUT: the step's directory could not be entered.
export const DIRECTORY_ERROR_EXIT_CODE = 66;
// 128 + SIGINT.
export const INTERRUPTED_EXIT_CODE = 130;

export type StepExecutionErrorCode = 'STEP_FAILED' | 'STEP_LAUNCH_FAILED';
export type DirectoryErrorCode = 'DIRECTORY_NOT_FOUND' | 'NOT_A_DIRECTORY' | 'DIRECTORY_NOT_ACCESSIBLE';
export type InstallErrorCode = StepExecutionErrorCode | DirectoryErrorCode;

/**
 * Base class for errors attributed to a single install step.
 *
 * `exitCode` is what the installer process exits with when this error ends the run.
 */
export class InstallError extends Error {
  constructor(
    public readonly code: InstallErrorCode,
    message: string,
    public readonly stepName: string,
    public readonly workingDirectory: string,
    public readonly exitCode: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'InstallError';
  }
}

/**
 * The step's command exited non-zero, was killed by a signal, or could not be launched.
 */
export class StepExecutionError extends InstallError {
  constructor(
    code: StepExecutionErrorCode,
    message: string,
    stepName: string,
    workingDirectory: string,
    exitCode: number,
    options?: { cause?: unknown }
  ) {
    super(code, message, stepName, workingDirectory, exitCode, options);
    this.name = 'StepExecutionError';
  }
}

/**
 * The step's working directory does not exist, is not a directory, or cannot be entered.
 */
export class DirectoryError extends InstallError {
  constructor(
    code: DirectoryErrorCode,
    message: string,
    stepName: string,
    workingDirectory: string,
    options?: { cause?: unknown }
  ) {
    super(code, message, stepName, workingDirectory, DIRECTORY_ERROR_EXIT_CODE, options);
    this.name = 'DirectoryError';
  }
}

/**
 * Installer configuration could not be read or failed validation.
 */
export class InstallerConfigError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'InstallerConfigError';
  }
}

/**
 * Command-line arguments were rejected.
 */
export class InstallerUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InstallerUsageError';
  }
}
