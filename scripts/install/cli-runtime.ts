import path from 'node:path';
import yargs from 'yargs/yargs';
import { hideBin } from 'yargs/helpers';

import { loadInstallerConfig } from '../lib/installer-config.js';
import { print as consolePrint, symbols, type Printer } from '../utils.js';
import { INTERRUPTED_EXIT_CODE, InstallerConfigError, InstallerUsageError } from './errors.js';
import { createInstallLogger, DEFAULT_LOG_FILE } from './logger.js';
import { createPlan } from './plans.js';
import { inheritStdioExecutor, runPlan } from './runner.js';
import { printInstallSummary, printPlanListing } from './summary.js';
import type { CommandExecutor, InstallPlanId } from './types.js';

export type InstallCliFlags = {
  startDir?: string;
  configPath?: string;
  logFile?: string;
  dryRun: boolean;
  // yargs has already printed the usage text.
  helpShown: boolean;
};

export const SCRIPT_NAMES: Record<InstallPlanId, string> = {
  dev: 'install-dev',
  'sky130-pdk': 'install-sky130-pdk'
};

export function parseInstallFlags(argv: string[], scriptName: string): InstallCliFlags {
  const parsed = yargs(hideBin(argv))
    .scriptName(scriptName)
    .option('start-dir', {
      type: 'string',
      description: 'Directory the first step is resolved against (defaults to the current directory)'
    })
    .option('config', { type: 'string', description: 'Path to installer.config.yml' })
    .option('log-file', { type: 'string', description: 'Install log path (defaults to .cache/install.log)' })
    .option('dry-run', {
      type: 'boolean',
      default: false,
      description: 'Print the steps with their resolved directories without running them'
    })
    .strict()
    .help()
    .alias('help', 'h')
    .version(false)
    .exitProcess(false)
    .fail((msg, err) => {
      throw new InstallerUsageError(msg || err?.message || 'Invalid arguments');
    })
    .parseSync();

  return {
    startDir: parsed['start-dir'],
    configPath: parsed.config,
    logFile: parsed['log-file'],
    dryRun: parsed['dry-run'],
    helpShown: parsed.help === true
  };
}

/**
 * Parse flags, load config, run one plan and report. Returns the process exit code.
 */
export async function runInstallerCli(
  argv: string[],
  opts: { planId: InstallPlanId; exec?: CommandExecutor; print?: Printer; cwd?: string }
): Promise<number> {
  const { planId } = opts;
  const print = opts.print ?? consolePrint;

  let flags: InstallCliFlags;
  try {
    flags = parseInstallFlags(argv, SCRIPT_NAMES[planId]);
  } catch (e) {
    if (e instanceof InstallerUsageError) {
      print(`\n${symbols.error} ${e.message}`, 'red');
      return 1;
    }
    throw e;
  }
  if (flags.helpShown) return 0;

  const invocationCwd = opts.cwd ?? process.cwd();
  const startDirectory = flags.startDir ? path.resolve(invocationCwd, flags.startDir) : invocationCwd;

  let loaded: ReturnType<typeof loadInstallerConfig>;
  try {
    loaded = loadInstallerConfig({
      startDirectory,
      configPath: flags.configPath ? path.resolve(invocationCwd, flags.configPath) : undefined
    });
  } catch (e) {
    if (e instanceof InstallerConfigError) {
      print(`\n${symbols.error} ${e.message}`, 'red');
      return 1;
    }
    throw e;
  }

  const plan = createPlan(planId, loaded.config);

  if (flags.dryRun) {
    printPlanListing({ plan, startDirectory, print });
    return 0;
  }

  const logFilePath = flags.logFile
    ? path.resolve(invocationCwd, flags.logFile)
    : path.resolve(startDirectory, loaded.config.logFile ?? DEFAULT_LOG_FILE);
  const logger = createInstallLogger({ filePath: logFilePath });

  print(`\n${symbols.search} Installing ${plan.title}...`, 'blue');
  print(`  Working directory: ${startDirectory}`);
  if (loaded.filePath) {
    logger.info({ configFile: loaded.filePath }, 'install.config');
  }

  // Aborting kills the running child and keeps the runner from launching another
  // step. A second SIGINT falls through to the default handler.
  const interrupt = new AbortController();
  const onSigint = () => {
    logger.warn({ planId, exitCode: INTERRUPTED_EXIT_CODE }, 'install.interrupted');
    print(`\n${symbols.warning} Interrupted, stopping the current step`, 'yellow');
    interrupt.abort();
  };
  process.once('SIGINT', onSigint);

  try {
    const result = await runPlan(plan, {
      startDirectory,
      logger,
      exec: opts.exec ?? inheritStdioExecutor,
      print,
      signal: interrupt.signal
    });
    printInstallSummary({ plan, result, logFilePath, print });
    return result.status === 'completed' ? 0 : result.error.exitCode;
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}
