import { symbols, type Printer } from '../utils.js';
import { formatCommand, resolveStepDirectories } from './runner.js';
import type { InstallPlan, RunPlanResult } from './types.js';

export function printPlanListing(params: { plan: InstallPlan; startDirectory: string; print: Printer }): void {
  const { plan, startDirectory, print } = params;
  const dirs = resolveStepDirectories(plan, startDirectory);

  print(`\n${symbols.log} ${plan.title}: ${plan.steps.length} step(s), dry run`, 'blue');
  plan.steps.forEach((step, idx) => {
    print(`  ${idx + 1}. ${step.name}`, 'cyan');
    print(`     ${dirs[idx]}$ ${formatCommand(step.command)}`);
  });
}

export function printInstallSummary(params: {
  plan: InstallPlan;
  result: RunPlanResult;
  logFilePath: string;
  print: Printer;
}): void {
  const { plan, result, logFilePath, print } = params;

  if (result.status === 'completed') {
    print(`\n${symbols.success} ${plan.title} installed (${result.stepsRun}/${plan.steps.length} steps)`, 'green');
    print(`See log: ${logFilePath}`);
    return;
  }

  const { step, stepIndex, error } = result;
  print(`\n${symbols.error} Step ${stepIndex + 1}/${plan.steps.length} "${step.name}" failed (exit code ${error.exitCode})`, 'red');
  print(`  Directory: ${error.workingDirectory}`, 'red');
  print(`  ${error.message}`, 'red');

  const skipped = plan.steps.length - stepIndex - 1;
  if (skipped > 0) {
    print(`  ${symbols.warning} ${skipped} remaining step(s) not run`, 'yellow');
  }
  print(`Fix the problem and re-run the installer; it starts again from step 1.`, 'yellow');
  print(`See log: ${logFilePath}`, 'red');
}
