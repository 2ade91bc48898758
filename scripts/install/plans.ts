import type { InstallerConfig } from '../schemas/installer-config.zod.js';
import type { InstallPlan, InstallPlanId, InstallStep } from './types.js';

function step(name: string, workingDirectory: string, file: string, args: string[], description?: string): InstallStep {
  return Object.freeze({
    name,
    workingDirectory,
    command: Object.freeze({ file, args: Object.freeze([...args]) }),
    ...(description ? { description } : {})
  });
}

function freezePlan(plan: InstallPlan): InstallPlan {
  return Object.freeze({ ...plan, steps: Object.freeze([...plan.steps]) });
}

/**
 * Dev environment: Vlsir from its dev branch plus editable installs of
 * Hdl21 and its PDK packages. Run from the Hdl21 checkout root; Vlsir is
 * cloned next to it.
 */
export function createDevPlan(config: InstallerConfig): InstallPlan {
  const pip = config.pip;
  return freezePlan({
    id: 'dev',
    title: 'Hdl21 dev environment',
    steps: [
      step('clone Vlsir', '..', 'git', ['clone', '-b', config.vlsir.branch, config.vlsir.repo]),
      step('install bindings/python', 'Vlsir/bindings/python', pip, ['install', '-e', '.']),
      step('install VlsirTools', '../../VlsirTools', pip, ['install', '-e', '.']),
      step('install Hdl21', '../../Hdl21', pip, ['install', '-e', '.[dev]']),
      step('install SampleSitePdks', 'SampleSitePdks', pip, ['install', '-e', '.[dev]']),
      step('install pdks/Sky130', '../pdks/Sky130', pip, ['install', '-e', '.[dev]']),
      step('install pre-commit hooks', '.', config.preCommit, ['install'], 'Git hooks for the Hdl21 repository')
    ]
  });
}

/**
 * SkyWater sky130 PDK built from open_pdks. Meant for containers, where
 * `make install` needs no sudo; set `openPdks.sudoInstall` elsewhere.
 */
export function createSky130PdkPlan(config: InstallerConfig): InstallPlan {
  const { openPdks } = config;
  const install = openPdks.sudoInstall
    ? step('install open_pdks', '.', 'sudo', ['make', 'install'])
    : step('install open_pdks', '.', 'make', ['install']);

  return freezePlan({
    id: 'sky130-pdk',
    title: 'sky130 PDK (open_pdks)',
    steps: [
      step('clone open_pdks', '.', 'git', ['clone', openPdks.repo]),
      step('configure open_pdks', 'open_pdks', './configure', openPdks.configureArgs),
      step('build open_pdks', '.', 'make', []),
      install
    ]
  });
}

export function createPlan(id: InstallPlanId, config: InstallerConfig): InstallPlan {
  switch (id) {
    case 'dev':
      return createDevPlan(config);
    case 'sky130-pdk':
      return createSky130PdkPlan(config);
  }
}
