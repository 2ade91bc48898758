/**
 * Zod schema for `installer.config.yml`.
 *
 * Every field is optional; the parsed result always carries the defaults the
 * built-in plans were written against. Unknown keys are rejected.
 */
import { z } from 'zod';

export const DEFAULT_VLSIR_REPO = 'https://github.com/Vlsir/Vlsir.git';
export const DEFAULT_VLSIR_BRANCH = 'dev';
export const DEFAULT_OPEN_PDKS_REPO = 'https://github.com/RTimothyEdwards/open_pdks.git';

const VlsirSchema = z
  .object({
    repo: z.string().min(1).default(DEFAULT_VLSIR_REPO),
    branch: z.string().min(1).default(DEFAULT_VLSIR_BRANCH)
  })
  .strict();

/**
 * open_pdks build. `sudoInstall` prefixes `make install` with sudo, for installs
 * outside a container where the PDK prefix is not writable.
 */
const OpenPdksSchema = z
  .object({
    repo: z.string().min(1).default(DEFAULT_OPEN_PDKS_REPO),
    configureArgs: z.array(z.string()).default(['--enable-sky130-pdk']),
    sudoInstall: z.boolean().default(false)
  })
  .strict();

export const InstallerConfigSchema = z
  .object({
    // Executables (may be absolute paths, e.g. a virtualenv's pip).
    pip: z.string().min(1).default('pip'),
    preCommit: z.string().min(1).default('pre-commit'),

    vlsir: VlsirSchema.default({}),
    openPdks: OpenPdksSchema.default({}),

    // Relative to the start directory.
    logFile: z.string().min(1).optional()
  })
  .strict();

export type InstallerConfig = z.infer<typeof InstallerConfigSchema>;
export type InstallerConfigInput = z.input<typeof InstallerConfigSchema>;
