import fs from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';

import { InstallerConfigError } from '../install/errors.js';
import { InstallerConfigSchema, type InstallerConfig } from '../schemas/installer-config.zod.js';

export const INSTALLER_CONFIG_BASENAMES = ['installer.config.yml', 'installer.config.yaml'] as const;

export function findInstallerConfigFile(startDirectory: string): string | null {
  const matches: string[] = [];
  for (const name of INSTALLER_CONFIG_BASENAMES) {
    const p = path.join(startDirectory, name);
    if (fs.existsSync(p)) matches.push(p);
  }

  if (matches.length > 1) {
    const list = matches.map((p) => path.basename(p)).sort().join(', ');
    throw new InstallerConfigError(
      `Multiple installer config files found (${list}). Keep only one: "installer.config.yml" or "installer.config.yaml".`,
      startDirectory
    );
  }

  return matches[0] || null;
}

export function parseInstallerConfig(raw: unknown, filePath: string): InstallerConfig {
  // An empty YAML document parses to null.
  const parsed = InstallerConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new InstallerConfigError(`Invalid installer config ${filePath}: ${issues}`, filePath, {
      cause: parsed.error
    });
  }
  return parsed.data;
}

export function readInstallerConfigFile(filePath: string): InstallerConfig {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf8');
  } catch (e) {
    throw new InstallerConfigError(`Cannot read installer config ${filePath}`, filePath, { cause: e });
  }

  let doc: unknown;
  try {
    doc = YAML.parse(raw);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new InstallerConfigError(`Invalid YAML in ${filePath}: ${reason}`, filePath, { cause: e });
  }

  return parseInstallerConfig(doc, filePath);
}

/**
 * Load config from an explicit path, or from `installer.config.yml` in the start
 * directory, or fall back to defaults when neither exists.
 */
export function loadInstallerConfig(params: { startDirectory: string; configPath?: string }): {
  config: InstallerConfig;
  filePath: string | null;
} {
  const { startDirectory, configPath } = params;

  if (configPath) {
    const filePath = path.resolve(startDirectory, configPath);
    return { config: readInstallerConfigFile(filePath), filePath };
  }

  const found = findInstallerConfigFile(startDirectory);
  if (!found) {
    return { config: parseInstallerConfig({}, '(defaults)'), filePath: null };
  }
  return { config: readInstallerConfigFile(found), filePath: found };
}
