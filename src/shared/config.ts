/**
 * @file src/shared/config.ts
 * @description Handles persistent catverb CLI configuration (.catverbrc.json).
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { DEFAULT_VERB_LINK_BASE } from '../parsers/wiki/section-extractor';
import { paths } from './paths';

export const CONFIG_PATH = paths.CONFIG;

const ConfigSchema = z
  .object({
    dumpPath: z.string().min(1),
    infinitivesPath: z.string().min(1),
    outputDir: z.string().min(1),
    linkBase: z.string().min(1),
  })
  .partial();

export type CatverbConfig = z.infer<typeof ConfigSchema>;

export interface RunConfigOverrides {
  dumpPath?: string;
  infinitivesPath?: string;
  outputDir?: string;
  linkBase?: string;
}

export interface RunConfig {
  dumpPath: string;
  infinitivesPath: string;
  outputDir: string;
  linkBase: string;
}

const normalize = (value?: string | null): string | undefined => {
  if (!value) return undefined;
  const trimmed = value.trim();
  return trimmed.length ? trimmed : undefined;
};

const readFile = (configPath: string): CatverbConfig => {
  if (!fs.existsSync(configPath)) {
    return {};
  }
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid configuration in ${configPath}: ${message}`);
  }
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration in ${configPath}: ${details}`);
  }
  return parsed.data;
};

export const readConfig = (configPath: string = CONFIG_PATH): CatverbConfig => readFile(configPath);

export const writeConfig = (
  update: Partial<CatverbConfig>,
  configPath: string = CONFIG_PATH,
): CatverbConfig => {
  const current = readFile(configPath);
  const next = ConfigSchema.parse({
    ...current,
    ...update,
  });
  fs.writeFileSync(configPath, JSON.stringify(next, null, 2), 'utf8');
  return next;
};

/**
 * Command-line values win over the config file, which wins over the `data/` defaults. Relative
 * paths from the command line resolve against the working directory; relative paths in the file
 * resolve against the file's own directory.
 */
export const resolveRunConfig = (
  overrides: RunConfigOverrides = {},
  configPath: string = CONFIG_PATH,
): RunConfig => {
  const cfg = readFile(configPath);
  const configDir = path.dirname(configPath);
  const pick = (override: string | undefined, stored: string | undefined, fallback: string) => {
    const fromCli = normalize(override);
    if (fromCli) return path.resolve(fromCli);
    const fromFile = normalize(stored);
    if (fromFile) return path.resolve(configDir, fromFile);
    return fallback;
  };

  return {
    dumpPath: pick(overrides.dumpPath, cfg.dumpPath, paths.DUMP),
    infinitivesPath: pick(overrides.infinitivesPath, cfg.infinitivesPath, paths.INFINITIVES),
    outputDir: pick(overrides.outputDir, cfg.outputDir, paths.OUTPUT_DIR),
    linkBase: normalize(overrides.linkBase) ?? normalize(cfg.linkBase) ?? DEFAULT_VERB_LINK_BASE,
  };
};
