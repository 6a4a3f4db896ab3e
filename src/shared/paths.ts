/**
 * @file src/shared/paths.ts
 * @description Helper for resolving the workspace directories used by the catverb CLI.
 */

import fs from 'node:fs';
import path from 'node:path';

const CONFIG_FILE = '.catverbrc.json';
const DUMP_FILE = 'cawiktionary-latest-pages-meta-current.xml';
const INFINITIVES_FILE = 'infinitives.txt';

/**
 * Walks up from the working directory to the first folder holding `.catverbrc.json` or
 * `data/infinitives.txt`. Falls back to process.cwd() if none does.
 */
const findWorkspaceRoot = (): string => {
  let current = process.cwd();
  const root = path.parse(current).root;

  while (current !== root) {
    if (
      fs.existsSync(path.join(current, CONFIG_FILE)) ||
      fs.existsSync(path.join(current, 'data', INFINITIVES_FILE))
    ) {
      return current;
    }
    current = path.dirname(current);
  }

  return process.cwd();
};

const ROOT = findWorkspaceRoot();
const DATA_DIR = path.join(ROOT, 'data');

const ensureDir = (target: string): void => {
  fs.mkdirSync(target, { recursive: true });
};

export const paths = {
  ROOT,
  CONFIG: path.join(ROOT, CONFIG_FILE),
  DATA_DIR,
  DUMP: path.join(DATA_DIR, DUMP_FILE),
  INFINITIVES: path.join(DATA_DIR, INFINITIVES_FILE),
  OUTPUT_DIR: DATA_DIR,
  ensureDir,
};
