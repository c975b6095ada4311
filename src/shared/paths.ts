/**
 * @file src/shared/paths.ts
 * @description Helper for resolving canonical directories used by the curiomap CLI and API.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

const ROOT = process.env.CURIOMAP_HOME
  ? path.resolve(process.env.CURIOMAP_HOME)
  : path.join(os.homedir(), '.curiomap');
const PACKAGE_ROOT = path.resolve(__dirname, '..', '..');

const ensureDir = (target: string): void => {
  fs.mkdirSync(target, { recursive: true });
};

export const paths = {
  ROOT,
  PACKAGE_ROOT,
  CONFIG: path.join(ROOT, '.curiomaprc.json'),
  DATA_FILE: path.join(ROOT, 'data.json'),
  GAZETTEER_BUNDLED: path.join(PACKAGE_ROOT, 'gazetteer.json'),
  ensureDir,
};
