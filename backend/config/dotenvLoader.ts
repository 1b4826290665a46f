import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import dotenv from 'dotenv';

function tryLoad(filePath: string): boolean {
  if (!filePath) return false;
  if (!fs.existsSync(filePath)) return false;
  dotenv.config({ path: filePath, override: false });
  return true;
}

/** Returns the env files that were applied, in load order. */
export function loadDotenv(): string[] {
  // Compiled output lives in <root>/dist/backend/config, sources in <root>/backend/config.
  const thisDir = path.dirname(fileURLToPath(import.meta.url));
  const parentDir = path.resolve(thisDir, '..');
  const grandParentDir = path.resolve(parentDir, '..');
  const isRunningFromDist = path.basename(grandParentDir) === 'dist';
  const repoRoot = isRunningFromDist ? path.resolve(grandParentDir, '..') : grandParentDir;
  const backendDir = path.join(repoRoot, 'backend');

  const explicit = process.env.DOTENV_CONFIG_PATH;
  if (explicit) {
    return tryLoad(explicit) ? [explicit] : [];
  }

  // Backend-local files first; real environment variables are never overridden.
  const candidates = [
    path.join(backendDir, '.env'),
    path.join(backendDir, '.env.local'),
    path.join(repoRoot, '.env'),
    path.join(repoRoot, '.env.local'),
  ];
  return candidates.filter((file) => tryLoad(file));
}
