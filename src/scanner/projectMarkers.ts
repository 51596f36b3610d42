import fs from 'fs/promises';
import path from 'path';
import type { ProjectTypeFlags } from './types.js';

const DOCKER_MARKERS = ['docker-compose.yml', 'docker-compose.yaml', 'compose.yml', 'compose.yaml', 'Dockerfile'];
const PYTHON_MARKERS = ['pyproject.toml', 'setup.py', 'requirements.txt', 'Pipfile'];

function isFile(filePath: string): Promise<boolean> {
  return fs
    .stat(filePath)
    .then((stats) => stats.isFile())
    .catch(() => false);
}

function isDirectory(dirPath: string): Promise<boolean> {
  return fs
    .stat(dirPath)
    .then((stats) => stats.isDirectory())
    .catch(() => false);
}

async function hasAnyFile(repoPath: string, names: readonly string[]): Promise<boolean> {
  const found = await Promise.all(names.map((name) => isFile(path.join(repoPath, name))));
  return found.includes(true);
}

/**
 * Detect project kinds from marker files; every check runs regardless of the others
 */
export async function detectProjectTypes(repoPath: string): Promise<ProjectTypeFlags> {
  const [isDdev, isDocker, isPython, isNode, isPhp, isGo, isRust] = await Promise.all([
    isDirectory(path.join(repoPath, '.ddev')),
    hasAnyFile(repoPath, DOCKER_MARKERS),
    hasAnyFile(repoPath, PYTHON_MARKERS),
    isFile(path.join(repoPath, 'package.json')),
    isFile(path.join(repoPath, 'composer.json')),
    isFile(path.join(repoPath, 'go.mod')),
    isFile(path.join(repoPath, 'Cargo.toml')),
  ]);

  return { isDdev, isDocker, isPython, isNode, isPhp, isGo, isRust };
}
