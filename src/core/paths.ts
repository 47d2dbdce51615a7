import fs from 'fs';
import path from 'path';

/** Nearest ancestor of this module that holds a package.json. */
export function projectRoot(startDir: string = __dirname): string {
  let dir = startDir;
  for (let i = 0; i < 10; i++) {
    if (fs.existsSync(path.join(dir, 'package.json'))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return process.cwd();
}

export function dataDir(): string {
  return path.join(projectRoot(), 'data');
}

export function defaultSqlitePath(): string {
  return path.join(projectRoot(), 'runs', 'adaptive-retriever.sqlite');
}
