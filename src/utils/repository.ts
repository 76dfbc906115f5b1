import { spawn } from 'child_process';
import * as fs from 'fs-extra';
import * as path from 'path';
import { ConfigurationError } from './errors';

export const CLONE_SUFFIX = '__src_clone';

/** Where a remote source is cloned for a given destination. */
export function cloneDirectoryFor(dest: string): string {
  return path.resolve(dest + CLONE_SUFFIX);
}

/**
 * Shallow-clones `repoUrl` into `dir`. An existing directory is reused as is.
 */
export async function cloneRepository(repoUrl: string, dir: string): Promise<string> {
  if (await fs.pathExists(dir)) {
    return dir;
  }

  await new Promise<void>((resolve, reject) => {
    let stderr = '';
    const child = spawn('git', ['clone', '--depth', '1', repoUrl, dir], {
      stdio: ['ignore', 'ignore', 'pipe'],
    });

    child.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'ENOENT') {
        reject(new ConfigurationError('git not found. Please install git to use --repo-url.'));
      } else {
        reject(new ConfigurationError(`Failed to spawn git: ${error.message}`));
      }
    });

    child.on('close', code => {
      if (code === 0) {
        resolve();
      } else {
        reject(new ConfigurationError(`git clone failed (exit code ${code}): ${stderr.trim()}`));
      }
    });
  });

  return dir;
}

export async function removeClone(dir: string): Promise<void> {
  await fs.remove(dir);
}
