import { execFile } from 'child_process';
import { promisify } from 'util';
import { ConfigError } from '../errors';

const execFileAsync = promisify(execFile);

async function git(args: string[], cwd: string): Promise<string> {
  const { stdout } = await execFileAsync('git', args, { cwd });
  return stdout.trim();
}

export async function isGitRepository(cwd: string = process.cwd()): Promise<boolean> {
  try {
    await git(['rev-parse', '--git-dir'], cwd);
    return true;
  } catch {
    return false;
  }
}

/** Exact tag on HEAD, else the nearest reachable tag. */
export async function getCurrentTag(cwd: string = process.cwd()): Promise<string | undefined> {
  for (const args of [
    ['describe', '--tags', '--exact-match', 'HEAD'],
    ['describe', '--tags', '--abbrev=0', 'HEAD']
  ]) {
    const tag = await git(args, cwd).catch(() => '');
    if (tag) return tag;
  }
  return undefined;
}

export async function getCurrentBranch(cwd: string = process.cwd()): Promise<string> {
  const branch = await git(['rev-parse', '--abbrev-ref', 'HEAD'], cwd);
  if (branch === 'HEAD') {
    throw new ConfigError('Currently in detached HEAD state with no tag', {
      hint: 'Use --tag to choose a version explicitly'
    });
  }
  return branch;
}

/** The current Git tag, or the branch when HEAD carries none. */
export async function getCurrentVersion(cwd: string = process.cwd()): Promise<string> {
  const tag = await getCurrentTag(cwd);
  if (tag) return tag;
  return getCurrentBranch(cwd);
}

export async function resolveTag(explicitTag: string | undefined, cwd: string = process.cwd()): Promise<string> {
  if (explicitTag) return explicitTag;
  if (!(await isGitRepository(cwd))) {
    throw new ConfigError('Not a git repository and no --tag specified', {
      hint: 'Use --tag to choose a version explicitly'
    });
  }
  return getCurrentVersion(cwd);
}
