import { EnvironmentError, NoChangesError } from '../errors.js';
import { describeFailure, ensureRepository, type GitExecutor } from './index.js';

export type DiffScope = 'staged' | 'unstaged';

export interface DiffSnapshot {
  readonly rawText: string;
  readonly changedFiles: readonly string[];
  readonly scope: DiffScope;
}

export interface CollectOptions {
  warn?: (message: string) => void;
}

const defaultWarn = (message: string): void => {
  console.warn(`[commitcraft] ${message}`);
};

/**
 * Run one diff query per scope, staged first, and return the first
 * non-empty output. Staged and unstaged changes are never combined.
 */
async function queryWithFallback(
  git: GitExecutor,
  extraArgs: string[],
  what: string,
): Promise<{ output: string; scope: DiffScope } | null> {
  const staged = await git.run(['diff', '--staged', ...extraArgs]);
  if (staged.code !== 0) {
    throw new EnvironmentError(`failed to get staged ${what}: ${describeFailure(staged)}`);
  }
  if (staged.stdout.length > 0) {
    return { output: staged.stdout, scope: 'staged' };
  }

  const unstaged = await git.run(['diff', ...extraArgs]);
  if (unstaged.code !== 0) {
    throw new EnvironmentError(`failed to get unstaged ${what}: ${describeFailure(unstaged)}`);
  }
  if (unstaged.stdout.length > 0) {
    return { output: unstaged.stdout, scope: 'unstaged' };
  }

  return null;
}

export async function listChangedFiles(git: GitExecutor): Promise<string[]> {
  const found = await queryWithFallback(git, ['--name-only'], 'files');
  if (!found) {
    throw new NoChangesError('no changed files detected in the repository');
  }
  return found.output.trim().split('\n');
}

/**
 * Capture the diff to describe for this session.
 *
 * The changed-file list comes from a separate name-only query. It only
 * enriches the prompt, so its failure is logged and leaves the list empty.
 * The two queries are not reconciled (renames can make them disagree).
 */
export async function collectDiff(git: GitExecutor, opts: CollectOptions = {}): Promise<DiffSnapshot> {
  const warn = opts.warn ?? defaultWarn;

  await ensureRepository(git);

  const found = await queryWithFallback(git, [], 'changes');
  if (!found) {
    throw new NoChangesError();
  }

  let changedFiles: string[] = [];
  try {
    changedFiles = await listChangedFiles(git);
  } catch (err) {
    warn(`couldn't get changed files: ${err instanceof Error ? err.message : String(err)}`);
  }

  return Object.freeze({
    rawText: found.output,
    changedFiles: Object.freeze(changedFiles),
    scope: found.scope,
  });
}
