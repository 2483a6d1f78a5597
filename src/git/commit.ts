import { CommitError } from '../errors.js';
import { describeFailure, type GitExecutor, type GitResult } from './index.js';

export interface CommitExecutor {
  commit(message: string): Promise<string>;
}

/**
 * Stage the whole working tree and commit it with `message`.
 * Resolves with git's commit summary. Nothing is unstaged if the commit fails.
 */
export async function commitAll(git: GitExecutor, message: string): Promise<string> {
  const add = await runStep(git, ['add', '.'], 'failed to stage changes');
  if (add.code !== 0) {
    throw new CommitError(`failed to stage changes: ${describeFailure(add)}`);
  }

  const commit = await runStep(git, ['commit', '-m', message], 'failed to create commit');
  if (commit.code !== 0) {
    throw new CommitError(`failed to create commit: ${describeFailure(commit)}`);
  }

  return commit.stdout.trim();
}

async function runStep(git: GitExecutor, args: string[], label: string): Promise<GitResult> {
  try {
    return await git.run(args);
  } catch (err) {
    throw new CommitError(`${label}: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
  }
}

export function createCommitExecutor(git: GitExecutor): CommitExecutor {
  return {
    commit: (message) => commitAll(git, message),
  };
}
