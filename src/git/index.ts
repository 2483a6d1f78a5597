import { spawn } from 'node:child_process';
import { EnvironmentError } from '../errors.js';

export interface GitResult {
  code: number;
  stdout: string;
  stderr: string;
}

export interface GitExecutor {
  /**
   * Run `git <args>` and resolve with its output once it exits.
   * Rejects only when the process could not be started.
   */
  run(args: string[]): Promise<GitResult>;
}

export class SpawnGitExecutor implements GitExecutor {
  constructor(private readonly cwd: string = process.cwd()) {}

  run(args: string[]): Promise<GitResult> {
    return new Promise((resolve, reject) => {
      const proc = spawn('git', args, {
        cwd: this.cwd,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';

      // decode on the stream so characters split across chunks survive
      proc.stdout.setEncoding('utf8');
      proc.stderr.setEncoding('utf8');
      proc.stdout.on('data', (data: string) => {
        stdout += data;
      });
      proc.stderr.on('data', (data: string) => {
        stderr += data;
      });
      proc.on('close', (code) => {
        resolve({ code: code ?? 1, stdout, stderr });
      });
      proc.on('error', (err) => {
        reject(err);
      });
    });
  }
}

export async function ensureRepository(git: GitExecutor): Promise<void> {
  try {
    await git.run(['--version']);
  } catch (err) {
    throw new EnvironmentError('git is not installed or not in PATH', { cause: err });
  }

  const result = await git.run(['rev-parse', '--is-inside-work-tree']);
  if (result.code !== 0) {
    throw new EnvironmentError('current directory is not a git repository');
  }
}

export function describeFailure(result: GitResult): string {
  // `git commit` reports "nothing to commit" on stdout
  const detail = result.stderr.trim() || result.stdout.trim();
  return detail ? detail : `git exited with code ${result.code}`;
}
