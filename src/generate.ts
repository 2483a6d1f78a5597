import type { CompletionClient } from './agent/index.js';
import { RefinementSession, type LineReader, type SessionOutcome, type SessionView } from './agent/session.js';
import type { AppConfig } from './config.js';
import { describeProject, type ProjectContext } from './context.js';
import { createCommitExecutor } from './git/commit.js';
import { collectDiff } from './git/diff.js';
import type { GitExecutor } from './git/index.js';

export interface GenerateOptions {
  autoCommit?: boolean;
  model?: string;
}

export interface GenerateDeps {
  config: AppConfig;
  git: GitExecutor;
  client: CompletionClient;
  view: SessionView;
  /** Only read from in interactive mode. */
  input: LineReader;
  cwd: string;
  showModel?: (model: string) => void;
  warn?: (message: string) => void;
}

const EMPTY_CONTEXT: ProjectContext = Object.freeze({ descriptors: Object.freeze([]) });

export async function runGenerate(opts: GenerateOptions, deps: GenerateDeps): Promise<SessionOutcome> {
  const warn = deps.warn ?? ((message: string) => console.warn(`[commitcraft] ${message}`));

  const diff = await collectDiff(deps.git, { warn });

  let context = EMPTY_CONTEXT;
  try {
    context = await describeProject(deps.cwd);
  } catch (err) {
    warn(`couldn't get project info: ${err instanceof Error ? err.message : String(err)}`);
  }

  const model = opts.model || deps.config.defaultModel;
  deps.showModel?.(model);

  const session = new RefinementSession({
    client: deps.client,
    committer: createCommitExecutor(deps.git),
    input: deps.input,
    view: deps.view,
    model,
    diff,
    context,
  });

  return opts.autoCommit ? session.runAutoCommit() : session.run();
}
