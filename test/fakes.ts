import type { CompletionClient, GenerationResult, InstructionKind } from '../src/agent/index.js';
import type { LineReader, SessionView } from '../src/agent/session.js';
import type { CommitExecutor } from '../src/git/commit.js';
import type { GitExecutor, GitResult } from '../src/git/index.js';

/** Answers `git <args>` from a table keyed by the joined args. Unknown commands succeed with no output. */
export class FakeGit implements GitExecutor {
  readonly calls: string[][] = [];

  constructor(private readonly responses: Record<string, Partial<GitResult> | Error> = {}) {}

  async run(args: string[]): Promise<GitResult> {
    this.calls.push(args);
    const response = this.responses[args.join(' ')];
    if (response instanceof Error) {
      throw response;
    }
    return { code: 0, stdout: '', stderr: '', ...response };
  }
}

export class FakeClient implements CompletionClient {
  readonly calls: { model: string; prompt: string }[] = [];

  constructor(private readonly replies: (string | Error)[]) {}

  async generate(model: string, prompt: string): Promise<GenerationResult> {
    this.calls.push({ model, prompt });
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error('FakeClient: no reply queued');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return { text: reply };
  }
}

export class FakeInput implements LineReader {
  readonly prompts: string[] = [];

  constructor(private readonly lines: string[], private readonly onRead?: () => void) {}

  async readLine(prompt: string): Promise<string | null> {
    this.prompts.push(prompt);
    this.onRead?.();
    return this.lines.shift() ?? null;
  }
}

export class FakeCommitter implements CommitExecutor {
  readonly messages: string[] = [];

  constructor(private readonly failure?: Error) {}

  async commit(message: string): Promise<string> {
    this.messages.push(message);
    if (this.failure) {
      throw this.failure;
    }
    return '[main abc1234] ' + message;
  }
}

export class RecordingView implements SessionView {
  readonly events: string[] = [];

  generating(kind: InstructionKind, initial: boolean): void {
    this.events.push(`generating:${kind}${initial ? ':initial' : ''}`);
  }

  showMessage(kind: InstructionKind, message: string): void {
    this.events.push(`message:${kind}:${message}`);
  }

  showOptions(): void {
    this.events.push('options');
  }

  commandPrompt(): string {
    return 'command> ';
  }

  feedbackPrompt(): string {
    return 'feedback> ';
  }

  invalidOption(): void {
    this.events.push('invalid');
  }

  committed(summary: string): void {
    this.events.push(`committed:${summary}`);
  }

  canceled(): void {
    this.events.push('canceled');
  }
}
