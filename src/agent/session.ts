import type { ProjectContext } from '../context.js';
import { InputError } from '../errors.js';
import type { CommitExecutor } from '../git/commit.js';
import type { DiffSnapshot } from '../git/diff.js';
import type { CompletionClient, GenerationResult, Instruction, InstructionKind } from './index.js';
import { composePrompt } from './prompt.js';

export type SessionCommand =
  | { type: 'accept' }
  | { type: 'reject' }
  | { type: 'detail' }
  | { type: 'retry' }
  | { type: 'shorten' }
  | { type: 'feedback' }
  | { type: 'invalid'; input: string };

export type SessionState = 'init' | 'awaiting' | 'generating' | 'committed' | 'canceled';

export type SessionOutcome = Extract<SessionState, 'committed' | 'canceled'>;

export interface LineReader {
  /** Resolves with `null` once the input is closed. */
  readLine(prompt: string): Promise<string | null>;
}

export interface SessionView {
  /** `initial` is true only for the first generation of a session. */
  generating(kind: InstructionKind, initial: boolean): void;
  showMessage(kind: InstructionKind, message: string, initial: boolean): void;
  showOptions(): void;
  commandPrompt(): string;
  feedbackPrompt(): string;
  invalidOption(): void;
  committed(summary: string): void;
  canceled(): void;
}

export interface RefinementSessionOptions {
  client: CompletionClient;
  committer: CommitExecutor;
  input: LineReader;
  view: SessionView;
  model: string;
  diff: DiffSnapshot;
  context: ProjectContext;
}

/**
 * Turn one raw input line into a command. Empty input accepts.
 */
export function parseCommand(raw: string): SessionCommand {
  const input = raw.trim().toLowerCase();
  switch (input) {
    case '':
    case 'y':
    case 'yes':
      return { type: 'accept' };
    case 'n':
    case 'no':
      return { type: 'reject' };
    case 'g':
      return { type: 'detail' };
    case 'r':
      return { type: 'retry' };
    case 's':
      return { type: 'shorten' };
    case 'p':
      return { type: 'feedback' };
    default:
      return { type: 'invalid', input };
  }
}

export class RefinementSession {
  private _state: SessionState = 'init';
  private currentMessage = '';
  private readonly opts: RefinementSessionOptions;

  constructor(opts: RefinementSessionOptions) {
    this.opts = opts;
  }

  get state(): SessionState {
    return this._state;
  }

  get message(): string {
    return this.currentMessage;
  }

  /**
   * Generate the first message, then loop on user commands until the
   * message is committed or the session is canceled. Any generation or
   * commit failure rejects and ends the session.
   */
  async run(): Promise<SessionOutcome> {
    await this.generate({ kind: 'standard' });
    this.opts.view.showOptions();

    for (;;) {
      const line = await this.opts.input.readLine(this.opts.view.commandPrompt());
      if (line === null) {
        throw new InputError('input closed while waiting for a command');
      }
      const outcome = await this.dispatch(parseCommand(line));
      if (outcome) {
        return outcome;
      }
    }
  }

  /** One standard generation, committed without asking. */
  async runAutoCommit(): Promise<SessionOutcome> {
    await this.generate({ kind: 'standard' });
    return this.commit();
  }

  async dispatch(command: SessionCommand): Promise<SessionOutcome | null> {
    if (this._state !== 'awaiting') {
      throw new Error(`cannot handle "${command.type}" in state "${this._state}"`);
    }

    switch (command.type) {
      case 'accept':
        return this.commit();
      case 'reject':
        this._state = 'canceled';
        this.opts.view.canceled();
        return 'canceled';
      case 'detail':
        await this.generate({ kind: 'detailed' });
        return null;
      case 'retry':
        await this.generate({ kind: 'standard' });
        return null;
      case 'shorten':
        await this.generate({ kind: 'summarize', previousMessage: this.currentMessage });
        return null;
      case 'feedback': {
        const feedback = await this.opts.input.readLine(this.opts.view.feedbackPrompt());
        if (feedback === null) {
          throw new InputError('input closed while waiting for feedback');
        }
        await this.generate({ kind: 'feedback', feedback: feedback.trim() });
        return null;
      }
      case 'invalid':
        this.opts.view.invalidOption();
        return null;
    }
  }

  private async generate(instruction: Instruction): Promise<void> {
    const { client, view, model, diff, context } = this.opts;
    const previous = this._state;
    const initial = previous === 'init';
    this._state = 'generating';
    view.generating(instruction.kind, initial);

    const prompt = composePrompt({
      instruction,
      diff,
      context,
      changedFiles: diff.changedFiles,
    });
    let result: GenerationResult;
    try {
      result = await client.generate(model, prompt);
    } catch (err) {
      this._state = previous;
      throw err;
    }

    // only replaced once the call has succeeded
    this.currentMessage = result.text;
    this._state = 'awaiting';
    view.showMessage(instruction.kind, result.text, initial);
  }

  private async commit(): Promise<SessionOutcome> {
    const summary = await this.opts.committer.commit(this.currentMessage);
    this._state = 'committed';
    this.opts.view.committed(summary);
    return 'committed';
  }
}
