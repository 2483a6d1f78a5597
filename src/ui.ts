import { createInterface, type Interface } from 'node:readline';
import chalk from 'chalk';
import type { InstructionKind } from './agent/index.js';
import type { LineReader, SessionView } from './agent/session.js';
import type { AppConfig } from './config.js';

export const VERSION = '0.1.0';

const RULE = '━'.repeat(52);

const BANNER = [
  '┌─┐┌─┐┌┬┐┌┬┐┬┌┬┐┌─┐┬─┐┌─┐┌─┐┌┬┐',
  '│  │ ││││││││ │ │  ├┬┘├─┤├┤  │ ',
  '└─┘└─┘┴ ┴┴ ┴┴ ┴ └─┘┴└─┴ ┴└   ┴ ',
];

type Write = (text: string) => void;

const stdoutWrite: Write = (text) => {
  process.stdout.write(text);
};

export function printBanner(write: Write = stdoutWrite): void {
  for (const line of BANNER) {
    write(`${chalk.blue(line)}\n`);
  }
  write('\n');
  write(`${chalk.cyan('commitcraft')} ${chalk.green(`v${VERSION}`)}\n`);
  write(`${chalk.yellow('AI-powered commit message generator')}\n`);
  write(`${chalk.magenta(RULE)}\n\n`);
}

export function printModel(model: string, write: Write = stdoutWrite): void {
  write(`\n${chalk.magenta(RULE)}\n`);
  write(`${chalk.green('🤖 USING MODEL:')} ${chalk.cyan(model)}\n`);
  write(`${chalk.magenta(RULE)}\n`);
}

export function printConfig(config: AppConfig, configPath: string, write: Write = stdoutWrite): void {
  write(`${chalk.blue('📋 Current configuration:')}\n`);
  write(`${chalk.magenta(RULE)}\n`);
  write(`${chalk.green('api_key:')} ${formatApiKey(config.apiKey)}\n`);
  write(`${chalk.green('api_url:')} ${chalk.blue(config.apiUrl)}\n`);
  write(`${chalk.green('default_model:')} ${chalk.blue(config.defaultModel)}\n`);
  write(`${chalk.magenta(RULE)}\n`);
  write(`\n${chalk.green('💾 Configuration stored at:')} ${chalk.blue(configPath)}\n`);
}

/** The key itself is never printed. */
export function formatApiKey(apiKey: string): string {
  return apiKey ? chalk.blue('[SET]') : chalk.red('[NOT SET]');
}

const GENERATING: Record<InstructionKind, string> = {
  standard: '🔄 Retrying with a new generation...',
  detailed: '🔍 Generating a more detailed commit message...',
  summarize: '📝 Summarizing the commit message...',
  feedback: '🎯 Generating commit message based on your feedback...',
};

const HEADINGS: Record<InstructionKind, string> = {
  standard: '✨ REGENERATED COMMIT MESSAGE:',
  detailed: '✨ GENERATED DETAILED COMMIT MESSAGE:',
  summarize: '✨ SUMMARIZED COMMIT MESSAGE:',
  feedback: '✨ FEEDBACK-BASED COMMIT MESSAGE:',
};

export class TerminalView implements SessionView {
  constructor(private readonly write: Write = stdoutWrite) {}

  generating(kind: InstructionKind, initial: boolean): void {
    if (initial) {
      this.write(`\n${chalk.yellow('Generating commit message...')}\n`);
      return;
    }
    this.write(`${chalk.blue(GENERATING[kind])}\n`);
  }

  showMessage(kind: InstructionKind, message: string, initial: boolean): void {
    const heading = initial ? '✨ GENERATED COMMIT MESSAGE:' : HEADINGS[kind];
    this.write(`\n${chalk.magenta(RULE)}\n`);
    this.write(`${chalk.blue(heading)}\n`);
    this.write(`${chalk.magenta(RULE)}\n`);
    this.write(`\n${chalk.cyan(message)}\n\n`);
    this.write(`${chalk.magenta(RULE)}\n`);
  }

  showOptions(): void {
    this.write(`\n${chalk.yellow('⚙️  OPTIONS:')}\n`);
    this.write(`${chalk.magenta(RULE)}\n`);
    this.write(`  ${chalk.green('y/yes')} - Create commit with this message\n`);
    this.write(`  ${chalk.red('n/no')} - Cancel commit\n`);
    this.write(`  ${chalk.blue('g')} - Generate more detailed message\n`);
    this.write(`  ${chalk.blue('r')} - Retry with new generation\n`);
    this.write(`  ${chalk.blue('s')} - Summarize message\n`);
    this.write(`  ${chalk.blue('p')} - Provide feedback for the message\n`);
    this.write(`${chalk.magenta(RULE)}\n`);
  }

  commandPrompt(): string {
    return chalk.yellow('Create commit with this message? [y/n/g/r/s/p]: ');
  }

  feedbackPrompt(): string {
    this.write(`${chalk.blue('🔍 Enter your feedback for the commit message:')}\n`);
    return '> ';
  }

  invalidOption(): void {
    this.write(
      `${chalk.red('❌ Invalid option. Please choose y (yes), n (no), g (generate detailed), r (retry), s (shorter), or p (custom prompt).')}\n`,
    );
  }

  committed(summary: string): void {
    if (summary) {
      this.write(`${summary}\n`);
    }
    this.write(`${chalk.green('✅ Commit created successfully')}\n`);
  }

  canceled(): void {
    this.write(`${chalk.yellow('⚠️ Commit canceled')}\n`);
  }
}

/**
 * Line input over a readline interface, opened on the first read so that
 * auto-commit runs never touch stdin. Lines are pulled from the async
 * iterator so that end of input resolves as `null` instead of hanging.
 */
export class ReadlineLineReader implements LineReader {
  private rl: Interface | null = null;
  private lines: AsyncIterator<string> | null = null;

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout,
  ) {}

  async readLine(prompt: string): Promise<string | null> {
    if (!this.lines) {
      this.rl = createInterface({ input: this.input, terminal: false });
      this.lines = this.rl[Symbol.asyncIterator]();
    }
    this.output.write(prompt);
    const next = await this.lines.next();
    return next.done ? null : next.value;
  }

  close(): void {
    this.rl?.close();
  }
}
