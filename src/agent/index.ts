import type { ProjectContext } from '../context.js';
import type { DiffSnapshot } from '../git/diff.js';

export type Instruction =
  | { kind: 'standard' }
  | { kind: 'detailed' }
  | { kind: 'summarize'; previousMessage: string }
  | { kind: 'feedback'; feedback: string };

export type InstructionKind = Instruction['kind'];

export interface PromptInput {
  instruction: Instruction;
  diff: Pick<DiffSnapshot, 'rawText'>;
  context: ProjectContext;
  changedFiles: readonly string[];
}

export interface GenerationResult {
  text: string;
}

export interface CompletionClient {
  generate(model: string, prompt: string): Promise<GenerationResult>;
}
