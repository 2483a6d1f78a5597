import type { Instruction, PromptInput } from './index.js';

export const COMMIT_DIRECTIVE =
  'Generate a concise and descriptive git commit message based on the following changes. ' +
  'Follow the conventional commit format (e.g., feat:, fix:, docs:, style:, refactor:, test:, chore:). ' +
  'Only respond with the commit message, nothing else.';

export const PROMPT_TEMPLATE = `{{directive}}

{{projectSection}}{{filesSection}}Changes:
{{payload}}`;

export const PAYLOAD_TEMPLATES = {
  standard: '{{diff}}',
  detailed: `{{diff}}

Please provide a more detailed commit message with additional context and explanations.`,
  summarize: `Please summarize this commit message in 50 characters or less:

{{previousMessage}}`,
  feedback: `Based on this diff:

{{diff}}

And considering this feedback: {{feedback}}

Generate an appropriate commit message.`,
} as const satisfies Record<Instruction['kind'], string>;

/** All available template variables */
export const TEMPLATE_VARIABLES = [
  'directive',
  'projectSection',
  'filesSection',
  'payload',
  'diff',
  'previousMessage',
  'feedback',
] as const;

export type TemplateVariable = (typeof TEMPLATE_VARIABLES)[number];

/**
 * Replace `{{variable}}` placeholders in a template string.
 * Unknown variables are left as-is. Substituted values are not rescanned.
 */
export function renderPrompt(
  template: string,
  vars: Partial<Record<TemplateVariable, string>>,
): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) => {
    const value = isTemplateVariable(key) ? vars[key] : undefined;
    return value ?? match;
  });
}

function isTemplateVariable(key: string): key is TemplateVariable {
  return TEMPLATE_VARIABLES.some((name) => name === key);
}

function renderPayload(instruction: Instruction, diff: string): string {
  switch (instruction.kind) {
    case 'standard':
    case 'detailed':
      return renderPrompt(PAYLOAD_TEMPLATES[instruction.kind], { diff });
    case 'summarize':
      return renderPrompt(PAYLOAD_TEMPLATES.summarize, { previousMessage: instruction.previousMessage });
    case 'feedback':
      return renderPrompt(PAYLOAD_TEMPLATES.feedback, { diff, feedback: instruction.feedback });
  }
}

export function composePrompt(input: PromptInput): string {
  const { instruction, diff, context, changedFiles } = input;

  const projectSection =
    context.descriptors.length > 0
      ? `Project information: ${context.descriptors.join(' ')}\n\n`
      : '';
  const filesSection =
    changedFiles.length > 0 ? `Changed files: ${changedFiles.join(', ')}\n\n` : '';

  return renderPrompt(PROMPT_TEMPLATE, {
    directive: COMMIT_DIRECTIVE,
    projectSection,
    filesSection,
    payload: renderPayload(instruction, diff.rawText),
  });
}
