import { z } from 'zod';
import { EmptyResponseError, ParseError, RemoteError, TransportError } from '../errors.js';
import type { CompletionClient, GenerationResult } from './index.js';

export const APP_REFERER = 'https://www.npmjs.com/package/commitcraft';

const choiceSchema = z.object({
  message: z.object({
    content: z.string().nullish(),
  }),
});

// later candidates are never read, so only their container is checked
const chatCompletionSchema = z.object({
  choices: z.array(z.unknown()).nullish(),
});

export type ChatChoice = z.infer<typeof choiceSchema>;

export interface ChatCompletionResponse {
  choices: ChatChoice[];
}

export interface ChatMessage {
  role: 'user';
  content: string;
}

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
}

export interface OpenRouterClientOptions {
  apiUrl: string;
  apiKey: string;
  fetch?: typeof fetch;
}

export class OpenRouterClient implements CompletionClient {
  private apiUrl: string;
  private apiKey: string;
  private fetchImpl: typeof fetch;

  constructor(opts: OpenRouterClientOptions) {
    this.apiUrl = opts.apiUrl;
    this.apiKey = opts.apiKey;
    this.fetchImpl = opts.fetch ?? ((input, init) => fetch(input, init));
  }

  buildRequest(model: string, prompt: string): ChatCompletionRequest {
    return {
      model,
      messages: [{ role: 'user', content: prompt }],
    };
  }

  /** One POST, no retry. Only `choices[0]` is read. */
  async generate(model: string, prompt: string): Promise<GenerationResult> {
    let response: Response;
    let body: string;
    try {
      response = await this.fetchImpl(this.apiUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
          'HTTP-Referer': APP_REFERER,
        },
        body: JSON.stringify(this.buildRequest(model, prompt)),
      });
      body = await response.text();
    } catch (err) {
      throw new TransportError(
        `failed to send request: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }

    if (!response.ok) {
      throw new RemoteError(response.status, body);
    }

    const parsed = parseCompletion(body);
    const content = parsed.choices[0]?.message.content?.trim();
    if (!content) {
      throw new EmptyResponseError();
    }

    return { text: content };
  }
}

export function parseCompletion(body: string): ChatCompletionResponse {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (err) {
    throw new ParseError(
      `failed to parse response: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }

  const result = chatCompletionSchema.safeParse(json);
  if (!result.success) {
    throw shapeError(result.error);
  }

  const first = result.data.choices?.[0];
  if (first === undefined) {
    return { choices: [] };
  }
  const choice = choiceSchema.safeParse(first);
  if (!choice.success) {
    throw shapeError(choice.error);
  }
  return { choices: [choice.data] };
}

function shapeError(error: z.ZodError): ParseError {
  return new ParseError(`unexpected response shape: ${error.issues[0]?.message ?? 'invalid'}`, {
    cause: error,
  });
}
