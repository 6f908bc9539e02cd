import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';

// ─── Shared interfaces ───────────────────────────────────────────────

export interface ChatParams {
  model: string;
  system: string;
  messages: ChatMessage[];
  tools?: ToolDef[];
  tool_choice?: { type: 'any' } | { type: 'auto' } | { type: 'none' };
  max_tokens: number;
  signal?: AbortSignal;
  timeout_ms?: number;
}

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export type JsonPropertySchema = {
  type: 'string' | 'number' | 'boolean';
  description: string;
  enum?: string[];
};

export type JsonObjectSchema = {
  type: 'object';
  properties: Record<string, JsonPropertySchema>;
  required: string[];
};

export interface ToolDef {
  name: string;
  description: string;
  input_schema: JsonObjectSchema;
}

export interface ChatResponse {
  text: string;
  tool_calls: ToolCall[];
  usage: { input_tokens: number; output_tokens: number };
}

export interface ToolCall {
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export interface LLMProvider {
  readonly name: string;
  chat(params: ChatParams): Promise<ChatResponse>;
}

/**
 * Raised when the model names a tool but its arguments are not a JSON object.
 * Carries the raw payload so callers can log it.
 */
export class MalformedToolArgumentsError extends Error {
  readonly toolName: string;
  readonly rawArguments: string;

  constructor(toolName: string, rawArguments: string) {
    super(`Malformed arguments for tool ${toolName}`);
    this.name = 'MalformedToolArgumentsError';
    this.toolName = toolName;
    this.rawArguments = rawArguments;
  }
}

export const DEFAULT_CHAT_TIMEOUT_MS = 30_000;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function createCombinedAbortSignal(
  callerSignal: AbortSignal | undefined,
  timeoutMs: number,
): { signal: AbortSignal; cleanup: () => void } {
  const combinedController = new AbortController();
  const timeout = setTimeout(() => {
    combinedController.abort(new Error(`Timed out after ${timeoutMs}ms`));
  }, timeoutMs);
  timeout.unref?.();

  const onCallerAbort = () => {
    if (!combinedController.signal.aborted) combinedController.abort(callerSignal?.reason);
  };

  if (callerSignal) {
    if (callerSignal.aborted) {
      onCallerAbort();
    } else {
      callerSignal.addEventListener('abort', onCallerAbort, { once: true });
    }
  }

  const cleanup = () => {
    clearTimeout(timeout);
    callerSignal?.removeEventListener('abort', onCallerAbort);
  };

  return { signal: combinedController.signal, cleanup };
}

// ─── Anthropic provider ──────────────────────────────────────────────

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';
  private client: Anthropic | null = null;
  private readonly apiKey: string | undefined;

  constructor(config: { apiKey?: string }) {
    this.apiKey = config.apiKey;
  }

  /** Created on first use so the server can boot without credentials. */
  private getClient(): Anthropic {
    if (!this.apiKey) {
      throw new Error('ANTHROPIC_API_KEY environment variable is required when LLM_PROVIDER=anthropic');
    }
    if (!this.client) {
      this.client = new Anthropic({ apiKey: this.apiKey });
    }
    return this.client;
  }

  async chat(params: ChatParams): Promise<ChatResponse> {
    const anthropic = this.getClient();
    const { signal, cleanup } = createCombinedAbortSignal(
      params.signal,
      params.timeout_ms ?? DEFAULT_CHAT_TIMEOUT_MS,
    );

    const body: Anthropic.MessageCreateParamsNonStreaming = {
      model: params.model,
      max_tokens: params.max_tokens,
      system: params.system,
      messages: params.messages,
    };
    if (params.tools && params.tools.length > 0 && params.tool_choice?.type !== 'none') {
      body.tools = params.tools;
      if (params.tool_choice) {
        body.tool_choice = params.tool_choice.type === 'any' ? { type: 'any' } : { type: 'auto' };
      }
    }

    try {
      const response = await anthropic.messages.create(body, { signal, maxRetries: 0 });

      let text = '';
      const tool_calls: ToolCall[] = [];
      for (const block of response.content) {
        if (block.type === 'text') {
          text += block.text;
        } else if (block.type === 'tool_use') {
          if (!isRecord(block.input)) {
            throw new MalformedToolArgumentsError(block.name, JSON.stringify(block.input) ?? '');
          }
          tool_calls.push({ id: block.id, name: block.name, input: block.input });
        }
      }

      return {
        text,
        tool_calls,
        usage: {
          input_tokens: response.usage?.input_tokens ?? 0,
          output_tokens: response.usage?.output_tokens ?? 0,
        },
      };
    } finally {
      cleanup();
    }
  }
}

// ─── OpenAI-compatible provider ──────────────────────────────────────

const openAIResponseSchema = z.object({
  choices: z.array(z.object({
    message: z.object({
      content: z.string().nullish(),
      tool_calls: z.array(z.object({
        id: z.string(),
        type: z.string().optional(),
        function: z.object({
          name: z.string(),
          arguments: z.string(),
        }),
      })).nullish(),
    }),
    finish_reason: z.string().nullish(),
  })).min(1),
  usage: z.object({
    prompt_tokens: z.number().optional(),
    completion_tokens: z.number().optional(),
  }).nullish(),
});

type OpenAIChatResponse = z.infer<typeof openAIResponseSchema>;

interface OpenAICompatibleConfig {
  apiKey?: string;
  baseUrl: string;
}

/** Chat-completions API over fetch; works with OpenAI and compatible gateways. */
export class OpenAICompatibleProvider implements LLMProvider {
  readonly name = 'openai';
  private readonly apiKey: string | undefined;
  private readonly baseUrl: string;

  constructor(config: OpenAICompatibleConfig) {
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
  }

  async chat(params: ChatParams): Promise<ChatResponse> {
    if (!this.apiKey) {
      throw new Error('OPENAI_API_KEY environment variable is required when LLM_PROVIDER=openai');
    }
    const { signal, cleanup } = createCombinedAbortSignal(
      params.signal,
      params.timeout_ms ?? DEFAULT_CHAT_TIMEOUT_MS,
    );
    try {
      const response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify(this.buildRequestBody(params)),
        signal,
      });

      if (!response.ok) {
        const errText = await response.text().catch(() => '');
        throw new Error(`OpenAI API error ${response.status}: ${errText}`);
      }

      const parsed = openAIResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new Error(`OpenAI API returned an unexpected payload: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
      }
      return this.parseResponse(parsed.data);
    } finally {
      cleanup();
    }
  }

  // ─── Translation helpers ─────────────────────────────────────────

  private buildRequestBody(params: ChatParams): Record<string, unknown> {
    const body: Record<string, unknown> = {
      model: params.model,
      max_tokens: params.max_tokens,
      messages: [
        { role: 'system', content: params.system },
        ...params.messages.map((m) => ({ role: m.role, content: m.content })),
      ],
    };

    if (params.tools && params.tools.length > 0) {
      body.tools = params.tools.map((t) => ({
        type: 'function',
        function: {
          name: t.name,
          description: t.description,
          parameters: t.input_schema,
        },
      }));
    }

    if (params.tool_choice) {
      if (params.tool_choice.type === 'any') {
        body.tool_choice = 'required';
      } else if (params.tool_choice.type === 'none') {
        body.tool_choice = 'none';
      } else {
        body.tool_choice = 'auto';
      }
    }

    return body;
  }

  private parseResponse(data: OpenAIChatResponse): ChatResponse {
    const message = data.choices[0]?.message;
    const tool_calls: ToolCall[] = [];

    for (const tc of message?.tool_calls ?? []) {
      let input: unknown;
      try {
        input = JSON.parse(tc.function.arguments);
      } catch {
        throw new MalformedToolArgumentsError(tc.function.name, tc.function.arguments);
      }
      if (!isRecord(input)) {
        throw new MalformedToolArgumentsError(tc.function.name, tc.function.arguments);
      }
      tool_calls.push({ id: tc.id, name: tc.function.name, input });
    }

    return {
      text: message?.content ?? '',
      tool_calls,
      usage: {
        input_tokens: data.usage?.prompt_tokens ?? 0,
        output_tokens: data.usage?.completion_tokens ?? 0,
      },
    };
  }
}
