import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const mockCreate = vi.hoisted(() => vi.fn());

vi.mock('@anthropic-ai/sdk', () => ({
  default: class {
    messages = { create: mockCreate };
  },
}));

import {
  AnthropicProvider,
  MalformedToolArgumentsError,
  OpenAICompatibleProvider,
} from '../lib/llm-provider.js';
import type { ChatParams, ToolDef } from '../lib/llm-provider.js';

const lookupTool: ToolDef = {
  name: 'answer_resume_question',
  description: 'Answer a question',
  input_schema: {
    type: 'object',
    properties: { answer: { type: 'string', description: 'The answer' } },
    required: ['answer'],
  },
};

const baseParams: ChatParams = {
  model: 'test-model',
  system: 'Be brief.',
  messages: [{ role: 'user', content: 'Hi' }],
  tools: [lookupTool],
  tool_choice: { type: 'auto' },
  max_tokens: 256,
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('OpenAICompatibleProvider', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts a chat-completions request with function tools', async () => {
    fetchMock.mockResolvedValue(jsonResponse({
      choices: [{ message: { content: 'Hello there' }, finish_reason: 'stop' }],
      usage: { prompt_tokens: 12, completion_tokens: 3 },
    }));
    const provider = new OpenAICompatibleProvider({ apiKey: 'test-key', baseUrl: 'https://llm.test/v1/' });

    const result = await provider.chat(baseParams);

    expect(result).toEqual({ text: 'Hello there', tool_calls: [], usage: { input_tokens: 12, output_tokens: 3 } });
    const call = fetchMock.mock.calls[0];
    const init = call?.[1];
    expect(call?.[0]).toBe('https://llm.test/v1/chat/completions');
    expect(new Headers(init?.headers).get('Authorization')).toBe('Bearer test-key');
    const sent: unknown = JSON.parse(typeof init?.body === 'string' ? init.body : '{}');
    expect(sent).toEqual({
      model: 'test-model',
      max_tokens: 256,
      messages: [
        { role: 'system', content: 'Be brief.' },
        { role: 'user', content: 'Hi' },
      ],
      tools: [{
        type: 'function',
        function: {
          name: 'answer_resume_question',
          description: 'Answer a question',
          parameters: lookupTool.input_schema,
        },
      }],
      tool_choice: 'auto',
    });
  });

  it('decodes tool-call arguments', async () => {
    fetchMock.mockResolvedValue(jsonResponse({
      choices: [{
        message: {
          content: null,
          tool_calls: [{
            id: 'call_1',
            type: 'function',
            function: { name: 'answer_resume_question', arguments: '{"answer":"Yes"}' },
          }],
        },
      }],
    }));
    const provider = new OpenAICompatibleProvider({ apiKey: 'test-key', baseUrl: 'https://llm.test/v1' });

    const result = await provider.chat(baseParams);

    expect(result.text).toBe('');
    expect(result.tool_calls).toEqual([{ id: 'call_1', name: 'answer_resume_question', input: { answer: 'Yes' } }]);
  });

  it.each(['{"answer": ', '"just a string"', '[1,2]'])('raises MalformedToolArgumentsError for %s', async (args) => {
    fetchMock.mockResolvedValue(jsonResponse({
      choices: [{
        message: {
          tool_calls: [{ id: 'call_1', function: { name: 'answer_resume_question', arguments: args } }],
        },
      }],
    }));
    const provider = new OpenAICompatibleProvider({ apiKey: 'test-key', baseUrl: 'https://llm.test/v1' });

    const error = await provider.chat(baseParams).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(MalformedToolArgumentsError);
    expect(error).toMatchObject({ toolName: 'answer_resume_question', rawArguments: args });
  });

  it('reports HTTP failures with status and body', async () => {
    fetchMock.mockResolvedValue(new Response('quota exceeded', { status: 429 }));
    const provider = new OpenAICompatibleProvider({ apiKey: 'test-key', baseUrl: 'https://llm.test/v1' });

    await expect(provider.chat(baseParams)).rejects.toThrow('OpenAI API error 429: quota exceeded');
  });

  it('fails fast without an API key', async () => {
    const provider = new OpenAICompatibleProvider({ baseUrl: 'https://llm.test/v1' });
    await expect(provider.chat(baseParams)).rejects.toThrow('OPENAI_API_KEY');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  describe('request deadlines', () => {
    beforeEach(() => {
      // Hangs until the request signal fires.
      fetchMock.mockImplementation((_input, init) => new Promise<Response>((_resolve, reject) => {
        const signal = init?.signal;
        if (!signal) return;
        if (signal.aborted) {
          reject(signal.reason);
          return;
        }
        signal.addEventListener('abort', () => reject(signal.reason), { once: true });
      }));
    });

    it('rejects when the caller signal is already aborted', async () => {
      const provider = new OpenAICompatibleProvider({ apiKey: 'test-key', baseUrl: 'https://llm.test/v1' });
      const controller = new AbortController();
      controller.abort(new Error('Client disconnected'));

      await expect(provider.chat({ ...baseParams, signal: controller.signal }))
        .rejects.toThrow('Client disconnected');
    });

    it('rejects when the caller aborts mid-request', async () => {
      const provider = new OpenAICompatibleProvider({ apiKey: 'test-key', baseUrl: 'https://llm.test/v1' });
      const controller = new AbortController();

      const pending = provider.chat({ ...baseParams, signal: controller.signal });
      controller.abort(new Error('Client disconnected'));

      await expect(pending).rejects.toThrow('Client disconnected');
    });

    it('rejects once timeout_ms elapses', async () => {
      const provider = new OpenAICompatibleProvider({ apiKey: 'test-key', baseUrl: 'https://llm.test/v1' });

      await expect(provider.chat({ ...baseParams, timeout_ms: 20 })).rejects.toThrow('Timed out after 20ms');
    });
  });
});

describe('AnthropicProvider', () => {
  beforeEach(() => {
    mockCreate.mockReset();
  });

  it('maps text and tool_use blocks', async () => {
    mockCreate.mockResolvedValue({
      content: [
        { type: 'text', text: 'Let me check. ' },
        { type: 'tool_use', id: 'toolu_1', name: 'answer_resume_question', input: { answer: 'Yes' } },
      ],
      usage: { input_tokens: 20, output_tokens: 8 },
    });
    const provider = new AnthropicProvider({ apiKey: 'test-key' });

    const result = await provider.chat(baseParams);

    expect(result).toEqual({
      text: 'Let me check. ',
      tool_calls: [{ id: 'toolu_1', name: 'answer_resume_question', input: { answer: 'Yes' } }],
      usage: { input_tokens: 20, output_tokens: 8 },
    });
    const call = mockCreate.mock.calls[0];
    expect(call?.[0]).toEqual({
      model: 'test-model',
      max_tokens: 256,
      system: 'Be brief.',
      messages: [{ role: 'user', content: 'Hi' }],
      tools: [lookupTool],
      tool_choice: { type: 'auto' },
    });
    expect(call?.[1]).toMatchObject({ maxRetries: 0 });
  });

  it('omits tools when tool use is disabled', async () => {
    mockCreate.mockResolvedValue({ content: [{ type: 'text', text: 'ok' }], usage: { input_tokens: 1, output_tokens: 1 } });
    const provider = new AnthropicProvider({ apiKey: 'test-key' });

    await provider.chat({ ...baseParams, tool_choice: { type: 'none' } });

    const body: unknown = mockCreate.mock.calls[0]?.[0];
    expect(body).not.toHaveProperty('tools');
    expect(body).not.toHaveProperty('tool_choice');
  });

  it('rejects non-object tool input', async () => {
    mockCreate.mockResolvedValue({
      content: [{ type: 'tool_use', id: 'toolu_1', name: 'answer_resume_question', input: 'oops' }],
      usage: { input_tokens: 1, output_tokens: 1 },
    });
    const provider = new AnthropicProvider({ apiKey: 'test-key' });

    await expect(provider.chat(baseParams)).rejects.toBeInstanceOf(MalformedToolArgumentsError);
  });

  it('fails fast without an API key', async () => {
    const provider = new AnthropicProvider({});
    await expect(provider.chat(baseParams)).rejects.toThrow('ANTHROPIC_API_KEY');
    expect(mockCreate).not.toHaveBeenCalled();
  });
});
