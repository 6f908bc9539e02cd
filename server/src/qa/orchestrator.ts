import { createSessionLogger } from '../lib/logger.js';
import { MalformedToolArgumentsError } from '../lib/llm-provider.js';
import type { LLMProvider } from '../lib/llm-provider.js';
import { ALL_ACTIONS, decodeAction } from './action-catalog.js';
import { dispatchAction } from './action-dispatch.js';
import type { SessionStore } from './session-store.js';
import { buildClarificationPrompt, buildStandardPrompt, selectHistory } from './system-prompt.js';

export const EMPTY_RESPONSE_FALLBACK =
  "I'd be happy to help answer questions about the resume. What specific information are you looking for?";

export const MALFORMED_ARGUMENTS_MESSAGE =
  'I encountered an error processing your request. Please try rephrasing your question.';

export const MODEL_FAILURE_MESSAGE =
  "I'm sorry, I encountered an error while processing your request. Please try asking your question in a different way.";

export const DEFAULT_CONTEXT_WINDOW = 6;

export interface OrchestratorOptions {
  llm: LLMProvider;
  store: SessionStore;
  model: string;
  resumeText: string;
  /** Prior user/assistant turns replayed to the model on a standard turn. */
  contextWindow?: number;
  maxTokens?: number;
  timeoutMs?: number;
}

export interface RespondOptions {
  sessionId?: string | null;
  signal?: AbortSignal;
}

/**
 * Runs one user turn: prompt assembly, a single model call, and dispatch of
 * whatever the model chose. Never throws; failures become safe text.
 */
export class DialogueOrchestrator {
  private readonly llm: LLMProvider;
  private readonly store: SessionStore;
  private readonly model: string;
  private readonly resumeText: string;
  private readonly contextWindow: number;
  private readonly maxTokens: number;
  private readonly timeoutMs: number | undefined;

  constructor(options: OrchestratorOptions) {
    this.llm = options.llm;
    this.store = options.store;
    this.model = options.model;
    this.resumeText = options.resumeText;
    this.contextWindow = options.contextWindow ?? DEFAULT_CONTEXT_WINDOW;
    this.maxTokens = options.maxTokens ?? 1024;
    this.timeoutMs = options.timeoutMs;
  }

  /** Yields the reply in chunks. Today the reply is a single chunk. */
  async *respond(question: string, options: RespondOptions = {}): AsyncGenerator<string, void, undefined> {
    yield await this.answer(question, options);
  }

  async answer(question: string, options: RespondOptions = {}): Promise<string> {
    const session = options.sessionId ? this.store.getSession(options.sessionId) : null;
    const sessionId = session?.id ?? null;
    const log = createSessionLogger(sessionId);

    const prompt = session?.awaitingClarification && session.originalQuestion
      ? buildClarificationPrompt(
          question,
          this.resumeText,
          session.originalQuestion,
          session.clarificationContext?.reason ?? 'unclear_question',
        )
      : buildStandardPrompt(
          question,
          this.resumeText,
          session ? selectHistory(session.messages, this.contextWindow) : [],
        );

    if (sessionId) {
      this.store.addMessage(sessionId, 'user', question);
    }

    try {
      const response = await this.llm.chat({
        model: this.model,
        system: prompt.system,
        messages: prompt.messages,
        tools: [...ALL_ACTIONS],
        tool_choice: { type: 'auto' },
        max_tokens: this.maxTokens,
        signal: options.signal,
        timeout_ms: this.timeoutMs,
      });

      const call = response.tool_calls[0];
      if (call) {
        if (response.tool_calls.length > 1) {
          log.warn({ count: response.tool_calls.length }, 'Model requested several actions; handling the first');
        }
        return dispatchAction(decodeAction(call), { question, sessionId, store: this.store });
      }

      const content = response.text || EMPTY_RESPONSE_FALLBACK;
      if (sessionId) {
        this.store.addMessage(sessionId, 'assistant', content);
      }
      return content;
    } catch (err) {
      if (err instanceof MalformedToolArgumentsError) {
        log.error({ tool: err.toolName, raw_arguments: err.rawArguments }, 'Invalid function arguments from model');
        return MALFORMED_ARGUMENTS_MESSAGE;
      }
      log.error({ err }, 'Model call failed');
      return MODEL_FAILURE_MESSAGE;
    }
  }
}
