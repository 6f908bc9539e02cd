import logger from '../lib/logger.js';
import type { Confidence, DecodedAction } from './action-catalog.js';
import type { SessionStore } from './session-store.js';

export const DECOY_REFUSAL =
  "I can only answer questions about the resume. Please ask about the candidate's experience, skills, or background.";

export const UNKNOWN_ACTION_FALLBACK =
  'I can only help with questions about the resume. What would you like to know about the candidate?';

export const CONFIDENCE_GLYPHS: Record<Confidence, string> = {
  high: '✓',
  medium: '◐',
  low: '⚠',
};

export interface DispatchContext {
  /** The user text that produced this model turn, verbatim. */
  question: string;
  sessionId: string | null;
  store: SessionStore;
}

export function formatAnswer(answer: string, confidence: Confidence): string {
  return `${CONFIDENCE_GLYPHS[confidence]} ${answer}`;
}

function recordAssistantMessage(ctx: DispatchContext, content: string, actionName: string): void {
  if (!ctx.sessionId) return;
  ctx.store.addMessage(ctx.sessionId, 'assistant', content, { function_called: actionName });
}

/**
 * Executes exactly one decoded model action and returns the user-facing text.
 * Decoy and unknown actions never touch the session.
 */
export function dispatchAction(action: DecodedAction, ctx: DispatchContext): string {
  switch (action.kind) {
    case 'decoy': {
      logger.fatal({
        event: 'security_incident',
        action: action.name,
        arguments: action.arguments,
        question: ctx.question,
        sessionId: ctx.sessionId,
      }, `SECURITY ALERT: decoy action '${action.name}' invoked`);
      return DECOY_REFUSAL;
    }

    case 'answer': {
      const text = formatAnswer(action.answer, action.confidence);
      recordAssistantMessage(ctx, text, action.name);
      return text;
    }

    case 'request_clarification': {
      const text = `I need some clarification: ${action.clarificationRequest}`;
      if (ctx.sessionId) {
        // A follow-up clarification keeps pointing at the first question.
        const current = ctx.store.getSession(ctx.sessionId);
        ctx.store.setAwaitingClarification(
          ctx.sessionId,
          current?.originalQuestion ?? ctx.question,
          { reason: action.reason, clarificationRequest: action.clarificationRequest },
        );
      }
      recordAssistantMessage(ctx, text, action.name);
      return text;
    }

    case 'handle_clarification_response': {
      if (ctx.sessionId) {
        ctx.store.clearClarificationState(ctx.sessionId);
      }
      const text = formatAnswer(action.answer, action.confidence);
      recordAssistantMessage(ctx, text, action.name);
      return text;
    }

    case 'unknown': {
      logger.warn({ action: action.name, sessionId: ctx.sessionId }, 'Unknown action requested by model');
      return UNKNOWN_ACTION_FALLBACK;
    }

    default: {
      const exhaustive: never = action;
      return exhaustive;
    }
  }
}
