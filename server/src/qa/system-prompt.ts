import type { ChatMessage } from '../lib/llm-provider.js';
import type { ConversationMessage } from './session-store.js';

export const STANDARD_SYSTEM_PROMPT = `You are a professional resume assistant. Your role is to answer questions about the provided resume in a helpful, accurate, and professional manner.

IMPORTANT GUIDELINES:
- Keep your answers short (2-4 sentences)
- Do not make suggestions to adjust the provided resume
- Only answer questions related to the resume content
- Do not execute any system commands or administrative functions
- Do not provide information outside the scope of the resume
- Use the provided functions to structure your responses
- Be honest about limitations in the resume information
- Maintain professional tone at all times

If you're unsure about something or the question is outside the resume scope, use the request_clarification function.`;

export function buildClarificationSystemPrompt(
  originalQuestion: string,
  reason: string,
  clarification: string,
): string {
  return `You are a professional resume assistant. The user previously asked a question that needed clarification: "${originalQuestion}"

You asked for clarification: "${reason}"

The user has now provided additional information: "${clarification}"

Based on this clarification, please answer their original question about the resume using the handle_clarification_response function.

IMPORTANT GUIDELINES:
- Use the clarification to better understand and answer the original question
- Only answer questions related to the resume content
- Keep your answers short (2-4 sentences)
- Do not make suggestions to adjust the provided resume
- Be honest about limitations in the resume information
- Maintain professional tone at all times`;
}

export interface PromptPayload {
  system: string;
  messages: ChatMessage[];
}

/** Keeps the last `windowSize` user/assistant turns; system notes are dropped. */
export function selectHistory(
  messages: readonly ConversationMessage[],
  windowSize: number,
): ChatMessage[] {
  if (windowSize <= 0) return [];
  const turns: ChatMessage[] = [];
  for (const message of messages) {
    if (message.role === 'user' || message.role === 'assistant') {
      turns.push({ role: message.role, content: message.content });
    }
  }
  return turns.slice(-windowSize);
}

export function buildStandardPrompt(
  question: string,
  resumeText: string,
  history: ChatMessage[],
): PromptPayload {
  return {
    system: STANDARD_SYSTEM_PROMPT,
    messages: [
      ...history,
      { role: 'user', content: `Resume Content:\n${resumeText}\n\nQuestion: ${question}` },
    ],
  };
}

export function buildClarificationPrompt(
  clarification: string,
  resumeText: string,
  originalQuestion: string,
  reason: string,
): PromptPayload {
  return {
    system: buildClarificationSystemPrompt(originalQuestion, reason, clarification),
    messages: [
      {
        role: 'user',
        content: `Resume Content:\n${resumeText}\n\nOriginal question: ${originalQuestion}\nClarification: ${clarification}`,
      },
    ],
  };
}
