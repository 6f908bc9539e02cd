import logger from '../lib/logger.js';
import { MAX_QUESTION_LENGTH, sanitize } from './sanitize.js';

// ─── Signatures & weights ────────────────────────────────────────────

/** Known jailbreak / injection phrasings, evaluated in order. */
export const INJECTION_PATTERNS: readonly RegExp[] = [
  /ignore\s+(all\s+)?(previous|above|prior)\s+(instructions?|prompts?|commands?)/im,
  /(system|user|assistant):\s*/im,
  /<\|.*?\|>/im,
  /###?\s*(system|user|assistant|instruction)/im,
  /(forget|ignore)\s+(everything|all|that)/im,
  /pretend\s+(to\s+be|you\s+are)/im,
  /act\s+as\s+(if\s+you\s+are\s+)?a?\s*/im,
  /roleplay\s+as/im,
  /access\s+(to\s+)?(private|confidential|restricted)/im,
  /simulate\s+(being\s+)?a?\s*/im,
  /you\s+are\s+now\s+(a\s+)?/im,
  /new\s+(role|character|persona)/im,
  /\\n\\n(system|user|assistant):/im,
  /(\[|\()?system(\]|\))?:/im,
  /jailbreak/im,
  /developer\s+mode/im,
  /godmode/im,
];

export const AI_MANIPULATION_KEYWORDS: readonly string[] = [
  'token', 'embedding', 'vector', 'model', 'training', 'dataset',
  'neural', 'transformer', 'gpt', 'llm', 'prompt', 'fine-tune',
];

// Trailing spaces on `rm ` and `del ` are part of the keyword.
export const SYSTEM_COMMAND_KEYWORDS: readonly string[] = [
  'sudo', 'rm ', 'del ', 'format', 'exec', 'eval', 'import',
];

const ROLE_TAGS = ['system:', 'user:', 'assistant:'] as const;

export const PATTERN_WEIGHT = 0.3;
export const SPECIAL_CHAR_WEIGHT = 0.2;
export const REPETITION_WEIGHT = 0.1;
export const AI_KEYWORD_WEIGHT = 0.1;
export const SYSTEM_KEYWORD_WEIGHT = 0.4;

const SPECIAL_CHAR_RATIO_LIMIT = 0.4;
const UNSAFE_SCORE_THRESHOLD = 0.5;

const SPECIAL_CHAR = /[^\p{L}\p{N}_\s]/gu;
const REPEATED_UNIT = /(.{10,})\1{2,}/;

// ─── Types ───────────────────────────────────────────────────────────

export type RiskSignalSource =
  | 'pattern'
  | 'special_characters'
  | 'repetition'
  | 'ai_keyword'
  | 'system_keyword';

/** One additive contribution to the risk score. */
export interface RiskSignal {
  source: RiskSignalSource;
  detail: string;
  weight: number;
}

export interface SecurityVerdict {
  isSafe: boolean;
  cleanedInput: string;
  /** Sum of all signal weights, clamped to [0, 1]. */
  riskScore: number;
  detectedPatterns: string[];
  warnings: string[];
  signals: RiskSignal[];
  /** Set when a role tag or an ignore/instruction pair forced rejection. */
  hardVeto: boolean;
}

// ─── Detection ───────────────────────────────────────────────────────

function collectSignals(text: string, lower: string): { signals: RiskSignal[]; warnings: string[] } {
  const signals: RiskSignal[] = [];
  const warnings: string[] = [];

  for (const pattern of INJECTION_PATTERNS) {
    if (pattern.test(lower)) {
      signals.push({ source: 'pattern', detail: pattern.source, weight: PATTERN_WEIGHT });
    }
  }

  const characters = Array.from(text);
  const specialCount = text.match(SPECIAL_CHAR)?.length ?? 0;
  if (specialCount / Math.max(characters.length, 1) > SPECIAL_CHAR_RATIO_LIMIT) {
    warnings.push('High ratio of special characters');
    signals.push({ source: 'special_characters', detail: 'special character ratio', weight: SPECIAL_CHAR_WEIGHT });
  }

  if (REPEATED_UNIT.test(text)) {
    warnings.push('Repeated text patterns detected');
    signals.push({ source: 'repetition', detail: 'repeated text', weight: REPETITION_WEIGHT });
  }

  for (const keyword of AI_MANIPULATION_KEYWORDS) {
    if (lower.includes(keyword)) {
      warnings.push(`AI-related keyword detected: ${keyword}`);
      signals.push({ source: 'ai_keyword', detail: keyword, weight: AI_KEYWORD_WEIGHT });
    }
  }

  for (const keyword of SYSTEM_COMMAND_KEYWORDS) {
    if (lower.includes(keyword)) {
      warnings.push(`System command keyword detected: ${keyword}`);
      signals.push({ source: 'system_keyword', detail: keyword, weight: SYSTEM_KEYWORD_WEIGHT });
    }
  }

  return { signals, warnings };
}

/**
 * True when the text trips the unconditional veto: an "ignore" + "instruction"
 * pair anywhere, or a bare role tag. Known to over-trigger on innocent
 * questions that happen to use both words.
 */
export function hasHardVeto(lower: string): boolean {
  if (lower.includes('ignore') && lower.includes('instruction')) return true;
  return ROLE_TAGS.some((tag) => lower.includes(tag));
}

/**
 * Scores user text for prompt-injection risk with additive heuristics.
 * Pure apart from a warning log line when the verdict is unsafe.
 */
export function detectInjection(text: string | null | undefined): SecurityVerdict {
  if (!text || !text.trim()) {
    return {
      isSafe: true,
      cleanedInput: '',
      riskScore: 0,
      detectedPatterns: [],
      warnings: [],
      signals: [],
      hardVeto: false,
    };
  }

  const lower = text.toLowerCase();
  const { signals, warnings } = collectSignals(text, lower);

  const rawScore = signals.reduce((sum, signal) => sum + signal.weight, 0);
  // Every weight is a multiple of 0.1; round off float drift before comparing.
  const riskScore = Math.min(Math.round(rawScore * 10) / 10, 1);
  const hardVeto = hasHardVeto(lower);
  const isSafe = riskScore <= UNSAFE_SCORE_THRESHOLD && !hardVeto;

  const detectedPatterns = signals
    .filter((signal) => signal.source === 'pattern')
    .map((signal) => signal.detail);

  if (!isSafe) {
    logger.warn({ detectedPatterns, riskScore, hardVeto }, 'Potential prompt injection detected');
  }

  return {
    isSafe,
    cleanedInput: sanitize(text, MAX_QUESTION_LENGTH),
    riskScore,
    detectedPatterns,
    warnings,
    signals,
    hardVeto,
  };
}
