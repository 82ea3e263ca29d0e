/**
 * Input Sanitization Utility
 *
 * Neutralizes prompt-injection tricks in questions, conversation history
 * and retrieved document text before they are placed in a prompt.
 * Detection only logs; the system prompt carries the actual defense.
 */

import { loggers, truncateText as logTruncate } from '@/lib/logger';

const log = loggers.rag.child({ service: 'sanitize' });

// =============================================================================
// Configuration
// =============================================================================

/**
 * Maximum lengths per kind of text, in characters.
 */
export const MAX_LENGTHS = {
  USER_QUESTION: 2000,
  HISTORY_TURN: 4000,
  DOCUMENT_CONTENT: 10000,
  DOCUMENT_TITLE: 500,
} as const;

/**
 * Patterns that suggest an injection attempt. Flagged, never blocked.
 */
const INJECTION_PATTERNS: ReadonlyArray<{ name: string; pattern: RegExp }> = [
  { name: 'instruction_override', pattern: /ignore\s+(all\s+)?(previous|prior|above)\s+(instructions?|prompts?|rules?)/i },
  { name: 'instruction_override', pattern: /disregard\s+(all\s+)?(previous|prior|above)/i },
  { name: 'role_change', pattern: /you\s+are\s+(now|actually|really)\s+(a|an|the)\b/i },
  { name: 'role_change', pattern: /pretend\s+(to\s+be|you('re| are))/i },
  { name: 'prompt_extraction', pattern: /(reveal|show|print|output)\s+(me\s+)?(your|the)\s+(system\s+)?(prompt|instructions)/i },
  { name: 'boundary_spoof', pattern: /(<<<|>>>)\s*(system|end|user|context|history)/i },
  { name: 'jailbreak', pattern: /\b(jailbreak|dan\s+mode|do\s+anything\s+now)\b/i },
];

/**
 * Sequences rewritten so they cannot impersonate prompt structure.
 */
const ESCAPE_PATTERNS: ReadonlyArray<{ pattern: RegExp; replacement: string }> = [
  // Boundary marker brackets
  { pattern: /<<<+/g, replacement: '< < <' },
  { pattern: />>>+/g, replacement: '> > >' },
  // Instruction-looking headings and tags
  { pattern: /^#{1,6}\s*(system|instruction|prompt|rule)/gim, replacement: '(heading) $1' },
  { pattern: /<\/?(system|instruction|prompt)>/gi, replacement: '[$1]' },
  // Control characters other than newline and tab
  { pattern: /[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, replacement: '' },
];

// =============================================================================
// Types
// =============================================================================

export interface SanitizeResult {
  sanitized: string;
  truncated: boolean;
  detectedPatterns: string[];
}

export interface SanitizeOptions {
  maxLength: number;
  detectInjection?: boolean;
  source?: string;
}

// =============================================================================
// Core Functions
// =============================================================================

/**
 * Names of the injection patterns found in the text, without duplicates.
 */
export function detectInjectionPatterns(text: string): string[] {
  const found = new Set<string>();
  for (const { name, pattern } of INJECTION_PATTERNS) {
    if (pattern.test(text)) found.add(name);
  }
  return [...found];
}

export function applyEscapePatterns(text: string): string {
  return ESCAPE_PATTERNS.reduce((result, { pattern, replacement }) => result.replace(pattern, replacement), text);
}

/**
 * Cut text to a maximum length, at a word boundary when one is near.
 */
export function clampText(text: string, maxLength: number): { text: string; truncated: boolean } {
  if (text.length <= maxLength) {
    return { text, truncated: false };
  }

  let cut = text.slice(0, maxLength);
  const lastSpace = cut.lastIndexOf(' ');
  if (lastSpace > maxLength * 0.8) {
    cut = cut.slice(0, lastSpace);
  }

  return { text: `${cut}...`, truncated: true };
}

export function sanitize(text: string, options: SanitizeOptions): SanitizeResult {
  const trimmed = text.trim();
  const detectedPatterns = options.detectInjection === false ? [] : detectInjectionPatterns(trimmed);

  if (detectedPatterns.length > 0) {
    log.warn(
      {
        event: 'injection_patterns_detected',
        source: options.source,
        patterns: detectedPatterns,
        input: logTruncate(trimmed, 100),
      },
      'Potential injection patterns detected'
    );
  }

  const { text: sanitized, truncated } = clampText(applyEscapePatterns(trimmed), options.maxLength);
  return { sanitized, truncated, detectedPatterns };
}

// =============================================================================
// Specialized Sanitizers
// =============================================================================

export function sanitizeUserInput(question: string): string {
  return sanitize(question, { maxLength: MAX_LENGTHS.USER_QUESTION, source: 'question' }).sanitized;
}

export function sanitizeHistoryTurn(content: string): string {
  return sanitize(content, { maxLength: MAX_LENGTHS.HISTORY_TURN, source: 'history' }).sanitized;
}

export function sanitizeDocumentContent(content: string): string {
  return sanitize(content, { maxLength: MAX_LENGTHS.DOCUMENT_CONTENT, source: 'document' }).sanitized;
}

export function sanitizeDocumentTitle(title: string): string {
  return sanitize(title, { maxLength: MAX_LENGTHS.DOCUMENT_TITLE, detectInjection: false }).sanitized;
}
