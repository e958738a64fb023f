import { logger } from "../logger.js";

export interface GuardrailConfig {
  blockedPatterns: RegExp[];
}

export const DEFAULT_CONFIG: GuardrailConfig = {
  blockedPatterns: [
    /ignore\s+(previous|above|all)\s+(instructions|prompts?|rules?)/i,
    /forget\s+(previous|above|all)\s+(instructions|prompts?|rules?)/i,
    /you\s+are\s+now\s+(a|an)\s+/i,
    /system\s*:\s*(you|respond|act|behave)/i,
    /\[system\]/i,
    /<\|system\|>/i,
    /override\s+(system|instructions|prompt)/i,
    /new\s+instructions?\s*:/i,
    /disregard\s+(previous|above|all)/i,
    /pretend\s+you\s+are/i,
  ],
};

export function detectPromptInjection(
  input: string,
  config: GuardrailConfig = DEFAULT_CONFIG,
): { isInjection: boolean; detectedPatterns: string[] } {
  const detectedPatterns = config.blockedPatterns
    .filter((pattern) => pattern.test(input))
    .map((pattern) => pattern.source);

  if ((input.match(/\n{3,}/g) || []).length > 0) {
    detectedPatterns.push("suspicious_formatting");
  }

  return {
    isInjection: detectedPatterns.length > 0,
    detectedPatterns,
  };
}

/**
 * Strips control characters and collapses runs of blank lines. Messages
 * are only ever matched against order patterns, so nothing else is rewritten.
 */
export function sanitizeInput(
  input: string,
  config: GuardrailConfig = DEFAULT_CONFIG,
): { sanitized: string; warnings: string[] } {
  const warnings: string[] = [];

  const injectionCheck = detectPromptInjection(input, config);
  if (injectionCheck.isInjection) {
    warnings.push(
      `Potential prompt injection detected: ${injectionCheck.detectedPatterns.join(", ")}`,
    );
    logger.warn(
      {
        input: input.substring(0, 100),
        detectedPatterns: injectionCheck.detectedPatterns,
      },
      "Prompt injection detected in user input",
    );
  }

  let sanitized = input.replace(/\n{3,}/g, "\n\n").trim();

  // eslint-disable-next-line no-control-regex
  sanitized = sanitized.replace(/[\x00-\x08\x0B-\x0C\x0E-\x1F\x7F]/g, "");

  return { sanitized, warnings };
}
