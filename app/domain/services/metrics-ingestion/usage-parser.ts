import type { ParsedUsage } from '../../entities';

const INTEGER_FIELDS = {
  promptTokens: /"prompt_tokens"\s*:\s*(\d+)/,
  completionTokens: /"completion_tokens"\s*:\s*(\d+)/,
  totalTokens: /"total_tokens"\s*:\s*(\d+)/
} as const;

const THROUGHPUT_PATTERN = /"throughput_tokens_per_second"\s*:\s*([0-9.]+)/;

function match(raw: string, pattern: RegExp): number | null {
  const found = pattern.exec(raw);
  if (!found?.[1]) {
    return null;
  }
  const value = Number(found[1]);
  return Number.isFinite(value) ? value : null;
}

/**
 * Reads usage straight out of the stored response text, without parsing it
 * as JSON: results may be truncated or wrapped by the backend. The first
 * occurrence of each field wins.
 */
export function parseUsage(raw: string): ParsedUsage {
  return {
    promptTokens: match(raw, INTEGER_FIELDS.promptTokens),
    completionTokens: match(raw, INTEGER_FIELDS.completionTokens),
    totalTokens: match(raw, INTEGER_FIELDS.totalTokens),
    throughputTokensPerSecond: match(raw, THROUGHPUT_PATTERN)
  };
}
