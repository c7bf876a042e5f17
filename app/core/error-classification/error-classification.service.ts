import { injectable } from 'inversify';

export interface ErrorClassificationConfiguration {
  readonly criticalErrorPatterns: readonly string[];
  readonly excludedErrorPatterns: readonly string[];
  readonly retryableErrorPatterns: readonly string[];
}

export interface ClassifiableFailure {
  readonly message: string;
  readonly code?: number;
}

export interface ErrorClassificationResult {
  readonly isRetryable: boolean;
  readonly isCritical: boolean;
  readonly isExcluded: boolean;
  readonly shouldRecordFailure: boolean;
  readonly classification: 'retryable' | 'non-retryable' | 'critical' | 'excluded';
  readonly matchedPattern?: string;
}

/**
 * Tags backend failures. Excluded failures are caused by the request itself
 * (bad parameters, context overflow) and say nothing about target health.
 */
@injectable()
export class ErrorClassificationService {
  private readonly configuration: ErrorClassificationConfiguration = {
    criticalErrorPatterns: [
      'invalid api key',
      'api key not found',
      'api key expired',
      'unauthorized',
      'access token expired',
      'not configured'
    ],
    excludedErrorPatterns: [
      'maximum context length',
      'prompt is too long',
      'invalid value for',
      'unsupported parameter',
      'unsupported value',
      'must be non-empty',
      'must have non-empty content',
      'validation error',
      'malformed request'
    ],
    retryableErrorPatterns: [
      'timeout',
      'timed out',
      'network error',
      'connection reset',
      'econnreset',
      'etimedout',
      'enotfound',
      'econnrefused',
      'fetch failed',
      'internal server error',
      'bad gateway',
      'service unavailable',
      'gateway timeout',
      'not online',
      'overloaded',
      'too many requests'
    ]
  };

  classify(failure: ClassifiableFailure): ErrorClassificationResult {
    const message = failure.message.toLowerCase();

    const criticalMatch = this.findMatchingPattern(message, this.configuration.criticalErrorPatterns);
    if (criticalMatch || failure.code === 401) {
      return {
        isRetryable: true,
        isCritical: true,
        isExcluded: false,
        shouldRecordFailure: true,
        classification: 'critical',
        matchedPattern: criticalMatch
      };
    }

    const excludedMatch = this.findMatchingPattern(message, this.configuration.excludedErrorPatterns);
    if (excludedMatch) {
      return {
        isRetryable: false,
        isCritical: false,
        isExcluded: true,
        shouldRecordFailure: false,
        classification: 'excluded',
        matchedPattern: excludedMatch
      };
    }

    const retryableMatch = this.findMatchingPattern(message, this.configuration.retryableErrorPatterns);
    if (retryableMatch || failure.code === undefined || failure.code >= 500 || failure.code === 429) {
      return {
        isRetryable: true,
        isCritical: false,
        isExcluded: false,
        shouldRecordFailure: true,
        classification: 'retryable',
        matchedPattern: retryableMatch
      };
    }

    return {
      isRetryable: false,
      isCritical: false,
      isExcluded: false,
      shouldRecordFailure: true,
      classification: 'non-retryable'
    };
  }

  classifyError(error: Error): ErrorClassificationResult {
    return this.classify({ message: error.message });
  }

  private findMatchingPattern(message: string, patterns: readonly string[]): string | undefined {
    return patterns.find(pattern => message.includes(pattern));
  }
}
