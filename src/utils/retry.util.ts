import { logger } from '../config/logger';
import { EvaluationError, errorMessage } from '../errors/evaluation-errors';

export interface RetryOptions {
    maxAttempts?: number;
    baseDelay?: number;
    maxDelay?: number;
    backoffMultiplier?: number;
    operationName?: string;
}

export interface IRetryUtil {
    executeWithRetry<T>(operation: (attempt: number) => Promise<T>, options?: RetryOptions): Promise<T>;
}

/**
 * Retry Utility
 *
 * Bounded retry for completion calls. Retries are immediate unless a base
 * delay is configured, in which case the delay grows exponentially up to
 * `maxDelay`. The last error is rethrown once attempts are exhausted.
 */
export class RetryUtil {
    /**
     * Execute function with retry logic
     */
    static async executeWithRetry<T>(
        operation: (attempt: number) => Promise<T>,
        options: RetryOptions = {}
    ): Promise<T> {
        const {
            maxAttempts = 3,
            baseDelay = 0,
            maxDelay = 10000,
            backoffMultiplier = 2,
            operationName = 'operation'
        } = options;

        const attempts = Math.max(1, maxAttempts);
        let lastError: unknown = null;

        for (let attempt = 1; attempt <= attempts; attempt++) {
            try {
                logger.debug({
                    operation: operationName,
                    attempt,
                    maxAttempts: attempts
                }, `Executing ${operationName} (attempt ${attempt}/${attempts})`);

                const result = await operation(attempt);

                if (attempt > 1) {
                    logger.info({
                        operation: operationName,
                        attempt,
                        maxAttempts: attempts
                    }, `${operationName} succeeded on attempt ${attempt}`);
                }

                return result;

            } catch (error: unknown) {
                lastError = error;
                const retryable = this.isRetryableError(error);

                logger.warn({
                    operation: operationName,
                    attempt,
                    maxAttempts: attempts,
                    error: errorMessage(error),
                    isRetryable: retryable
                }, `${operationName} failed on attempt ${attempt}`);

                // Don't retry on last attempt
                if (attempt === attempts) {
                    break;
                }

                if (!retryable) {
                    logger.error({
                        operation: operationName,
                        error: errorMessage(error)
                    }, `${operationName} failed with non-retryable error`);
                    break;
                }

                const delay = Math.min(
                    baseDelay * Math.pow(backoffMultiplier, attempt - 1),
                    maxDelay
                );

                if (delay > 0) {
                    logger.info({
                        operation: operationName,
                        attempt,
                        delay
                    }, `Retrying ${operationName} in ${delay}ms`);

                    await this.sleep(delay);
                }
            }
        }

        logger.error({
            operation: operationName,
            maxAttempts: attempts,
            error: lastError === null ? undefined : errorMessage(lastError)
        }, `${operationName} failed after ${attempts} attempts`);

        throw lastError ?? new Error(`${operationName} failed after ${attempts} attempts`);
    }

    /**
     * Pipeline errors carry their own retry flag; anything else is judged by
     * its network error code or HTTP status.
     */
    static isRetryableError(error: unknown): boolean {
        if (error instanceof EvaluationError) {
            return error.retryable;
        }

        if (typeof error !== 'object' || error === null) {
            return false;
        }

        const code = 'code' in error ? error.code : undefined;
        if (code === 'ECONNRESET' || code === 'ENOTFOUND' || code === 'ECONNREFUSED' || code === 'ETIMEDOUT') {
            return true;
        }

        const status = 'status' in error ? error.status : undefined;
        if (status === 429 || status === 500 || status === 502 || status === 503) {
            return true;
        }

        const message = error instanceof Error ? error.message.toLowerCase() : '';
        return message.includes('timeout') || message.includes('rate limit') ||
            message.includes('connection') || message.includes('network');
    }

    private static sleep(ms: number): Promise<void> {
        return new Promise(resolve => setTimeout(resolve, ms));
    }
}
