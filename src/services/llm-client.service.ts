import OpenAI, { APIError } from 'openai';
import { logger, type ILogger } from '../config/logger';
import type { AppConfig } from '../config/app-config';
import {
    MalformedResponseError,
    TransportError,
    errorMessage
} from '../errors/evaluation-errors';
import { EVALUATION_SYSTEM_PROMPT } from '../prompts/candidate-evaluation.prompt';
import { SUMMARY_SYSTEM_PROMPT } from '../prompts/overall-summary.prompt';
import { parseEvaluation, parseSummary } from '../schemas/evaluation.schema';
import type { Evaluation } from '../types/evaluation';
import { RetryUtil, type IRetryUtil } from '../utils/retry.util';

export interface ChatMessage {
    role: 'system' | 'user';
    content: string;
}

// `choices` is missing from error bodies some OpenAI-style servers return with a 200
export interface ChatCompletionResponse {
    choices?: Array<{ message?: { content: string | null } }>;
    usage?: { total_tokens: number };
}

// Interfaces for better testability
export interface IChatCompletionClient {
    chat: {
        completions: {
            create(params: {
                model: string;
                messages: ChatMessage[];
                temperature: number;
                max_tokens: number;
            }, options?: {
                timeout?: number;
                maxRetries?: number;
            }): Promise<ChatCompletionResponse>;
        };
    };
}

/**
 * Sampling settings and response parser for one kind of call.
 */
export interface CompletionProfile<T> {
    readonly name: string;
    readonly systemPrompt: string;
    readonly temperature: number;
    readonly maxTokens: number;
    parse(content: string, logger: ILogger): T;
}

export type CompletionFailure = TransportError | MalformedResponseError;

export type CompletionResult<T> =
    | { ok: true; value: T; attempts: number }
    | { ok: false; error: CompletionFailure; attempts: number };

export const EVALUATION_PROFILE: CompletionProfile<Evaluation> = {
    name: 'candidate evaluation',
    systemPrompt: EVALUATION_SYSTEM_PROMPT,
    temperature: 0.3,
    maxTokens: 2000,
    parse: parseEvaluation
};

export const SUMMARY_PROFILE: CompletionProfile<string> = {
    name: 'overall summary',
    systemPrompt: SUMMARY_SYSTEM_PROMPT,
    temperature: 0.4,
    maxTokens: 200,
    parse: content => parseSummary(content)
};

export interface ILLMClient {
    complete<T>(prompt: string, profile: CompletionProfile<T>, maxRetries?: number): Promise<CompletionResult<T>>;
}

export interface LLMClientOptions {
    model: string;
    timeoutMs: number;
    maxRetries: number;
    retryDelayMs: number;
}

/**
 * LLM Client with Dependency Injection
 *
 * Sends one prompt to the chat-completion endpoint, retries transport
 * failures and unparseable content, and returns either the parsed value or
 * the last typed failure with the raw response attached.
 */
export class LLMClient implements ILLMClient {
    constructor(
        private client: IChatCompletionClient,
        private retryUtil: IRetryUtil,
        private logger: ILogger,
        private options: LLMClientOptions
    ) { }

    /**
     * Factory method for production use
     */
    static create(config: AppConfig, apiKey: string): LLMClient {
        const client = new OpenAI({
            apiKey,
            baseURL: config.completionApiUrl,
            timeout: config.completionTimeoutMs,
            maxRetries: 0
        });

        return new LLMClient(client, RetryUtil, logger, {
            model: config.completionModel,
            timeoutMs: config.completionTimeoutMs,
            maxRetries: config.completionMaxRetries,
            retryDelayMs: config.completionRetryDelayMs
        });
    }

    async complete<T>(
        prompt: string,
        profile: CompletionProfile<T>,
        maxRetries: number = this.options.maxRetries
    ): Promise<CompletionResult<T>> {
        let attempts = 0;

        try {
            const value = await this.retryUtil.executeWithRetry(
                async (attempt) => {
                    attempts = attempt;
                    const content = await this.request(prompt, profile);
                    return profile.parse(content, this.logger);
                },
                {
                    maxAttempts: maxRetries,
                    baseDelay: this.options.retryDelayMs,
                    operationName: profile.name
                }
            );
            return { ok: true, value, attempts };
        } catch (error: unknown) {
            const failure = error instanceof TransportError || error instanceof MalformedResponseError
                ? error
                : new TransportError(errorMessage(error), undefined, undefined, { cause: error });

            this.logger.error({
                operation: profile.name,
                attempts,
                errorKind: failure.kind,
                error: failure.message,
                rawResponse: failure.rawResponse
            }, 'Completion failed');

            return { ok: false, error: failure, attempts };
        }
    }

    private async request<T>(prompt: string, profile: CompletionProfile<T>): Promise<string> {
        this.logger.info({
            operation: profile.name,
            model: this.options.model,
            temperature: profile.temperature,
            promptLength: prompt.length
        }, 'Requesting completion');

        let response: ChatCompletionResponse;
        try {
            response = await this.client.chat.completions.create({
                model: this.options.model,
                messages: [
                    { role: 'system', content: profile.systemPrompt },
                    { role: 'user', content: prompt }
                ],
                temperature: profile.temperature,
                max_tokens: profile.maxTokens
            }, {
                timeout: this.options.timeoutMs,
                maxRetries: 0
            });
        } catch (error: unknown) {
            throw toTransportError(error);
        }

        if (!Array.isArray(response.choices) || response.choices.length === 0) {
            throw new MalformedResponseError('Completion response has no choices', JSON.stringify(response));
        }

        const content = response.choices[0].message?.content;
        if (!content) {
            throw new MalformedResponseError('No content returned from completion endpoint', content ?? '');
        }

        this.logger.info({
            operation: profile.name,
            tokensUsed: response.usage?.total_tokens || 0,
            contentLength: content.length
        }, 'Completion received');

        return content;
    }
}

function toTransportError(error: unknown): TransportError {
    if (error instanceof APIError) {
        const raw = error.error === undefined ? undefined : JSON.stringify(error.error);
        return new TransportError(`Completion request failed: ${error.message}`, error.status, raw, { cause: error });
    }
    return new TransportError(`Completion request failed: ${errorMessage(error)}`, undefined, undefined, { cause: error });
}
