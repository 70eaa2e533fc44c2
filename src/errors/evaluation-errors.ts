/**
 * Error taxonomy for the evaluation pipeline.
 *
 * Per-candidate failures (extraction, transport, malformed response) are carried
 * as result values and only reduce the candidate count. Render and configuration
 * failures are thrown and end the run.
 */

export type EvaluationErrorKind =
    | 'extraction'
    | 'transport'
    | 'malformed_response'
    | 'render'
    | 'configuration'
    | 'cancelled';

export abstract class EvaluationError extends Error {
    abstract readonly kind: EvaluationErrorKind;

    constructor(message: string, readonly retryable: boolean, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Résumé file could not be read, parsed, or held no text.
 */
export class ExtractionError extends EvaluationError {
    readonly kind = 'extraction';

    constructor(message: string, readonly filePath: string, options?: { cause?: unknown }) {
        super(message, false, options);
    }
}

/**
 * Network or HTTP failure talking to the completion endpoint.
 */
export class TransportError extends EvaluationError {
    readonly kind = 'transport';

    constructor(
        message: string,
        readonly status?: number,
        readonly rawResponse?: string,
        options?: { cause?: unknown }
    ) {
        super(message, true, options);
    }
}

/**
 * Completion content did not match the expected shape after fence stripping.
 * Out-of-range values are reported with `retryable: false`.
 */
export class MalformedResponseError extends EvaluationError {
    readonly kind = 'malformed_response';

    constructor(
        message: string,
        readonly rawResponse: string,
        readonly issues: string[] = [],
        retryable: boolean = true,
        options?: { cause?: unknown }
    ) {
        super(message, retryable, options);
    }
}

export class RenderError extends EvaluationError {
    readonly kind = 'render';

    constructor(message: string, readonly outputPath: string, options?: { cause?: unknown }) {
        super(message, false, options);
    }
}

/**
 * Missing credential or missing input; blocks the run before it starts.
 */
export class ConfigurationError extends EvaluationError {
    readonly kind = 'configuration';

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, false, options);
    }
}

export class EvaluationCancelledError extends EvaluationError {
    readonly kind = 'cancelled';

    constructor(readonly processedCount: number) {
        super(`Evaluation cancelled after ${processedCount} candidate(s)`, false);
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : 'Unknown error';
}
