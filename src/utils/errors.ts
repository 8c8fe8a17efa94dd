/**
 * Classification of caller errors.
 */
export type PipelineErrorCode =
    | 'INVALID_BATCH'
    | 'INVALID_SOURCE'
    | 'INVALID_CONFIG'
    | 'INPUT_NOT_FOUND';

/**
 * Precondition violation reported to the caller instead of being repaired.
 */
export class PipelineInputError extends Error {
    constructor(
        message: string,
        public readonly code: PipelineErrorCode,
        public readonly details?: unknown
    ) {
        super(message);
        this.name = 'PipelineInputError';
    }
}
