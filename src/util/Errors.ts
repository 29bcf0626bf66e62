export type FailureKind =
    | 'download'
    | 'pdf-extraction'
    | 'render'
    | 'parse'
    | 'submission'
    | 'model-query'

/**
 * Base class for every failure the solver distinguishes. `kind` is what callers branch on;
 * whether a kind degrades to a fallback or ends the chain is decided where it is caught.
 */
export class QuizError extends Error {
    readonly kind: FailureKind

    constructor(kind: FailureKind, message: string, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause })
        this.name = new.target.name
        this.kind = kind
    }
}

// Data source could not be fetched or decoded. Degrades to "no data".
export class DownloadFailure extends QuizError {
    constructor(message: string, cause?: unknown) {
        super('download', message, cause)
    }
}

// Layout-aware PDF pass failed. Degrades to plain text.
export class PdfExtractionFailure extends QuizError {
    constructor(message: string, cause?: unknown) {
        super('pdf-extraction', message, cause)
    }
}

// Quiz page could not be loaded. Ends the chain run.
export class RenderFailure extends QuizError {
    constructor(message: string, cause?: unknown) {
        super('render', message, cause)
    }
}

// Model output for question parsing was unusable. Degrades to the regex parser.
export class ParseFailure extends QuizError {
    constructor(message: string, cause?: unknown) {
        super('parse', message, cause)
    }
}

// Answer could not be posted. Becomes a synthetic incorrect result.
export class SubmissionFailure extends QuizError {
    constructor(message: string, cause?: unknown) {
        super('submission', message, cause)
    }
}

// Model call errored or came back empty. Ends the chain run.
export class ModelQueryFailure extends QuizError {
    constructor(message: string, cause?: unknown) {
        super('model-query', message, cause)
    }
}

export function errorMessage(error: unknown): string {
    if (error == null) return 'unknown'
    if (error instanceof Error) return error.message
    return String(error)
}
