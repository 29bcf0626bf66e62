export type JsonPrimitive = string | number | boolean | null
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue }

export type AnswerFormat = 'number' | 'string' | 'boolean' | 'object'

export const ANSWER_FORMATS: readonly AnswerFormat[] = ['number', 'string', 'boolean', 'object']

/**
 * What a rendered question asks for. Produced once per question and discarded after submission.
 */
export interface ParsedQuestion {
    dataUrl?: string
    task: string
    submitUrl: string
    answerFormat: AnswerFormat
}

export type AnswerValue = JsonValue

export interface SolvedQuestion {
    answer: AnswerValue
    submitUrl: string // may be empty when nothing in the page looked like a target
}

export interface SubmissionPayload {
    email: string
    secret: string
    answer: AnswerValue
}

/**
 * Grading endpoint response. Only `correct` and `url` drive the chain; anything else is kept for the summary.
 */
export interface SubmissionResult {
    correct?: boolean
    url?: string
    error?: string
    details?: string
    [key: string]: unknown
}

export interface QuestionAttempt {
    index: number
    url: string
    answer?: AnswerValue
    submitUrl?: string
    correct?: boolean
    error?: string
}

export interface ChainSummary {
    questions_solved: number
    correct: number
    error?: string
    attempts: QuestionAttempt[]
}

export interface SolveResponse {
    status: 'success' | 'error'
    message: string
    result?: ChainSummary
}
