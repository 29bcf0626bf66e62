import { z } from 'zod'

import { DATA_EXTENSIONS, DEFAULT_TASK } from '../constants.js'
import { ANSWER_FORMATS, type AnswerFormat, type ParsedQuestion } from '../interface/Quiz.js'

const URL_PATTERN = /https?:\/\/[^\s<>"{}|\\^`[\]]+/g
// Sentence punctuation that ends up glued to a URL in prose
const TRAILING_PUNCTUATION = /[.,;:!?)'*]+$/

/**
 * Shape of the model's reply to the parse prompt. Every field may be missing; a wrong type
 * (or a reply that is not an object) rejects the whole reply.
 */
export const modelQuestionSchema = z.object({
    data_url: z.string().nullish(),
    task: z.string().nullish(),
    submit_url: z.string().nullish(),
    answer_format: z.string().nullish()
})

export type ModelQuestion = z.infer<typeof modelQuestionSchema>

export function toAnswerFormat(value: string | null | undefined): AnswerFormat {
    const normalized = value?.trim().toLowerCase()
    return ANSWER_FORMATS.find(format => format === normalized) ?? 'string'
}

/**
 * Missing fields fall back the same way they do downstream: task to the question text itself,
 * submit URL to '' and the format to 'string'.
 */
export function toParsedQuestion(model: ModelQuestion, questionText: string): ParsedQuestion {
    const parsed: ParsedQuestion = {
        task: model.task ?? questionText,
        submitUrl: model.submit_url ?? '',
        answerFormat: toAnswerFormat(model.answer_format)
    }
    if (model.data_url) {
        parsed.dataUrl = model.data_url
    }
    return parsed
}

export function findUrls(text: string): string[] {
    return (text.match(URL_PATTERN) ?? [])
        .map(url => url.replace(TRAILING_PUNCTUATION, ''))
        .filter(url => /^https?:\/\/./.test(url))
}

function looksLikeDataFile(url: string): boolean {
    let pathname: string
    try {
        pathname = new URL(url).pathname.toLowerCase()
    } catch {
        pathname = url.toLowerCase()
    }
    return DATA_EXTENSIONS.some(ext => pathname.endsWith(ext))
}

/**
 * Deterministic parse used when the model's reply is unusable. A URL mentioning "submit" or
 * "answer" is the submission target; otherwise a URL ending in a data extension is the data source.
 * Later matches overwrite earlier ones. Without a submission match the last URL in the text is used.
 */
export function parseQuestionManually(questionText: string): ParsedQuestion {
    const urls = findUrls(questionText)

    let dataUrl: string | undefined
    let submitUrl: string | undefined

    for (const url of urls) {
        const lower = url.toLowerCase()
        if (lower.includes('submit') || lower.includes('answer')) {
            submitUrl = url
        } else if (looksLikeDataFile(url)) {
            dataUrl = url
        }
    }

    if (!submitUrl && urls.length > 0) {
        submitUrl = urls[urls.length - 1]
    }

    const parsed: ParsedQuestion = {
        task: DEFAULT_TASK,
        submitUrl: submitUrl ?? '',
        answerFormat: 'string'
    }
    if (dataUrl) {
        parsed.dataUrl = dataUrl
    }
    return parsed
}
