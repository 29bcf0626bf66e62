import type { AnswerFormat, AnswerValue } from '../interface/Quiz.js'

const ANSWER_PREFIX = /^(Answer:|Result:|The answer is:?|Final answer:?|ANSWER:)\s*/i
const FLOAT_LITERAL = /^[+-]?(((\d+\.?\d*)|(\.\d+))([eE][+-]?\d+)?|inf(inity)?|nan)$/i
const TRUTHY = ['true', '1', 'yes', 'correct', 'y']

/**
 * Whether the text is a float literal in the usual programming-language sense,
 * including inf/infinity/nan spellings.
 */
export function isFloatLiteral(text: string): boolean {
    return FLOAT_LITERAL.test(text)
}

function parseFloatLiteral(text: string): number {
    const lower = text.toLowerCase()
    if (lower.endsWith('inf') || lower.endsWith('infinity')) {
        return lower.startsWith('-') ? -Infinity : Infinity
    }
    return Number(text)
}

function asText(value: AnswerValue): string {
    if (typeof value === 'string') return value
    if (typeof value === 'number' || typeof value === 'boolean') return String(value)
    return JSON.stringify(value)
}

/**
 * Reduce a free-text model reply to the bare answer.
 *
 * Strips code fences and one leading "Answer:"-style label, then walks the lines bottom-up:
 * the first line that is a number once commas and spaces are gone wins (in that stripped form),
 * otherwise the last non-empty line.
 */
export function cleanAnswer(reply: string): string {
    let response = reply.trim()

    response = response.replace(/```[a-z]*\n/g, '')
    response = response.split('```').join('')
    response = response.replace(ANSWER_PREFIX, '')

    const lines = response.split('\n').reverse()
    for (const raw of lines) {
        const line = raw.trim()
        if (!line) continue
        const number = line.split(',').join('').split(' ').join('')
        if (isFloatLiteral(number)) {
            return number
        }
    }

    for (const raw of lines) {
        if (raw.trim()) {
            return raw.trim()
        }
    }

    return response.trim()
}

/**
 * Coerce a cleaned answer to the shape the question asked for.
 */
export function coerceAnswer(answer: AnswerValue, format: AnswerFormat): AnswerValue {
    switch (format) {
        case 'number': {
            const text = asText(answer).split(',').join('').split(' ').join('').trim()
            if (!isFloatLiteral(text)) return answer
            const value = parseFloatLiteral(text)
            if (!Number.isFinite(value)) return answer
            return text.includes('.') ? value : Math.trunc(value)
        }
        case 'boolean':
            return TRUTHY.includes(asText(answer).trim().toLowerCase())
        case 'object': {
            if (typeof answer !== 'string') return answer
            try {
                const decoded: AnswerValue = JSON.parse(answer)
                return decoded
            } catch {
                return { value: answer }
            }
        }
        case 'string':
            return asText(answer).trim()
    }
}
