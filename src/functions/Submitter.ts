import axios from 'axios'
import { z } from 'zod'

import type { QuizAgent } from '../index.js'
import type { AnswerValue, SubmissionPayload, SubmissionResult } from '../interface/Quiz.js'
import { SubmissionFailure, errorMessage } from '../util/Errors.js'

// Any JSON object; known fields of the wrong type are dropped
const submissionResponseSchema = z.record(z.unknown())

function bodyText(data: unknown): string {
    if (typeof data === 'string') return data
    if (Buffer.isBuffer(data)) return data.toString('utf-8')
    return JSON.stringify(data) ?? ''
}

export default class Submitter {
    private agent: QuizAgent

    constructor(agent: QuizAgent) {
        this.agent = agent
    }

    /**
     * POST the answer to the grading endpoint. Never throws: an HTTP error status becomes
     * `{correct: false, error: 'HTTP <status>', details}` and any other failure `{correct: false, error}`.
     */
    async submit(submitUrl: string, answer: AnswerValue): Promise<SubmissionResult> {
        const payload: SubmissionPayload = {
            email: this.agent.config.email,
            secret: this.agent.config.secret,
            answer
        }
        this.agent.log('chain', 'SUBMIT', `POST ${submitUrl || '(empty url)'} ${JSON.stringify({ ...payload, secret: '***' })}`)

        try {
            const response = await this.agent.axios.postJson<unknown>(submitUrl, payload)
            return this.toResult(response.data)
        } catch (error) {
            if (axios.isAxiosError(error) && error.response) {
                const details = bodyText(error.response.data)
                this.agent.log('chain', 'SUBMIT', `HTTP Error ${error.response.status}: ${details}`, 'warn')
                return { correct: false, error: `HTTP ${error.response.status}`, details }
            }
            const failure = error instanceof SubmissionFailure ? error : new SubmissionFailure(errorMessage(error), error)
            this.agent.log('chain', 'SUBMIT', `Submission error: ${failure.message}`, 'warn')
            return { correct: false, error: failure.message }
        }
    }

    private toResult(data: unknown): SubmissionResult {
        const parsed = submissionResponseSchema.safeParse(data)
        if (!parsed.success) {
            throw new SubmissionFailure(`Unexpected response from grading endpoint: ${bodyText(data).slice(0, 200)}`)
        }
        const { correct, url, error, ...rest } = parsed.data
        const result: SubmissionResult = { ...rest }
        if (typeof correct === 'boolean') result.correct = correct
        if (typeof url === 'string' && url !== '') result.url = url
        if (error !== undefined && error !== null) result.error = typeof error === 'string' ? error : JSON.stringify(error)
        return result
    }
}
