import type { Server as HttpServer } from 'http'
import axios from 'axios'
import { afterEach, describe, expect, it, vi } from 'vitest'

import { QuizAgent } from '../../index.js'
import type { ChainSummary } from '../../interface/Quiz.js'
import { createServer, type AgentFactory } from '../Server.js'
import {
    TEST_EMAIL, TEST_SECRET, fakeAdapter, fakeModel, fakeRenderer, isParsePrompt, testConfig
} from '../../__tests__/fixtures.js'

const QUIZ_URL = 'https://quiz.test/q1'

const SUMMARY: ChainSummary = { questions_solved: 1, correct: 1, attempts: [{ index: 1, url: QUIZ_URL, correct: true }] }

let server: HttpServer | undefined

async function start(createAgent: AgentFactory): Promise<string> {
    const app = createServer(testConfig(), createAgent)
    const listening = app.listen(0, '127.0.0.1')
    server = listening
    await new Promise<void>((resolve, reject) => {
        listening.once('listening', () => resolve())
        listening.once('error', reject)
    })
    const address = listening.address()
    if (address === null || typeof address === 'string') throw new Error('server is not listening on TCP')
    return `http://127.0.0.1:${address.port}`
}

// Local requests only: no proxy, every status returned instead of thrown
const client = (base: string) => axios.create({ baseURL: base, proxy: false, validateStatus: () => true })

afterEach(async () => {
    const open = server
    server = undefined
    if (open) await new Promise<void>(resolve => open.close(() => resolve()))
})

function runner(result: () => Promise<ChainSummary>) {
    const solveQuizChain = vi.fn(result)
    const factory = vi.fn<AgentFactory>(() => ({ solveQuizChain }))
    return { factory, solveQuizChain }
}

describe('createServer', () => {
    it('reports health', async () => {
        const http = client(await start(runner(async () => SUMMARY).factory))

        const res = await http.get('/health')

        expect(res.status).toBe(200)
        expect(res.data).toEqual({ status: 'healthy', service: 'llm-quiz-solver' })
    })

    it('describes itself on the root path', async () => {
        const http = client(await start(runner(async () => SUMMARY).factory))

        const res = await http.get('/')

        expect(res.data).toEqual({
            message: 'LLM Quiz Solver API is running',
            status: 'ok',
            email: TEST_EMAIL,
            endpoints: {
                'POST /solve': 'Submit quiz URL to solve',
                'GET /health': 'Check API health'
            }
        })
    })

    it('refuses a wrong secret before doing any work', async () => {
        const { factory } = runner(async () => SUMMARY)
        const http = client(await start(factory))

        const res = await http.post('/solve', { email: 'someone@example.com', secret: 'wrong', url: QUIZ_URL })

        expect(res.status).toBe(403)
        expect(res.data).toEqual({ detail: 'Invalid secret' })
        expect(factory).not.toHaveBeenCalled()
    })

    it('refuses a wrong email', async () => {
        const { factory } = runner(async () => SUMMARY)
        const http = client(await start(factory))

        const res = await http.post('/solve', { email: 'someone@example.com', secret: TEST_SECRET, url: QUIZ_URL })

        expect(res.status).toBe(403)
        expect(res.data).toEqual({ detail: 'Invalid email' })
        expect(factory).not.toHaveBeenCalled()
    })

    it('answers a wrong secret with 403 whatever the other fields hold', async () => {
        const { factory } = runner(async () => SUMMARY)
        const http = client(await start(factory))

        const res = await http.post('/solve', { email: 'a@b.c', secret: '', url: 'quiz-1' })

        expect(res.status).toBe(403)
        expect(res.data).toEqual({ detail: 'Invalid secret' })
        expect(factory).not.toHaveBeenCalled()
    })

    it('rejects a non-http quiz URL once the credentials match', async () => {
        const { factory } = runner(async () => SUMMARY)
        const http = client(await start(factory))

        const res = await http.post('/solve', { email: TEST_EMAIL, secret: TEST_SECRET, url: 'quiz-1' })

        expect(res.status).toBe(400)
        expect(res.data.status).toBe('error')
        expect(res.data.message.startsWith('url: ')).toBe(true)
        expect(factory).not.toHaveBeenCalled()
    })

    it('rejects malformed bodies', async () => {
        const { factory } = runner(async () => SUMMARY)
        const http = client(await start(factory))

        const missingUrl = await http.post('/solve', { email: TEST_EMAIL, secret: TEST_SECRET })
        const notJson = await http.post('/solve', '{broken', {
            headers: { 'Content-Type': 'application/json' },
            transformRequest: [(data: string) => data]
        })

        expect(missingUrl.status).toBe(400)
        expect(missingUrl.data.status).toBe('error')
        expect(notJson.status).toBe(400)
        expect(notJson.data.status).toBe('error')
        expect(factory).not.toHaveBeenCalled()
    })

    it('runs the chain for a valid request', async () => {
        const { factory, solveQuizChain } = runner(async () => SUMMARY)
        const http = client(await start(factory))

        const res = await http.post('/solve', { email: TEST_EMAIL, secret: TEST_SECRET, url: QUIZ_URL })

        expect(res.status).toBe(200)
        expect(res.data).toEqual({ status: 'success', message: 'Quiz solving completed', result: SUMMARY })
        expect(solveQuizChain).toHaveBeenCalledWith(QUIZ_URL)
    })

    it('reports a failing chain in the body', async () => {
        const http = client(await start(runner(async () => { throw new Error('boom') }).factory))

        const res = await http.post('/solve', { email: TEST_EMAIL, secret: TEST_SECRET, url: QUIZ_URL })

        expect(res.status).toBe(200)
        expect(res.data).toEqual({ status: 'error', message: 'boom' })
    })

    it('solves a chain end to end with a real agent', async () => {
        const submitUrl = 'https://quiz.test/submit'
        const llm = fakeModel(prompt => isParsePrompt(prompt)
            ? JSON.stringify({ task: 'Add 2 and 3', submit_url: submitUrl, answer_format: 'number' })
            : '5')
        const http = client(await start(config => new QuizAgent(config, {
            llm,
            renderer: fakeRenderer({ [QUIZ_URL]: 'Add 2 and 3' }),
            httpAdapter: fakeAdapter({ [`POST ${submitUrl}`]: () => ({ data: { correct: true } }) })
        })))

        const res = await http.post('/solve', { email: TEST_EMAIL, secret: TEST_SECRET, url: QUIZ_URL })

        expect(res.data).toEqual({
            status: 'success',
            message: 'Quiz solving completed',
            result: {
                questions_solved: 1,
                correct: 1,
                attempts: [{ index: 1, url: QUIZ_URL, answer: 5, submitUrl, correct: true }]
            }
        })
    })
})
