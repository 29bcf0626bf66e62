import express, { type ErrorRequestHandler, type Express, type Request, type Response } from 'express'
import { z } from 'zod'

import type { Config } from '../interface/Config.js'
import type { ChainSummary, SolveResponse } from '../interface/Quiz.js'
import { SERVICE } from '../constants.js'
import { errorMessage } from '../util/Errors.js'
import { log } from '../util/Logger.js'

export interface ChainRunner {
    solveQuizChain(url: string): Promise<ChainSummary>
}

export type AgentFactory = (config: Config) => ChainRunner

// Shape only; credentials are compared before the URL itself is looked at
export const quizRequestSchema = z.object({
    email: z.string(),
    secret: z.string(),
    url: z.string()
})

const quizUrlSchema = z.string().url().refine(u => /^https?:\/\//i.test(u), { message: 'url must be an http(s) URL' })

export type QuizRequest = z.infer<typeof quizRequestSchema>

function describeIssues(error: z.ZodError): string {
    return error.issues.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ')
}

/**
 * Express app exposing POST /solve, GET / and GET /health. Every accepted /solve request gets
 * a fresh agent from `createAgent`.
 */
export function createServer(config: Config, createAgent: AgentFactory): Express {
    const app = express()
    app.use(express.json())

    app.post('/solve', async (req: Request, res: Response) => {
        const body = quizRequestSchema.safeParse(req.body)
        if (!body.success) {
            log('server', 'SOLVE', `Rejected malformed request: ${describeIssues(body.error)}`, 'warn')
            const reply: SolveResponse = { status: 'error', message: describeIssues(body.error) }
            res.status(400).json(reply)
            return
        }

        const { email, secret, url }: QuizRequest = body.data
        log('server', 'SOLVE', `Received quiz request for: ${url}`)

        if (secret !== config.secret) {
            log('server', 'SOLVE', 'Invalid secret provided', 'warn')
            res.status(403).json({ detail: 'Invalid secret' })
            return
        }
        if (email !== config.email) {
            log('server', 'SOLVE', `Invalid email: ${email}`, 'warn')
            res.status(403).json({ detail: 'Invalid email' })
            return
        }

        const target = quizUrlSchema.safeParse(url)
        if (!target.success) {
            const message = `url: ${target.error.issues.map(issue => issue.message).join('; ')}`
            log('server', 'SOLVE', `Rejected quiz URL ${url}: ${message}`, 'warn')
            const reply: SolveResponse = { status: 'error', message }
            res.status(400).json(reply)
            return
        }

        try {
            const result = await createAgent(config).solveQuizChain(target.data)
            log('server', 'SOLVE', `Quiz chain completed: ${result.questions_solved} question(s), ${result.correct} correct`, 'log', 'green')
            const reply: SolveResponse = { status: 'success', message: 'Quiz solving completed', result }
            res.json(reply)
        } catch (error) {
            log('server', 'SOLVE', `Error solving quiz: ${errorMessage(error)}`, 'warn')
            const reply: SolveResponse = { status: 'error', message: errorMessage(error) }
            res.json(reply)
        }
    })

    app.get('/', (_req: Request, res: Response) => {
        res.json({
            message: `${SERVICE.TITLE} API is running`,
            status: 'ok',
            email: config.email,
            endpoints: {
                'POST /solve': 'Submit quiz URL to solve',
                'GET /health': 'Check API health'
            }
        })
    })

    app.get('/health', (_req: Request, res: Response) => {
        res.json({ status: 'healthy', service: SERVICE.NAME })
    })

    // body-parser errors (invalid JSON, wrong charset) carry an HTTP status
    const onError: ErrorRequestHandler = (err: unknown, _req, res, next) => {
        if (res.headersSent) {
            next(err)
            return
        }
        const status = typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number' ? err.status : 500
        log('server', 'HTTP', `Request failed (${status}): ${errorMessage(err)}`, 'warn')
        const reply: SolveResponse = { status: 'error', message: errorMessage(err) }
        res.status(status).json(reply)
    }
    app.use(onError)

    return app
}
