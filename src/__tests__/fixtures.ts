import { AxiosError, AxiosHeaders, type AxiosAdapter, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios'
import { vi } from 'vitest'

import type { PageRenderer } from '../browser/BrowserFunc.js'
import type { LanguageModel, QueryOptions } from '../llm/LanguageModel.js'
import type { Config } from '../interface/Config.js'

export const TEST_EMAIL = 'student@example.com'
export const TEST_SECRET = 'test-secret'

export function testConfig(chain: Partial<Config['chain']> = {}): Config {
    return {
        email: TEST_EMAIL,
        secret: TEST_SECRET,
        server: { port: 8000, host: '127.0.0.1' },
        browser: { headless: true, navigationTimeoutMs: 1000, settleMs: 0 },
        http: { timeoutMs: 1000 },
        chain: { maxQuestions: 20, delayMs: 0, ...chain },
        llm: {
            apiKey: 'test-key',
            model: 'fake-model',
            temperature: 0.7,
            topP: 0.95,
            topK: 40,
            maxOutputTokens: 4096
        },
        logging: { level: 'info', excludeFunc: [], redactEmails: false }
    }
}

export type Responder = (prompt: string, options?: QueryOptions) => string | Promise<string>

export function fakeModel(respond: Responder) {
    return {
        model: 'fake-model',
        query: vi.fn(async (prompt: string, options?: QueryOptions) => respond(prompt, options)),
        analyzeImage: vi.fn(async (_image: Buffer, _mimeType: string, prompt: string) => respond(prompt))
    } satisfies LanguageModel
}

export function isParsePrompt(prompt: string): boolean {
    return prompt.startsWith('Analyze this quiz question')
}

export function fakeRenderer(pages: Record<string, string>) {
    return {
        fetchQuizPage: vi.fn(async (url: string) => {
            const page = pages[url]
            if (page === undefined) throw new Error(`no page for ${url}`)
            return page
        })
    } satisfies PageRenderer
}

export interface FakeReply {
    status?: number
    data: unknown
    headers?: Record<string, string>
}

export type Route = (config: InternalAxiosRequestConfig) => FakeReply | Promise<FakeReply>

/**
 * Axios transport answering from an in-memory table keyed by `METHOD url`. Unknown routes fail
 * like a refused connection; non-2xx replies reject the way axios does.
 */
export function fakeAdapter(routes: Record<string, Route>): AxiosAdapter {
    return async (config) => {
        const key = `${(config.method ?? 'get').toUpperCase()} ${config.url ?? ''}`
        const route = routes[key]
        if (!route) {
            throw new AxiosError(`connect ECONNREFUSED (${key})`, 'ECONNREFUSED', config)
        }
        const reply = await route(config)
        const status = reply.status ?? 200
        const response: AxiosResponse = {
            data: reply.data,
            status,
            statusText: String(status),
            headers: new AxiosHeaders(reply.headers ?? {}),
            config
        }
        if (status < 200 || status >= 300) {
            throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_RESPONSE, config, null, response)
        }
        return response
    }
}

export function requestBody(config: InternalAxiosRequestConfig): unknown {
    return typeof config.data === 'string' ? JSON.parse(config.data) : config.data
}
