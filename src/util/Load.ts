import fs from 'fs'
import path from 'path'
import { fileURLToPath } from 'url'
import { z } from 'zod'

import type { Config } from '../interface/Config.js'
import { LLM_DEFAULTS, MAX_QUESTIONS, SERVICE, TIMEOUTS } from '../constants.js'

type ScanMode = 'code' | 'string' | 'line-comment' | 'block-comment'

/**
 * Remove line and block comments from JSONC text. Quoted strings (either quote style) are copied
 * untouched, escapes included; line comments keep their terminating newline.
 */
export function stripJsonComments(input: string): string {
    const out: string[] = []
    let mode: ScanMode = 'code'
    let quote = ''

    let i = 0
    while (i < input.length) {
        const ch = input.charAt(i)
        const pair = input.slice(i, i + 2)

        switch (mode) {
            case 'line-comment':
                if (ch === '\n' || ch === '\r') {
                    mode = 'code'
                    out.push(ch)
                }
                i++
                break
            case 'block-comment':
                if (pair === '*/') {
                    mode = 'code'
                    i += 2
                } else {
                    i++
                }
                break
            case 'string':
                if (ch === '\\') {
                    out.push(pair)
                    i += 2
                    break
                }
                if (ch === quote) mode = 'code'
                out.push(ch)
                i++
                break
            case 'code':
                if (pair === '//' || pair === '/*') {
                    mode = pair === '//' ? 'line-comment' : 'block-comment'
                    i += 2
                    break
                }
                if (ch === '"' || ch === "'") {
                    mode = 'string'
                    quote = ch
                }
                out.push(ch)
                i++
                break
        }
    }
    return out.join('')
}

const positiveInt = z.coerce.number().int().positive()
const nonNegativeInt = z.coerce.number().int().min(0)

const fileConfigSchema = z.object({
    server: z.object({
        port: positiveInt.default(SERVICE.DEFAULT_PORT),
        host: z.string().min(1).default(SERVICE.DEFAULT_HOST)
    }).default({}),
    browser: z.object({
        headless: z.boolean().default(true),
        navigationTimeoutMs: positiveInt.default(TIMEOUTS.NAVIGATION),
        settleMs: nonNegativeInt.default(TIMEOUTS.SETTLE)
    }).default({}),
    http: z.object({
        timeoutMs: positiveInt.default(TIMEOUTS.HTTP)
    }).default({}),
    chain: z.object({
        maxQuestions: positiveInt.default(MAX_QUESTIONS).transform(n => Math.min(n, MAX_QUESTIONS)),
        delayMs: nonNegativeInt.default(TIMEOUTS.QUESTION_DELAY)
    }).default({}),
    llm: z.object({
        model: z.string().min(1).default(LLM_DEFAULTS.MODEL),
        temperature: z.number().min(0).max(2).default(LLM_DEFAULTS.TEMPERATURE),
        topP: z.number().min(0).max(1).default(LLM_DEFAULTS.TOP_P),
        topK: positiveInt.default(LLM_DEFAULTS.TOP_K),
        maxOutputTokens: positiveInt.default(LLM_DEFAULTS.MAX_OUTPUT_TOKENS)
    }).default({}),
    logging: z.object({
        level: z.enum(['debug', 'info']).default('info'),
        excludeFunc: z.array(z.string()).default([]),
        redactEmails: z.boolean().default(false)
    }).default({})
})

type FileConfig = z.infer<typeof fileConfigSchema>

export interface LoadConfigOptions {
    env?: NodeJS.ProcessEnv
    cwd?: string
    // Explicit config file; skips the candidate search when set
    configPath?: string
}

const moduleDir = path.dirname(fileURLToPath(import.meta.url))

function findConfigFile(cwd: string): string | null {
    const names = ['config.jsonc', 'config.json']
    const bases = [
        cwd,                            // repo root
        path.join(moduleDir, '../../')  // package root when running from dist/util or src/util
    ]
    for (const base of bases) {
        for (const name of names) {
            const candidate = path.join(base, name)
            if (fs.existsSync(candidate)) return candidate
        }
    }
    return null
}

function readConfigFile(file: string): unknown {
    const text = fs.readFileSync(file, 'utf-8').replace(/^\uFEFF/, '') // strip BOM if present
    return JSON.parse(stripJsonComments(text))
}

function requireEnv(env: NodeJS.ProcessEnv, name: string): string {
    const value = env[name]?.trim()
    if (!value) {
        throw new Error(`Missing required env var ${name}. Set it in your environment or .env file.`)
    }
    return value
}

function formatIssues(error: z.ZodError): string {
    return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
}

function deepFreeze<T>(value: T): Readonly<T> {
    if (value && typeof value === 'object') {
        for (const child of Object.values(value)) {
            deepFreeze(child)
        }
        Object.freeze(value)
    }
    return value
}

/**
 * Build the process-wide configuration from an optional config.jsonc / config.json (comments allowed)
 * and the environment. Secrets only come from the environment.
 *
 * The result is frozen; it is handed to the server and every agent, nothing reads the environment later.
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
    const env = options.env ?? process.env
    const cwd = options.cwd ?? process.cwd()

    const file = options.configPath ?? findConfigFile(cwd)
    const raw = file ? readConfigFile(file) : {}

    const parsed = fileConfigSchema.safeParse(raw ?? {})
    if (!parsed.success) {
        throw new Error(`Invalid config${file ? ` at ${file}` : ''}: ${formatIssues(parsed.error)}`)
    }
    const fileConfig: FileConfig = parsed.data

    const port = env.PORT !== undefined ? positiveInt.safeParse(env.PORT) : undefined
    if (port && !port.success) {
        throw new Error(`PORT=${env.PORT} is invalid. Expected a positive integer.`)
    }

    const level = env.LOG_LEVEL === 'debug' || env.LOG_LEVEL === 'info' ? env.LOG_LEVEL : fileConfig.logging.level

    const config: Config = {
        email: requireEnv(env, 'STUDENT_EMAIL'),
        secret: requireEnv(env, 'SECRET_STRING'),
        server: {
            ...fileConfig.server,
            port: port?.success ? port.data : fileConfig.server.port
        },
        browser: {
            ...fileConfig.browser,
            headless: env.HEADLESS !== undefined ? env.HEADLESS !== '0' && env.HEADLESS.toLowerCase() !== 'false' : fileConfig.browser.headless
        },
        http: fileConfig.http,
        chain: fileConfig.chain,
        llm: {
            ...fileConfig.llm,
            apiKey: requireEnv(env, 'GEMINI_API_KEY'),
            model: env.GEMINI_MODEL?.trim() || fileConfig.llm.model
        },
        logging: { ...fileConfig.logging, level }
    }

    return deepFreeze(config)
}
