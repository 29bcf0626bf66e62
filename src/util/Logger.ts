import chalk, { type ForegroundColorName } from 'chalk'

import type { ConfigLogging } from '../interface/Config.js'

export type LogSource = 'main' | 'server' | 'chain'
export type LogType = 'log' | 'warn' | 'error' | 'debug'

const settings: ConfigLogging = {
    level: 'info',
    excludeFunc: [],
    redactEmails: false
}

/**
 * Applies the logging section of the loaded config. Called once at startup.
 */
export function configureLogger(logging: Partial<ConfigLogging>): void {
    if (logging.level) settings.level = logging.level
    if (logging.excludeFunc) settings.excludeFunc = [...logging.excludeFunc]
    if (typeof logging.redactEmails === 'boolean') settings.redactEmails = logging.redactEmails
}

function redact(text: string): string {
    if (!settings.redactEmails) return text
    return text.replace(/[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}/ig, (m) => {
        const [user, domain] = m.split('@')
        return `${(user ?? '').slice(0, 2)}***@${domain ?? ''}`
    })
}

// ASCII-safe icons so the output stays readable in plain terminals
const ICON_MAP: Array<[RegExp, string]> = [
    [/error|fail/i, '[ERROR]'],
    [/warn/i, '[WARN]'],
    [/success|complet|correct/i, '[OK]'],
    [/browser|render/i, '[BROWSER]'],
    [/llm|gemini|model/i, '[LLM]'],
    [/data|download|pdf/i, '[DATA]'],
    [/submit/i, '[SUBMIT]'],
    [/question|chain/i, '[QUIZ]'],
    [/server|http/i, '[HTTP]'],
    [/main/i, '[MAIN]']
]

/**
 * Synchronous console logger that returns an Error when type === 'error' so callers can `throw log(...)`.
 *
 * source: which part of the service is talking ('main' = process lifecycle)
 * title: short title/category of the log (used for exclusion checks)
 */
export function log(source: LogSource, title: string, message: string, type: 'error', color?: ForegroundColorName): Error
export function log(source: LogSource, title: string, message: string, type?: LogType, color?: ForegroundColorName): Error | void
export function log(
    source: LogSource,
    title: string,
    message: string,
    type: LogType = 'log',
    color?: ForegroundColorName
): Error | void {
    const currentTime = new Date().toLocaleString()
    const sourceText = source.toUpperCase()
    const cleanStr = redact(`[${currentTime}] [PID: ${process.pid}] [${type.toUpperCase()}] ${sourceText} [${title}] ${message}`)

    const excluded = settings.excludeFunc.some(x => x.toLowerCase() === title.toLowerCase())
    const suppressed = type === 'debug' && settings.level !== 'debug'

    if (!excluded && !suppressed) {
        const typeIndicator = type === 'error' ? '✗' : type === 'warn' ? '⚠' : type === 'debug' ? '·' : '✓'
        const sourceColor = source === 'main' ? chalk.cyan : source === 'server' ? chalk.blue : chalk.magenta
        const typeColor = type === 'error' ? chalk.red : type === 'warn' ? chalk.yellow : type === 'debug' ? chalk.gray : chalk.green

        let icon = ''
        for (const [pattern, symbol] of ICON_MAP) {
            if (pattern.test(title)) {
                // a title like SUBMIT already reads as its own icon
                if (symbol !== `[${title.toUpperCase()}]`) icon = chalk.dim(symbol)
                break
            }
        }
        const iconPart = icon ? icon + ' ' : ''

        const formattedStr = [
            chalk.gray(`[${currentTime}]`),
            chalk.gray(`[${process.pid}]`),
            typeColor(typeIndicator),
            sourceColor(`[${sourceText}]`),
            chalk.bold(`[${title}]`),
            iconPart + redact(message)
        ].join(' ')

        const output = color ? chalk[color](formattedStr) : formattedStr

        switch (type) {
            case 'warn':
                console.warn(output)
                break
            case 'error':
                console.error(output)
                break
            default:
                console.log(output)
                break
        }
    }

    // Return an Error when logging an error so callers can `throw log(...)`
    if (type === 'error') {
        return new Error(cleanStr)
    }
}
