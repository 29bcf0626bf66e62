// Hard bound on questions per chain run; configuration may lower it, never raise it
export const MAX_QUESTIONS = 20

export const TIMEOUTS = {
    NAVIGATION: 30000,
    SETTLE: 2000,
    HTTP: 30000,
    QUESTION_DELAY: 500
} as const

export const SELECTORS = {
    RESULT: '#result'
} as const

export const LIMITS = {
    CONTEXT_CHARS: 500,
    TABLE_ROWS: 100,
    TABLE_COLS: 20,
    DOCUMENT_TEXT_CHARS: 2000,
    TEXT_CHARS: 3000,
    PREVIEW_CHARS: 400
} as const

export const DATA_EXTENSIONS = ['.pdf', '.csv', '.json', '.xlsx', '.xls'] as const
export const IMAGE_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.gif', '.webp'] as const

export const DEFAULT_TASK = 'Analyze the data and provide the answer as requested in the question'

export const SERVICE = {
    NAME: 'llm-quiz-solver',
    TITLE: 'LLM Quiz Solver',
    DEFAULT_PORT: 8000,
    DEFAULT_HOST: '0.0.0.0'
} as const

export const LLM_DEFAULTS = {
    MODEL: 'gemini-2.0-flash',
    TEMPERATURE: 0.7,
    TOP_P: 0.95,
    TOP_K: 40,
    MAX_OUTPUT_TOKENS: 4096
} as const
