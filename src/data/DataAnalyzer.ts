import type { QuizAgent } from '../index.js'
import type { NormalizedData } from '../interface/NormalizedData.js'
import { LIMITS } from '../constants.js'
import { analysisPrompt } from '../functions/Prompts.js'
import { cleanAnswer } from '../functions/AnswerFormatter.js'
import { renderTable } from './Tabular.js'

const truncate = (text: string, max: number) => text.length > max ? text.slice(0, max) : text

/**
 * Bounded text block describing the data for the analysis prompt. Images have no text form
 * and return an empty string; they go to the model as pixels instead.
 */
export function formatDataForPrompt(data: NormalizedData): string {
    switch (data.kind) {
        case 'tabular': {
            const { table } = data
            let out = `DATAFRAME (${table.rows.length} rows × ${table.columns.length} columns)\n\n`
            out += `Columns: [${table.columns.map(c => `'${c}'`).join(', ')}]\n\n`
            out += 'Data:\n'
            out += renderTable(table, { maxRows: LIMITS.TABLE_ROWS, maxCols: LIMITS.TABLE_COLS })
            return out
        }
        case 'document': {
            let out = 'PDF DOCUMENT\n\n'
            if (data.text) {
                out += `TEXT CONTENT:\n${truncate(data.text, LIMITS.DOCUMENT_TEXT_CHARS)}\n\n`
            }
            if (data.tables.length > 0) {
                out += `TABLES (${data.tables.length} found):\n\n`
                data.tables.forEach((entry, i) => {
                    out += `--- Table ${i + 1} (Page ${entry.page}) ---\n`
                    out += renderTable(entry.table, { maxRows: LIMITS.TABLE_ROWS })
                    out += '\n\n'
                })
            }
            return out
        }
        case 'structured':
            return truncate(JSON.stringify(data.value, null, 2), LIMITS.TEXT_CHARS)
        case 'text':
            return truncate(data.text, LIMITS.TEXT_CHARS)
        case 'image':
            return ''
    }
}

export default class DataAnalyzer {
    private agent: QuizAgent

    constructor(agent: QuizAgent) {
        this.agent = agent
    }

    /**
     * Ask the model to compute the task's answer from the data; returns the cleaned reply.
     */
    async analyze(data: NormalizedData, task: string): Promise<string> {
        if (data.kind === 'image') {
            const reply = await this.agent.llm.analyzeImage(data.data, data.mimeType, analysisPrompt(task, `[image: ${data.mimeType}, attached]`))
            return cleanAnswer(reply)
        }

        const block = formatDataForPrompt(data)
        this.agent.log('chain', 'ANALYZE', `Sending ${data.kind} data (${block.length} chars) to ${this.agent.llm.model}`, 'debug')

        const reply = await this.agent.llm.query(analysisPrompt(task, block))
        return cleanAnswer(reply)
    }
}
