import { describe, expect, it } from 'vitest'

import { QuizAgent } from '../../index.js'
import { formatDataForPrompt } from '../DataAnalyzer.js'
import { fakeAdapter, fakeModel, fakeRenderer, testConfig, type Responder } from '../../__tests__/fixtures.js'

function agentWith(respond: Responder) {
    const llm = fakeModel(respond)
    const agent = new QuizAgent(testConfig(), { llm, renderer: fakeRenderer({}), httpAdapter: fakeAdapter({}) })
    return { agent, llm }
}

describe('DataAnalyzer', () => {
    describe('formatDataForPrompt', () => {
        it('summarises tables with their shape and columns', () => {
            const text = formatDataForPrompt({ kind: 'tabular', table: { columns: ['name', 'qty'], rows: [['Pen', 3], ['Ink', null]] } })

            expect(text).toBe("DATAFRAME (2 rows × 2 columns)\n\nColumns: ['name', 'qty']\n\nData:\n   name  qty\n0   Pen    3\n1   Ink  NaN")
        })

        it('lists document text and tables with their pages', () => {
            const text = formatDataForPrompt({
                kind: 'document',
                text: 'hello',
                tables: [{ page: 2, tableNumber: 1, table: { columns: ['x'], rows: [[1]] } }]
            })

            expect(text).toBe('PDF DOCUMENT\n\nTEXT CONTENT:\nhello\n\nTABLES (1 found):\n\n--- Table 1 (Page 2) ---\n   x\n0  1\n\n')
        })

        it('leaves out empty document sections', () => {
            expect(formatDataForPrompt({ kind: 'document', text: '', tables: [] })).toBe('PDF DOCUMENT\n\n')
        })

        it('truncates long structured and text values', () => {
            const structured = formatDataForPrompt({ kind: 'structured', value: 'a'.repeat(5000) })
            const text = formatDataForPrompt({ kind: 'text', text: 'b'.repeat(5000) })

            expect(structured).toHaveLength(3000)
            expect(structured.startsWith('"aaa')).toBe(true)
            expect(text).toBe('b'.repeat(3000))
        })

        it('indents JSON by two spaces', () => {
            expect(formatDataForPrompt({ kind: 'structured', value: { a: 1 } })).toBe('{\n  "a": 1\n}')
        })
    })

    describe('analyze', () => {
        it('sends the task and data block to the model and cleans the reply', async () => {
            const { agent, llm } = agentWith(() => 'Answer: 12')

            const answer = await agent.analyzer.analyze({ kind: 'text', text: 'six and six' }, 'Add the numbers')

            expect(answer).toBe('12')
            expect(llm.query.mock.calls[0]?.[0]).toContain('TASK: Add the numbers\n\nDATA:\nsix and six')
        })

        it('sends images through the vision call', async () => {
            const { agent, llm } = agentWith(() => 'Result: 7 bars')
            const image = Buffer.from([0x89, 0x50])

            const answer = await agent.analyzer.analyze({ kind: 'image', mimeType: 'image/png', data: image }, 'Count the bars')

            expect(answer).toBe('7 bars')
            expect(llm.query).not.toHaveBeenCalled()
            expect(llm.analyzeImage).toHaveBeenCalledWith(image, 'image/png', expect.stringContaining('TASK: Count the bars'))
        })
    })
})
