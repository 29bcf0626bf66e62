import { describe, expect, it } from 'vitest'

import { QuizAgent } from '../../index.js'
import { ModelQueryFailure } from '../../util/Errors.js'
import { fakeAdapter, fakeModel, fakeRenderer, isParsePrompt, testConfig } from '../../__tests__/fixtures.js'

const parseReply = (fields: Record<string, string | null>) => JSON.stringify(fields)

describe('QuestionSolver', () => {
    it('downloads the data, analyzes it and coerces the answer', async () => {
        const llm = fakeModel(prompt => isParsePrompt(prompt)
            ? parseReply({
                data_url: 'https://data.test/sales.csv',
                task: 'Sum the amount column',
                submit_url: 'https://quiz.test/submit',
                answer_format: 'number'
            })
            : 'Answer: 60')
        const agent = new QuizAgent(testConfig(), {
            llm,
            renderer: fakeRenderer({}),
            httpAdapter: fakeAdapter({
                'GET https://data.test/sales.csv': () => ({
                    data: Buffer.from('name,amount\nAnn,10\nBob,50\n'),
                    headers: { 'Content-Type': 'text/csv' }
                })
            })
        })

        const solved = await agent.solver.solve('Sum the amount column of https://data.test/sales.csv')

        expect(solved).toEqual({ answer: 60, submitUrl: 'https://quiz.test/submit' })
        expect(llm.query).toHaveBeenCalledTimes(2)
        const analysisCall = llm.query.mock.calls[1]
        expect(analysisCall?.[0]).toContain('TASK: Sum the amount column')
        expect(analysisCall?.[0]).toContain('DATAFRAME (2 rows × 2 columns)')
    })

    it('asks for JSON when parsing the question', async () => {
        const llm = fakeModel(() => parseReply({ task: 't', submit_url: 'https://quiz.test/submit', answer_format: 'string' }))
        const agent = new QuizAgent(testConfig(), { llm, renderer: fakeRenderer({}), httpAdapter: fakeAdapter({}) })

        const parsed = await agent.solver.parseQuestion('Question')

        expect(llm.query).toHaveBeenCalledWith(expect.stringContaining('QUESTION TEXT:\nQuestion'), { responseFormat: 'json' })
        expect(parsed).toEqual({ ok: true, value: { task: 't', submitUrl: 'https://quiz.test/submit', answerFormat: 'string' } })
    })

    it('falls back to pattern parsing when the model reply is not JSON', async () => {
        const llm = fakeModel(prompt => isParsePrompt(prompt) ? 'not json' : 'blue')
        const agent = new QuizAgent(testConfig(), { llm, renderer: fakeRenderer({}), httpAdapter: fakeAdapter({}) })

        const solved = await agent.solver.solve('What colour is the sky? Post to https://quiz.test/submit')

        expect(solved).toEqual({ answer: 'blue', submitUrl: 'https://quiz.test/submit' })
        expect(llm.query.mock.calls[1]?.[0]).toContain('Format: string')
    })

    it('returns a ParseFailure for a reply with the wrong shape', async () => {
        const llm = fakeModel(() => JSON.stringify({ task: 42 }))
        const agent = new QuizAgent(testConfig(), { llm, renderer: fakeRenderer({}), httpAdapter: fakeAdapter({}) })

        const parsed = await agent.solver.parseQuestion('Question')

        expect(parsed.ok).toBe(false)
        if (!parsed.ok) expect(parsed.error.kind).toBe('parse')
    })

    it('answers without data when the download fails', async () => {
        const llm = fakeModel(prompt => isParsePrompt(prompt)
            ? parseReply({
                data_url: 'https://data.test/missing.csv',
                task: 'Count the rows',
                submit_url: 'https://quiz.test/submit',
                answer_format: 'number'
            })
            : '7')
        const agent = new QuizAgent(testConfig(), { llm, renderer: fakeRenderer({}), httpAdapter: fakeAdapter({}) })

        const solved = await agent.solver.solve('Count the rows of https://data.test/missing.csv')

        expect(solved).toEqual({ answer: 7, submitUrl: 'https://quiz.test/submit' })
        expect(llm.query.mock.calls[1]?.[0]).toContain('Answer this question directly.')
    })

    it('propagates model failures while answering', async () => {
        const llm = fakeModel(prompt => {
            if (isParsePrompt(prompt)) return parseReply({ task: 't', submit_url: 'https://quiz.test/submit' })
            throw new ModelQueryFailure('Empty response from Gemini')
        })
        const agent = new QuizAgent(testConfig(), { llm, renderer: fakeRenderer({}), httpAdapter: fakeAdapter({}) })

        await expect(agent.solver.solve('Question')).rejects.toThrow('Empty response from Gemini')
    })
})
