import type { QuizAgent } from '../index.js'
import type { NormalizedData } from '../interface/NormalizedData.js'
import type { ParsedQuestion, SolvedQuestion } from '../interface/Quiz.js'
import { LIMITS } from '../constants.js'
import { ParseFailure, errorMessage } from '../util/Errors.js'
import { Err, Ok, type Result } from '../util/Result.js'
import { cleanAnswer, coerceAnswer } from './AnswerFormatter.js'
import { directAnswerPrompt, parseQuestionPrompt } from './Prompts.js'
import { modelQuestionSchema, parseQuestionManually, toParsedQuestion } from './QuestionParser.js'

export default class QuestionSolver {
    private agent: QuizAgent

    constructor(agent: QuizAgent) {
        this.agent = agent
    }

    /**
     * Ask the model to pull the data URL, task, submit URL and answer format out of the question.
     * Any model, decode or shape problem is returned as a ParseFailure.
     */
    async parseQuestion(questionText: string): Promise<Result<ParsedQuestion, ParseFailure>> {
        let reply: string
        try {
            reply = await this.agent.llm.query(parseQuestionPrompt(questionText), { responseFormat: 'json' })
        } catch (error) {
            return Err(new ParseFailure(`Model could not parse the question: ${errorMessage(error)}`, error))
        }

        let decoded: unknown
        try {
            decoded = JSON.parse(reply)
        } catch (error) {
            return Err(new ParseFailure(`Model reply is not JSON: ${this.agent.utils.preview(reply, LIMITS.PREVIEW_CHARS)}`, error))
        }

        const checked = modelQuestionSchema.safeParse(decoded)
        if (!checked.success) {
            return Err(new ParseFailure(`Model reply has the wrong shape: ${checked.error.issues.map(i => i.message).join('; ')}`, checked.error))
        }
        return Ok(toParsedQuestion(checked.data, questionText))
    }

    async fetchData(dataUrl: string): Promise<NormalizedData | null> {
        const downloaded = await this.agent.extractor.download(dataUrl)
        if (!downloaded.ok) {
            this.agent.log('chain', 'DOWNLOAD', `${downloaded.error.message}; continuing without data`, 'warn')
            return null
        }
        return downloaded.value
    }

    /**
     * Turn a rendered question into a typed answer and the URL to submit it to.
     * Model failures while answering propagate to the caller.
     */
    async solve(questionText: string): Promise<SolvedQuestion> {
        this.agent.log('chain', 'QUESTION', `Question preview: ${this.agent.utils.preview(questionText, LIMITS.PREVIEW_CHARS)}`, 'debug')

        const parsed = await this.parseQuestion(questionText)
        let question: ParsedQuestion
        if (parsed.ok) {
            question = parsed.value
        } else {
            this.agent.log('chain', 'QUESTION', `${parsed.error.message}; using pattern-based parsing`, 'warn')
            question = parseQuestionManually(questionText)
        }

        this.agent.log('chain', 'QUESTION', `Task: ${question.task}`)
        this.agent.log('chain', 'QUESTION', `Data URL: ${question.dataUrl ?? 'none'} | Submit URL: ${question.submitUrl || 'none'} | Format: ${question.answerFormat}`)

        const data = question.dataUrl ? await this.fetchData(question.dataUrl) : null

        let answerText: string
        if (data) {
            answerText = await this.agent.analyzer.analyze(data, question.task)
        } else {
            const context = questionText.slice(0, LIMITS.CONTEXT_CHARS)
            const reply = await this.agent.llm.query(directAnswerPrompt(question.task, context, question.answerFormat))
            answerText = cleanAnswer(reply)
        }

        const answer = coerceAnswer(answerText, question.answerFormat)
        this.agent.log('chain', 'QUESTION', `Answer: ${JSON.stringify(answer)}`)

        return { answer, submitUrl: question.submitUrl }
    }
}
