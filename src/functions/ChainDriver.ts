import type { QuizAgent } from '../index.js'
import type { ChainSummary, QuestionAttempt, SolvedQuestion } from '../interface/Quiz.js'
import { errorMessage } from '../util/Errors.js'

export type ChainState = 'RUNNING' | 'DONE'

export default class ChainDriver {
    private agent: QuizAgent

    constructor(agent: QuizAgent) {
        this.agent = agent
    }

    /**
     * Render, solve and submit questions starting at `startUrl` until the grader stops handing out
     * a next URL, a question fails, or the question limit is hit. Never throws; a render or
     * model failure ends the run and is recorded in the summary.
     */
    async run(startUrl: string): Promise<ChainSummary> {
        const { maxQuestions, delayMs } = this.agent.config.chain
        const started = Date.now()

        let state: ChainState = 'RUNNING'
        let currentUrl = startUrl
        let count = 0
        let error: string | undefined
        const attempts: QuestionAttempt[] = []

        while (state === 'RUNNING' && count < maxQuestions) {
            count++
            const attempt: QuestionAttempt = { index: count, url: currentUrl }
            attempts.push(attempt)

            this.agent.log('chain', 'CHAIN', `Question ${count}/${maxQuestions}: ${currentUrl}`, 'log', 'cyan')

            let questionText: string
            try {
                questionText = await this.agent.renderer.fetchQuizPage(currentUrl)
            } catch (e) {
                error = errorMessage(e)
                attempt.error = error
                this.agent.log('chain', 'CHAIN-ERROR', `Rendering failed: ${error}`, 'warn')
                state = 'DONE'
                break
            }

            let solved: SolvedQuestion
            try {
                solved = await this.agent.solver.solve(questionText)
            } catch (e) {
                error = errorMessage(e)
                attempt.error = error
                this.agent.log('chain', 'CHAIN-ERROR', `Solving failed: ${error}`, 'warn')
                state = 'DONE'
                break
            }
            const { answer, submitUrl } = solved
            attempt.answer = answer
            attempt.submitUrl = submitUrl

            const result = await this.agent.submitter.submit(submitUrl, answer)
            if (typeof result.correct === 'boolean') attempt.correct = result.correct
            if (result.error) attempt.error = result.error

            this.agent.log('chain', 'CHAIN', `Result: ${result.correct === true ? 'correct' : 'incorrect'}${result.error ? ` (${result.error})` : ''}`,
                'log', result.correct === true ? 'green' : 'yellow')

            if (typeof result.url === 'string' && result.url !== '') {
                currentUrl = result.url
                await this.agent.utils.wait(delayMs)
            } else {
                this.agent.log('chain', 'CHAIN', 'No next URL, quiz chain finished')
                state = 'DONE'
            }
        }

        if (state === 'RUNNING') {
            this.agent.log('chain', 'CHAIN', `Stopped after reaching the limit of ${maxQuestions} questions`, 'warn')
        }

        const summary: ChainSummary = {
            questions_solved: count,
            correct: attempts.filter(a => a.correct === true).length,
            attempts
        }
        if (error !== undefined) summary.error = error

        this.agent.log('chain', 'CHAIN-COMPLETE', `${summary.correct}/${count} correct in ${this.agent.utils.formatDuration(Date.now() - started)}`)
        return summary
    }
}
