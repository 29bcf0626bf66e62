import type { Browser as ChromiumBrowser, Page } from 'rebrowser-playwright'

import type { QuizAgent } from '../index.js'
import { SELECTORS } from '../constants.js'
import { RenderFailure, errorMessage } from '../util/Errors.js'

/**
 * Turns a quiz URL into the text the solver reads.
 */
export interface PageRenderer {
    fetchQuizPage(url: string): Promise<string>
}

export default class BrowserFunc implements PageRenderer {
    private agent: QuizAgent

    constructor(agent: QuizAgent) {
        this.agent = agent
    }

    /**
     * Load the page in its own browser, let scripts settle, then return the text of #result or,
     * when there is no such element, the whole rendered document.
     * Any navigation failure becomes a RenderFailure; the browser is closed either way.
     */
    async fetchQuizPage(url: string): Promise<string> {
        const { navigationTimeoutMs, settleMs } = this.agent.config.browser
        let browser: ChromiumBrowser | undefined

        try {
            this.agent.log('chain', 'BROWSER', 'Launching browser')
            browser = await this.agent.browserFactory.createBrowser()
            const context = await browser.newContext()
            const page = await context.newPage()

            this.agent.log('chain', 'BROWSER', `Loading page: ${url}`)
            await page.goto(url, { waitUntil: 'networkidle', timeout: navigationTimeoutMs })
            // deferred scripts (atob decoders and the like) run after network idle
            await page.waitForTimeout(settleMs)

            return await this.extractContent(page)
        } catch (error) {
            throw new RenderFailure(`Failed to fetch quiz page: ${errorMessage(error)}`, error)
        } finally {
            if (browser) {
                await this.closeBrowser(browser)
            }
        }
    }

    private async extractContent(page: Page): Promise<string> {
        try {
            const result = await page.$(SELECTORS.RESULT)
            if (result) {
                this.agent.log('chain', 'BROWSER', `Extracted from ${SELECTORS.RESULT} element`)
                return await result.innerText()
            }
            this.agent.log('chain', 'BROWSER', 'Using full page content')
        } catch (error) {
            this.agent.log('chain', 'BROWSER', `Selector lookup failed (${errorMessage(error)}), using full page content`, 'warn')
        }
        return page.content()
    }

    async closeBrowser(browser: ChromiumBrowser): Promise<void> {
        try {
            await browser.close()
        } catch (error) {
            this.agent.log('chain', 'BROWSER', `Failed to close browser: ${errorMessage(error)}`, 'warn')
        }
    }
}
