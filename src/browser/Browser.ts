import { chromium, type Browser as ChromiumBrowser } from 'rebrowser-playwright'

import type { QuizAgent } from '../index.js'

/**
 * Launches a fresh headless Chromium for one render. Nothing is reused between questions.
 */
class Browser {
    private agent: QuizAgent

    constructor(agent: QuizAgent) {
        this.agent = agent
    }

    async createBrowser(): Promise<ChromiumBrowser> {
        const { headless } = this.agent.config.browser

        const browser = await chromium.launch({
            headless,
            args: [
                '--no-sandbox',
                '--mute-audio',
                '--disable-setuid-sandbox',
                '--disable-dev-shm-usage',
                '--disable-blink-features=AutomationControlled'
            ]
        })

        this.agent.log('chain', 'BROWSER', `Chromium ${browser.version()} launched (headless=${headless})`, 'debug')
        return browser
    }
}

export default Browser
