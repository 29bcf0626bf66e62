import dotenv from 'dotenv'
import path from 'path'
import { fileURLToPath } from 'url'
import type { Server as HttpServer } from 'http'
import type { AxiosAdapter } from 'axios'

import Browser from './browser/Browser.js'
import BrowserFunc, { type PageRenderer } from './browser/BrowserFunc.js'
import ContentExtractor from './data/ContentExtractor.js'
import DataAnalyzer from './data/DataAnalyzer.js'
import { openPdf, type PdfOpener } from './data/PdfExtractor.js'
import ChainDriver from './functions/ChainDriver.js'
import QuestionSolver from './functions/QuestionSolver.js'
import Submitter from './functions/Submitter.js'
import { GeminiClient } from './llm/Gemini.js'
import type { LanguageModel } from './llm/LanguageModel.js'
import { createServer } from './server/Server.js'

import type { Config } from './interface/Config.js'
import type { ChainSummary } from './interface/Quiz.js'
import Axios from './util/Axios.js'
import { errorMessage } from './util/Errors.js'
import { loadConfig } from './util/Load.js'
import { configureLogger, log } from './util/Logger.js'
import Util from './util/Utils.js'

/**
 * Collaborators that replace the real ones, e.g. in-process fakes for the model, the browser or the network.
 */
export interface AgentOverrides {
    llm?: LanguageModel
    renderer?: PageRenderer
    httpAdapter?: AxiosAdapter
    pdfOpener?: PdfOpener
}

// One agent per /solve request; nothing but the frozen config is shared between requests
export class QuizAgent {
    public log: typeof log
    public config: Config
    public utils: Util
    public llm: LanguageModel
    public axios: Axios
    public browserFactory: Browser
    public renderer: PageRenderer
    public extractor: ContentExtractor
    public analyzer: DataAnalyzer
    public solver: QuestionSolver
    public submitter: Submitter
    public chain: ChainDriver

    constructor(config: Config, overrides: AgentOverrides = {}) {
        this.log = log
        this.config = config
        this.utils = new Util()

        this.llm = overrides.llm ?? new GeminiClient(config.llm)
        this.axios = new Axios({ timeoutMs: config.http.timeoutMs, adapter: overrides.httpAdapter })
        this.browserFactory = new Browser(this)
        this.renderer = overrides.renderer ?? new BrowserFunc(this)

        this.extractor = new ContentExtractor(this, overrides.pdfOpener ?? openPdf)
        this.analyzer = new DataAnalyzer(this)
        this.solver = new QuestionSolver(this)
        this.submitter = new Submitter(this)
        this.chain = new ChainDriver(this)
    }

    async solveQuizChain(url: string): Promise<ChainSummary> {
        this.log('chain', 'CHAIN', `Starting quiz chain at ${url} (model: ${this.llm.model})`)
        return this.chain.run(url)
    }
}

async function main() {
    dotenv.config()
    const config = loadConfig()
    configureLogger(config.logging)

    const app = createServer(config, (cfg) => new QuizAgent(cfg))

    let server: HttpServer | undefined
    const gracefulExit = (code: number) => {
        if (!server) process.exit(code)
        server.close(() => process.exit(code))
        // open keep-alive sockets would hold close() forever
        setTimeout(() => process.exit(code), 5000).unref()
    }

    process.on('unhandledRejection', (reason) => {
        log('main', 'FATAL', 'UnhandledRejection: ' + errorMessage(reason), 'error')
        gracefulExit(1)
    })
    process.on('uncaughtException', (err) => {
        log('main', 'FATAL', 'UncaughtException: ' + err.message, 'error')
        gracefulExit(1)
    })
    process.on('SIGTERM', () => gracefulExit(0))
    process.on('SIGINT', () => gracefulExit(0))

    await new Promise<void>((resolve, reject) => {
        server = app.listen(config.server.port, config.server.host, () => resolve())
        server.once('error', reject)
    })
    log('main', 'MAIN', `Listening on http://${config.server.host}:${config.server.port} as ${config.email}`, 'log', 'green')
}

const entry = process.argv[1]
if (entry && path.resolve(entry) === fileURLToPath(import.meta.url)) {
    main().catch(error => {
        log('main', 'MAIN-ERROR', `Error starting server: ${errorMessage(error)}`, 'error')
        process.exit(1)
    })
}
