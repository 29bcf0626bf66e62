// src/interface/Config.ts

export interface Config {
    // Credentials expected on /solve and sent with every submission
    email: string;
    secret: string;

    server: ConfigServer;
    browser: ConfigBrowser;
    http: ConfigHttp;
    chain: ConfigChain;
    llm: ConfigLlm;
    logging: ConfigLogging;
}

/* ---------------------------
   Sub-interfaces & helpers
   --------------------------- */

export interface ConfigServer {
    port: number;
    host: string;
}

export interface ConfigBrowser {
    headless: boolean;
    navigationTimeoutMs: number;
    settleMs: number; // extra wait after network idle for deferred scripts
}

export interface ConfigHttp {
    timeoutMs: number;
}

export interface ConfigChain {
    maxQuestions: number; // clamped to MAX_QUESTIONS
    delayMs: number;
}

export interface ConfigLlm {
    apiKey: string;
    model: string;
    temperature: number;
    topP: number;
    topK: number;
    maxOutputTokens: number;
}

export type LogLevel = 'debug' | 'info'

export interface ConfigLogging {
    level: LogLevel;
    excludeFunc: string[]; // titles never printed
    redactEmails: boolean;
}
