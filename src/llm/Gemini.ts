import { GoogleGenAI, type GenerateContentConfig, type GenerateContentResponse } from '@google/genai'

import type { ConfigLlm } from '../interface/Config.js'
import { ModelQueryFailure, errorMessage } from '../util/Errors.js'
import { extractJsonPayload, type LanguageModel, type QueryOptions } from './LanguageModel.js'

/**
 * Gemini-backed LanguageModel. One attempt per call; an error or an empty reply is a ModelQueryFailure.
 */
export class GeminiClient implements LanguageModel {
    private client: GoogleGenAI
    private settings: ConfigLlm

    constructor(settings: ConfigLlm) {
        if (!settings.apiKey) {
            throw new Error('Missing GEMINI_API_KEY for Gemini integration.')
        }
        this.settings = settings
        this.client = new GoogleGenAI({ apiKey: settings.apiKey })
    }

    get model(): string {
        return this.settings.model
    }

    private generationConfig(responseMimeType?: string): GenerateContentConfig {
        return {
            temperature: this.settings.temperature,
            topP: this.settings.topP,
            topK: this.settings.topK,
            maxOutputTokens: this.settings.maxOutputTokens,
            ...(responseMimeType ? { responseMimeType } : {})
        }
    }

    private readText(response: GenerateContentResponse): string {
        const text = response.text
        if (!text || !text.trim()) {
            throw new ModelQueryFailure('Empty response from Gemini')
        }
        return text
    }

    async query(prompt: string, options: QueryOptions = {}): Promise<string> {
        const json = options.responseFormat === 'json'
        try {
            const response = await this.client.models.generateContent({
                model: this.settings.model,
                contents: prompt,
                config: this.generationConfig(json ? 'application/json' : undefined)
            })
            const text = this.readText(response)
            return json ? extractJsonPayload(text) : text
        } catch (error) {
            throw new ModelQueryFailure(`Gemini API query failed: ${errorMessage(error)}`, error)
        }
    }

    async analyzeImage(image: Buffer, mimeType: string, prompt: string): Promise<string> {
        try {
            const response = await this.client.models.generateContent({
                model: this.settings.model,
                contents: [{
                    role: 'user',
                    parts: [
                        { text: prompt },
                        { inlineData: { mimeType, data: image.toString('base64') } }
                    ]
                }],
                config: this.generationConfig()
            })
            return this.readText(response)
        } catch (error) {
            throw new ModelQueryFailure(`Vision analysis failed: ${errorMessage(error)}`, error)
        }
    }
}
