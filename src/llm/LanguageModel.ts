export type ResponseFormat = 'text' | 'json'

export interface QueryOptions {
    // 'json' asks for a JSON document and strips markdown fencing from the reply
    responseFormat?: ResponseFormat
}

/**
 * Generative text model as the solver sees it: a prompt in, raw text out.
 * Implementations throw ModelQueryFailure on an erroring or empty response.
 */
export interface LanguageModel {
    readonly model: string
    query(prompt: string, options?: QueryOptions): Promise<string>
    analyzeImage(image: Buffer, mimeType: string, prompt: string): Promise<string>
}

/**
 * Pull a JSON payload out of a model reply: a ```json fence first, any ``` fence second,
 * and when the result still does not decode, the outermost {...} span. Best effort; the
 * returned text is not guaranteed to be valid JSON.
 */
export function extractJsonPayload(text: string): string {
    let result = text
    if (result.includes('```json')) {
        result = (result.split('```json')[1] ?? '').split('```')[0]?.trim() ?? ''
    } else if (result.includes('```')) {
        result = (result.split('```')[1] ?? '').split('```')[0]?.trim() ?? ''
    }

    try {
        JSON.parse(result)
    } catch {
        const match = result.match(/\{[\s\S]*\}/)
        if (match) {
            result = match[0]
        }
    }
    return result
}
