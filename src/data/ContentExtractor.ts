import type { AxiosResponse } from 'axios'

import type { QuizAgent } from '../index.js'
import type { JsonValue } from '../interface/Quiz.js'
import type { NormalizedData } from '../interface/NormalizedData.js'
import { IMAGE_EXTENSIONS } from '../constants.js'
import { DownloadFailure, errorMessage } from '../util/Errors.js'
import { Err, Ok, type Result } from '../util/Result.js'
import { extractPdf, openPdf, type PdfOpener } from './PdfExtractor.js'
import { parseCsv, parseSpreadsheet } from './Tabular.js'

export type SourceKind = 'pdf' | 'csv' | 'json' | 'excel' | 'image' | 'text'

function urlPath(url: string): string {
    try {
        return new URL(url).pathname.toLowerCase()
    } catch {
        return url.toLowerCase().split(/[?#]/)[0] ?? ''
    }
}

function headerValue(headers: AxiosResponse['headers'], name: string): string {
    for (const [key, value] of Object.entries(headers)) {
        if (key.toLowerCase() === name && value !== undefined && value !== null) {
            return String(value).toLowerCase()
        }
    }
    return ''
}

/**
 * Content type first, URL suffix second, in fixed precedence: PDF, CSV, JSON, Excel, image, text.
 */
export function classifySource(contentType: string, url: string): SourceKind {
    const type = contentType.toLowerCase()
    const file = urlPath(url)

    if (type.includes('pdf') || file.endsWith('.pdf')) return 'pdf'
    if (type.includes('csv') || file.endsWith('.csv')) return 'csv'
    if (type.includes('json') || file.endsWith('.json')) return 'json'
    if (type.includes('excel') || type.includes('spreadsheet') || file.endsWith('.xlsx') || file.endsWith('.xls')) return 'excel'
    if (type.startsWith('image/') || IMAGE_EXTENSIONS.some(ext => file.endsWith(ext))) return 'image'
    return 'text'
}

function imageMimeType(contentType: string, url: string): string {
    if (contentType.startsWith('image/')) return contentType.split(';')[0]?.trim() ?? contentType
    const file = urlPath(url)
    if (file.endsWith('.png')) return 'image/png'
    if (file.endsWith('.gif')) return 'image/gif'
    if (file.endsWith('.webp')) return 'image/webp'
    return 'image/jpeg'
}

function parseJson(bytes: Buffer): JsonValue {
    const parsed: JsonValue = JSON.parse(bytes.toString('utf-8'))
    return parsed
}

export default class ContentExtractor {
    private agent: QuizAgent
    private openPdf: PdfOpener

    constructor(agent: QuizAgent, pdfOpener: PdfOpener = openPdf) {
        this.agent = agent
        this.openPdf = pdfOpener
    }

    /**
     * Fetch a data resource once and normalize it. Network, HTTP and decode errors come back as a
     * DownloadFailure; PDF extraction itself never fails once the bytes are in.
     */
    async download(url: string): Promise<Result<NormalizedData, DownloadFailure>> {
        this.agent.log('chain', 'DOWNLOAD', `Downloading from: ${url}`)

        let response: AxiosResponse<ArrayBuffer>
        try {
            response = await this.agent.axios.getBytes(url)
        } catch (error) {
            return Err(new DownloadFailure(`Failed to download data: ${errorMessage(error)}`, error))
        }

        const bytes = Buffer.from(response.data)
        const contentType = headerValue(response.headers, 'content-type')
        const kind = classifySource(contentType, url)
        this.agent.log('chain', 'DOWNLOAD', `Detected ${kind.toUpperCase()} format (${bytes.length} bytes)`)

        try {
            return Ok(await this.normalize(kind, bytes, contentType, url))
        } catch (error) {
            return Err(new DownloadFailure(`Failed to download data: ${errorMessage(error)}`, error))
        }
    }

    private async normalize(kind: SourceKind, bytes: Buffer, contentType: string, url: string): Promise<NormalizedData> {
        switch (kind) {
            case 'pdf': {
                const { text, tables } = await extractPdf(bytes, this.openPdf)
                return { kind: 'document', text, tables }
            }
            case 'csv':
                return { kind: 'tabular', table: parseCsv(bytes) }
            case 'json':
                return { kind: 'structured', value: parseJson(bytes) }
            case 'excel':
                return { kind: 'tabular', table: parseSpreadsheet(bytes) }
            case 'image':
                return { kind: 'image', mimeType: imageMimeType(contentType, url), data: bytes }
            case 'text':
                return { kind: 'text', text: bytes.toString('utf-8') }
        }
    }
}
