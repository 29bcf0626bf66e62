import type { DocumentTable, Table } from '../interface/NormalizedData.js'
import { PdfExtractionFailure, errorMessage } from '../util/Errors.js'
import { log } from '../util/Logger.js'
import { Err, Ok, type Result } from '../util/Result.js'

export interface PdfTextItem {
    str: string
    x: number
    y: number
    width: number
}

/**
 * The slice of a PDF parser the extractor needs. Pages are 1-based.
 */
export interface PdfSource {
    numPages: number
    pageItems(pageNumber: number): Promise<PdfTextItem[]>
    pageText(pageNumber: number): Promise<string>
    close(): Promise<void>
}

export type PdfOpener = (bytes: Buffer) => Promise<PdfSource>

export interface PdfExtraction {
    text: string
    tables: DocumentTable[]
}

export interface PdfLine {
    y: number
    cells: string[]
}

// Items whose baselines differ by at most this many units share a line
const LINE_TOLERANCE = 2
// Horizontal gap that separates two cells of a line rather than two words
const CELL_GAP = 10

type PdfJs = typeof import('pdfjs-dist')

let pdfjsPromise: Promise<PdfJs> | null = null
function loadPdfJs(): Promise<PdfJs> {
    // legacy build: no DOM, polyfilled for Node
    pdfjsPromise ??= import('pdfjs-dist/legacy/build/pdf.mjs')
    return pdfjsPromise
}

interface RawTextItem {
    str: string
    transform: number[]
    width: number
    hasEOL?: boolean
}

function isTextItem(item: unknown): item is RawTextItem {
    return typeof item === 'object' && item !== null
        && 'str' in item && typeof item.str === 'string'
        && 'transform' in item && Array.isArray(item.transform)
        && 'width' in item && typeof item.width === 'number'
}

/**
 * Open a PDF with pdf.js (no worker thread, no font loading).
 */
export async function openPdf(bytes: Buffer): Promise<PdfSource> {
    const pdfjs = await loadPdfJs()
    const doc = await pdfjs.getDocument({
        data: new Uint8Array(bytes),
        useWorkerFetch: false,
        isEvalSupported: false,
        disableFontFace: true
    }).promise

    const rawItems = async (pageNumber: number): Promise<RawTextItem[]> => {
        const page = await doc.getPage(pageNumber)
        const content = await page.getTextContent()
        const items: RawTextItem[] = []
        for (const item of content.items) {
            if (isTextItem(item)) items.push(item)
        }
        return items
    }

    return {
        numPages: doc.numPages,
        async pageItems(pageNumber) {
            const items = await rawItems(pageNumber)
            return items.map(item => ({
                str: item.str,
                x: item.transform[4] ?? 0,
                y: item.transform[5] ?? 0,
                width: item.width
            }))
        },
        async pageText(pageNumber) {
            const items = await rawItems(pageNumber)
            return items.map(item => item.str + (item.hasEOL ? '\n' : '')).join('')
        },
        async close() {
            await doc.destroy()
        }
    }
}

/**
 * Rebuild visual lines from positioned text items: top to bottom, left to right. Within a line a
 * gap of CELL_GAP or more starts a new cell.
 */
export function groupLines(items: PdfTextItem[]): PdfLine[] {
    const visible = items
        .filter(item => item.str.trim() !== '')
        .sort((a, b) => (b.y - a.y) || (a.x - b.x))

    const rows: PdfTextItem[][] = []
    for (const item of visible) {
        const current = rows[rows.length - 1]
        const anchor = current?.[0]
        if (current && anchor && Math.abs(anchor.y - item.y) <= LINE_TOLERANCE) {
            current.push(item)
        } else {
            rows.push([item])
        }
    }

    return rows.map(row => {
        const sorted = [...row].sort((a, b) => a.x - b.x)
        const cells: string[] = []
        let prev: PdfTextItem | undefined
        for (const item of sorted) {
            const text = item.str.trim()
            if (!prev) {
                cells.push(text)
            } else {
                const gap = item.x - (prev.x + prev.width)
                if (gap >= CELL_GAP) {
                    cells.push(text)
                } else {
                    const last = cells.length - 1
                    cells[last] = `${cells[last] ?? ''}${gap > 1 ? ' ' : ''}${text}`
                }
            }
            prev = item
        }
        return { y: sorted[0]?.y ?? 0, cells }
    })
}

/**
 * Runs of two or more consecutive lines that each have at least two cells.
 */
export function findTableCandidates(lines: PdfLine[]): string[][][] {
    const candidates: string[][][] = []
    let run: string[][] = []
    const flush = () => {
        if (run.length >= 2) candidates.push(run)
        run = []
    }
    for (const line of lines) {
        if (line.cells.length >= 2) {
            run.push(line.cells)
        } else {
            flush()
        }
    }
    flush()
    return candidates
}

/**
 * First row is the header. Throws when a header cell is blank or a data row does not have one cell per column.
 */
export function buildTable(rows: string[][]): Table {
    const [header, ...data] = rows
    if (!header || header.length === 0) {
        throw new Error('table has no header row')
    }
    if (header.some(name => name.trim() === '')) {
        throw new Error('table header has a blank column name')
    }
    data.forEach((row, i) => {
        if (row.length !== header.length) {
            throw new Error(`${header.length} columns passed, row ${i + 1} has ${row.length}`)
        }
    })
    return { columns: [...header], rows: data.map(row => [...row]) }
}

async function extractWithLayout(source: PdfSource): Promise<Result<PdfExtraction, PdfExtractionFailure>> {
    const textParts: string[] = []
    const tables: DocumentTable[] = []

    try {
        for (let pageNum = 1; pageNum <= source.numPages; pageNum++) {
            const lines = groupLines(await source.pageItems(pageNum))

            const text = lines.map(line => line.cells.join(' ')).join('\n')
            if (text) {
                textParts.push(`=== Page ${pageNum} ===\n${text}`)
            }

            findTableCandidates(lines).forEach((rows, tableIdx) => {
                try {
                    tables.push({ page: pageNum, tableNumber: tableIdx + 1, table: buildTable(rows) })
                    log('chain', 'PDF', `Extracted table ${tableIdx + 1} from page ${pageNum}`, 'debug')
                } catch (error) {
                    log('chain', 'PDF', `Could not parse table ${tableIdx + 1} on page ${pageNum}: ${errorMessage(error)}`, 'warn')
                }
            })
        }
    } catch (error) {
        return Err(new PdfExtractionFailure(`Layout extraction failed: ${errorMessage(error)}`, error))
    }

    return Ok({ text: textParts.join('\n\n'), tables })
}

async function closeQuietly(source: PdfSource): Promise<void> {
    try {
        await source.close()
    } catch (error) {
        log('chain', 'PDF', `Closing PDF failed: ${errorMessage(error)}`, 'warn')
    }
}

/**
 * Text and tables of a PDF. Tries the layout-aware pass first and, if it fails anywhere, a plain
 * text pass without tables. If that fails as well, whatever text it collected is returned.
 * Never throws.
 */
export async function extractPdf(bytes: Buffer, open: PdfOpener = openPdf): Promise<PdfExtraction> {
    let primary: Result<PdfExtraction, PdfExtractionFailure>
    try {
        const source = await open(bytes)
        try {
            primary = await extractWithLayout(source)
        } finally {
            await closeQuietly(source)
        }
    } catch (error) {
        primary = Err(new PdfExtractionFailure(`Could not open PDF: ${errorMessage(error)}`, error))
    }

    if (primary.ok) {
        return primary.value
    }

    log('chain', 'PDF', `${primary.error.message}; falling back to plain text`, 'warn')

    const textParts: string[] = []
    try {
        const source = await open(bytes)
        try {
            for (let pageNum = 1; pageNum <= source.numPages; pageNum++) {
                const text = await source.pageText(pageNum)
                if (text) {
                    textParts.push(`=== Page ${pageNum} ===\n${text}`)
                }
            }
        } finally {
            await closeQuietly(source)
        }
    } catch (error) {
        log('chain', 'PDF', `Plain text extraction also failed: ${errorMessage(error)}`, 'warn')
    }

    return { text: textParts.join('\n\n'), tables: [] }
}
