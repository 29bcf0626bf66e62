import * as XLSX from 'xlsx'

import type { Cell, Table } from '../interface/NormalizedData.js'

const NUMERIC = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/

function toCell(value: unknown): Cell {
    if (value === null || value === undefined) return null
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value
    if (value instanceof Date) return value.toISOString()
    return String(value)
}

function inferCell(value: Cell): Cell {
    if (typeof value !== 'string') return value
    const trimmed = value.trim()
    if (trimmed === '') return null
    return NUMERIC.test(trimmed) ? Number(trimmed) : value
}

/**
 * First row becomes the header. Blank header cells get `Unnamed: i` names and
 * rows are padded with nulls to the widest row.
 */
export function tableFromRows(rows: Cell[][]): Table {
    const [header = [], ...body] = rows
    const width = body.reduce((max, row) => Math.max(max, row.length), header.length)
    const columns: string[] = []
    for (let i = 0; i < width; i++) {
        const name = header[i]
        columns.push(name === null || name === undefined || String(name).trim() === '' ? `Unnamed: ${i}` : String(name))
    }
    return {
        columns,
        rows: body.map(row => columns.map((_, i) => row[i] ?? null))
    }
}

function firstSheetRows(workbook: XLSX.WorkBook): Cell[][] {
    const name = workbook.SheetNames[0]
    const sheet = name === undefined ? undefined : workbook.Sheets[name]
    if (!sheet) return []
    const raw = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: null, blankrows: false })
    return raw.map(row => row.map(toCell))
}

/**
 * CSV is read as text (UTF-8) with every value kept raw, then numeric-looking cells become numbers.
 */
export function parseCsv(bytes: Buffer): Table {
    const workbook = XLSX.read(bytes.toString('utf-8'), { type: 'string', raw: true })
    const rows = firstSheetRows(workbook).map(row => row.map(inferCell))
    return tableFromRows(rows)
}

export function parseSpreadsheet(bytes: Buffer): Table {
    const workbook = XLSX.read(bytes, { type: 'buffer', cellDates: true })
    return tableFromRows(firstSheetRows(workbook))
}

export interface RenderOptions {
    maxRows?: number
    maxCols?: number
}

function cellText(value: Cell): string {
    if (value === null) return 'NaN'
    if (typeof value === 'boolean') return value ? 'True' : 'False'
    return String(value)
}

function pickIndices(total: number, max: number | undefined): Array<number | null> {
    const all = Array.from({ length: total }, (_, i) => i)
    if (max === undefined || total <= max) return all
    const head = Math.ceil(max / 2)
    const tail = Math.floor(max / 2)
    // null marks the elided span
    return [...all.slice(0, head), null, ...all.slice(total - tail)]
}

/**
 * Aligned plain-text rendering with a row index column, right-aligned cells and `...` marking
 * elided rows or columns once the limits are exceeded.
 */
export function renderTable(table: Table, options: RenderOptions = {}): string {
    if (table.rows.length === 0) {
        return `Empty DataFrame\nColumns: [${table.columns.join(', ')}]\nIndex: []`
    }

    const colIdx = pickIndices(table.columns.length, options.maxCols)
    const rowIdx = pickIndices(table.rows.length, options.maxRows)

    const header = ['', ...colIdx.map(c => c === null ? '...' : table.columns[c] ?? '')]
    const body = rowIdx.map(r => {
        if (r === null) return ['...', ...colIdx.map(() => '...')]
        const row = table.rows[r] ?? []
        return [String(r), ...colIdx.map(c => c === null ? '...' : cellText(row[c] ?? null))]
    })

    const grid = [header, ...body]
    const widths = header.map((_, i) => Math.max(...grid.map(line => (line[i] ?? '').length)))

    return grid
        .map(line => line
            .map((text, i) => i === 0 ? text.padEnd(widths[i] ?? 0) : text.padStart(widths[i] ?? 0))
            .join('  ')
            .trimEnd())
        .join('\n')
}
