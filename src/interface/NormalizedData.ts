import type { JsonValue } from './Quiz.js'

export type Cell = string | number | boolean | null

export interface Table {
    columns: string[]
    rows: Cell[][]
}

export interface DocumentTable {
    page: number
    tableNumber: number // 1-based position among the table candidates found on the page
    table: Table
}

export type NormalizedData =
    | { kind: 'tabular'; table: Table }
    | { kind: 'structured'; value: JsonValue }
    | { kind: 'document'; text: string; tables: DocumentTable[] }
    | { kind: 'text'; text: string }
    | { kind: 'image'; mimeType: string; data: Buffer }
