// Shared types between the storage, agent and core packages

export type TurnRole = 'user' | 'assistant'

export type ResponseType = 'text' | 'table' | 'chart' | 'error'

export type SourceKind = 'structured' | 'document' | 'chart'

export interface SourceAttribution {
  source_kind: SourceKind
  source_ref: string
  score?: number
}

export interface TokenUsage {
  input: number
  output: number
  total: number
}

export type CellValue = string | number | boolean | null

export type DataRow = Record<string, CellValue>

export interface TableData {
  columns: string[]
  rows: DataRow[]
}

export type ChartKind = 'bar' | 'line'

export interface ChartSeries {
  name: string
  values: number[]
}

export interface ChartSpec {
  chart_type: ChartKind
  title: string
  x: { field: string; labels: string[] }
  y: { field: string }
  series: ChartSeries[]
}

export interface TurnPayload {
  table?: TableData
  chart?: ChartSpec
}

/**
 * One user query or one assistant response within a thread.
 * `turn_id` is assigned by the persistent store and increases within a thread.
 */
export interface Turn {
  turn_id: number
  thread_id: string
  user_id: string | null
  role: TurnRole
  content: string
  response_type: ResponseType
  source_attributions: SourceAttribution[]
  token_usage: TokenUsage
  payload: TurnPayload | null
  timestamp: string
}

/**
 * A turn before the persistent store has assigned its id
 */
export type NewTurn = Omit<Turn, 'turn_id'>

export interface AssistantReply {
  content: string
  response_type: ResponseType
  source_attributions: SourceAttribution[]
  payload: TurnPayload | null
}

// Statistics

export interface ThreadStats {
  thread_id: string
  total_turns: number
  user_turns: number
  assistant_turns: number
  first_turn_at: string | null
  last_turn_at: string | null
}

export interface UserTokenStats {
  user_id: string
  total_queries: number
  total_input_tokens: number
  total_output_tokens: number
  total_tokens: number
  avg_tokens_per_query: number
}

export interface TokenActivity {
  thread_id: string
  input_tokens: number
  output_tokens: number
  total_tokens: number
  timestamp: string
}

// Logging

export interface Logger {
  debug(message: string, context?: object): void
  info(message: string, context?: object): void
  warn(message: string, context?: object): void
  error(message: string, context?: object): void
}

/**
 * Default console logger. `debug` is silent.
 */
export const consoleLogger: Logger = {
  debug: () => {},
  info: (message, context) => console.info(`[INFO] ${message}`, context ?? ''),
  warn: (message, context) => console.warn(`[WARN] ${message}`, context ?? ''),
  error: (message, context) => console.error(`[ERROR] ${message}`, context ?? ''),
}
