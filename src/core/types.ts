export type EventKind = 'task' | 'thought' | 'action' | 'observation' | 'answer'

export type EventPayload =
  | { kind: 'task'; title?: string }
  | { kind: 'thought' }
  | { kind: 'action'; tool?: string; input?: string }
  | { kind: 'observation'; tool?: string; success?: boolean }
  | { kind: 'answer'; question?: string }

export interface EventBase {
  id: string
  session_id: string
  timestamp: string
  content: string
  importance: number
  metadata: Record<string, unknown>
  embedding: number[] | null
}

export type MemoryEvent = EventBase & EventPayload

export type EventDraft = EventPayload & {
  content: string
  correction: boolean
  metadata: Record<string, unknown>
}

export interface RecordContext {
  detail?: Record<string, unknown>
  correction?: boolean
  metadata?: Record<string, unknown>
}

export interface Session {
  session_id: string
  created_at: string
  last_active_at: string
  events: MemoryEvent[]
}

export type SessionInfo = Omit<Session, 'events'>

export type SearchMode = 'keyword' | 'semantic' | 'hybrid'

export interface ScoredEvent {
  event: MemoryEvent
  score: number
  keyword_score: number
  semantic_score: number
}

export type MemoryTier = 'short_term' | 'long_term' | 'all'

export interface EventFilter {
  kind?: EventKind
  sessionId?: string
  start?: string
  end?: string
  tier?: MemoryTier
}

export interface MemoryStats {
  session_id: string
  total_entries: number
  counts_by_kind: Record<EventKind, number>
  mean_importance: number
  session_duration_ms: number
  created_at: string | null
  last_active_at: string | null
  long_term_count: number
  long_term_capacity: number
}

export interface EmbeddingProvider {
  embed(text: string): Promise<number[]>
  embedBatch(texts: string[]): Promise<number[][]>
  dimensions(): number
}

export type MetadataValue = string | number | boolean | null

export type MetadataFilter =
  | Record<string, MetadataValue>
  | ((metadata: Record<string, unknown>) => boolean)

export interface IndexHit {
  id: string
  score: number
  text: string
  metadata: Record<string, unknown>
}

export interface Document {
  id?: string
  content: string
  source: string
  metadata: Record<string, unknown>
}

export interface GenerateOptions {
  maxTokens?: number
  temperature?: number
  signal?: AbortSignal
}

export interface Generator {
  generate(prompt: string, context: string | null, options?: GenerateOptions): Promise<string>
}

export type RagStage =
  | 'received'
  | 'retrieved'
  | 'reranked'
  | 'context_built'
  | 'answered'
  | 'failed'

export type RagFailureReason =
  | 'invalid_question'
  | 'empty_corpus'
  | 'embedding_failed'
  | 'generation_unavailable'
  | 'generation_timeout'
  | 'cancelled'

export interface RetrievedChunk {
  id: string
  source: string
  content: string
  similarity: number
  score: number
  metadata: Record<string, unknown>
}

export interface RagAnswered {
  status: 'answered'
  question: string
  answer: string
  confidence: number
  context: string
  sources: RetrievedChunk[]
  stages: RagStage[]
}

export interface RagFailed {
  status: 'failed'
  question: string
  reason: RagFailureReason
  message: string
  stages: RagStage[]
}

export type RagResult = RagAnswered | RagFailed
