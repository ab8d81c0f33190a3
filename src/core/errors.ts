import type { MemoryEvent } from './types.js'

export class AgentRecallError extends Error {
  constructor(
    message: string,
    public code: string,
    cause?: unknown,
  ) {
    super(message)
    this.name = 'AgentRecallError'
    if (cause) this.cause = cause
  }
}

export class InvalidArgumentError extends AgentRecallError {
  constructor(message: string, code: string = 'INVALID_ARGUMENT') {
    super(message, code)
    this.name = 'InvalidArgumentError'
  }
}

export class InvalidEventKindError extends InvalidArgumentError {
  constructor(public kind: string) {
    super(`Invalid event kind: ${kind}`, 'INVALID_EVENT_KIND')
    this.name = 'InvalidEventKindError'
  }
}

export class NotFoundError extends AgentRecallError {
  constructor(message: string) {
    super(message, 'NOT_FOUND')
    this.name = 'NotFoundError'
  }
}

// `event` is set when the in-memory mutation succeeded but durability did not
export class IOFailureError extends AgentRecallError {
  constructor(
    message: string,
    cause?: unknown,
    public event: MemoryEvent | null = null,
  ) {
    super(message, 'IO_FAILURE', cause)
    this.name = 'IOFailureError'
  }
}

export class StorageError extends AgentRecallError {
  constructor(message: string, cause?: unknown) {
    super(message, 'STORAGE_ERROR', cause)
    this.name = 'StorageError'
  }
}

export class EmbeddingError extends AgentRecallError {
  constructor(message: string, cause?: unknown) {
    super(message, 'EMBEDDING_ERROR', cause)
    this.name = 'EmbeddingError'
  }
}

export class GenerationUnavailableError extends AgentRecallError {
  constructor(message: string, cause?: unknown) {
    super(message, 'GENERATION_UNAVAILABLE', cause)
    this.name = 'GenerationUnavailableError'
  }
}

export class GenerationTimeoutError extends AgentRecallError {
  constructor(message: string, cause?: unknown) {
    super(message, 'GENERATION_TIMEOUT', cause)
    this.name = 'GenerationTimeoutError'
  }
}
