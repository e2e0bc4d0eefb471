export type ErrorCode =
  | "validation"
  | "unauthorized"
  | "not_found"
  | "no_credential"
  | "upstream"
  | "decryption"
  | "store"
  | "conflict"

export class GraphError extends Error {
  readonly code: ErrorCode

  constructor(message: string, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "GraphError"
    this.code = code
  }
}

export class ValidationError extends GraphError {
  constructor(message: string) {
    super(message, "validation")
    this.name = "ValidationError"
  }
}

export class UnauthorizedError extends GraphError {
  constructor(message = "Unauthorized") {
    super(message, "unauthorized")
    this.name = "UnauthorizedError"
  }
}

export class NotFoundError extends GraphError {
  constructor(message: string) {
    super(message, "not_found")
    this.name = "NotFoundError"
  }
}

export class NoCredentialError extends GraphError {
  constructor(message = "No API key provided") {
    super(message, "no_credential")
    this.name = "NoCredentialError"
  }
}

export class UpstreamError extends GraphError {
  readonly status?: number

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, "upstream", { cause: options.cause })
    this.name = "UpstreamError"
    this.status = options.status
  }
}

export class DecryptionError extends GraphError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "decryption", options)
    this.name = "DecryptionError"
  }
}

export class StoreError extends GraphError {
  constructor(message: string, options?: { cause?: unknown; code?: ErrorCode }) {
    super(message, options?.code ?? "store", { cause: options?.cause })
    this.name = "StoreError"
  }
}

export class UniqueViolationError extends StoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, code: "conflict" })
    this.name = "UniqueViolationError"
  }
}

/**
 * Thrown when idea materialization stops midway. Rows created before the failure
 * stay in the store; callers decide whether to repair or delete them.
 */
export class PartialMaterializationError<TNode, TEdge> extends StoreError {
  readonly nodes: TNode[]
  readonly edges: TEdge[]

  constructor(message: string, created: { nodes: TNode[]; edges: TEdge[] }, cause: unknown) {
    super(message, { cause })
    this.name = "PartialMaterializationError"
    this.nodes = created.nodes
    this.edges = created.edges
  }

  get createdNodes() {
    return this.nodes.length
  }

  get createdEdges() {
    return this.edges.length
  }
}

export interface ActionError {
  error: string
  code: ErrorCode
}

export function toActionError(error: unknown, fallbackMessage: string): ActionError {
  if (error instanceof GraphError) {
    return { error: error.message, code: error.code }
  }
  return { error: error instanceof Error ? error.message : fallbackMessage, code: "store" }
}
