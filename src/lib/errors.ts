export class NamespaceTreeError extends Error {
  constructor(message: string, readonly reason?: unknown) {
    super(message)
    this.name = new.target.name
  }
}

/**
 * Listing namespaces failed, including loading the kubeconfig that precedes it.
 */
export class FetchError extends NamespaceTreeError {}

export class SerializationError extends NamespaceTreeError {}

export class ConfigError extends NamespaceTreeError {}

type ApiErrorLike = {
  message?: unknown
  body?: { message?: unknown }
  response?: { body?: { message?: unknown } }
}

const isObject = (value: unknown): value is ApiErrorLike =>
  typeof value === 'object' && value !== null

export const getErrorMessage = (err: unknown): string => {
  if (!isObject(err)) {
    return String(err)
  }
  const candidates = [
    err.body?.message,
    err.response?.body?.message,
    err.message
  ]
  const message = candidates.find(
    (candidate): candidate is string =>
      typeof candidate === 'string' && candidate.length > 0
  )

  return message ?? String(err)
}
