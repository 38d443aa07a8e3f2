import { StorageError, errorMessage } from '@tickbase/contracts'

/**
 * Runs a storage operation, converting driver failures into StorageError.
 * A StorageError raised inside passes through unchanged.
 */
export async function withStorageError<T>(
  operation: string,
  fn: () => Promise<T>,
  data: Record<string, unknown> = {}
): Promise<T> {
  try {
    return await fn()
  } catch (error) {
    if (error instanceof StorageError) {
      throw error
    }
    const cause = errorMessage(error)
    throw new StorageError(`${operation} failed: ${cause}`, { ...data, operation, cause })
  }
}
