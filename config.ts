import { DEFAULT_LIMITS } from './constants'
import { type Logger, silentLogger } from './logger'

export type ConnectionOptions = {
  maxNestingDepth?: number
  maxConversionDepth?: number
  maxBulkLength?: number
  logger?: Logger
}

export type ResolvedOptions = Required<ConnectionOptions>

function positiveInteger(name: string, value: number): number {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`)
  }
  return value
}

export function resolveOptions(options: ConnectionOptions = {}): ResolvedOptions {
  return {
    maxNestingDepth: positiveInteger(
      'maxNestingDepth',
      options.maxNestingDepth ?? DEFAULT_LIMITS.MAX_NESTING_DEPTH,
    ),
    maxConversionDepth: positiveInteger(
      'maxConversionDepth',
      options.maxConversionDepth ?? DEFAULT_LIMITS.MAX_CONVERSION_DEPTH,
    ),
    maxBulkLength: positiveInteger(
      'maxBulkLength',
      options.maxBulkLength ?? DEFAULT_LIMITS.MAX_BULK_LENGTH,
    ),
    logger: options.logger ?? silentLogger,
  }
}
