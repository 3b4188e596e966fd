import type { ResolvedOptions } from './config'
import { ConversionError } from './errors'
import { type Line, RESPFormatter, writeLines } from './respFormatter'
import type { ByteStream, Encodable, RequestArgument } from './types'

export function toBytes(argument: RequestArgument): Buffer {
  if (Buffer.isBuffer(argument)) {
    return argument
  }
  if (argument instanceof Uint8Array) {
    return Buffer.from(argument.buffer, argument.byteOffset, argument.byteLength)
  }
  if (typeof argument === 'string') {
    return Buffer.from(argument, 'utf8')
  }
  return Buffer.from(String(argument), 'utf8')
}

export function isEncodable(value: unknown): value is Encodable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'toResp' in value &&
    typeof value.toResp === 'function'
  )
}

function describe(value: unknown): string {
  if (value === null) {
    return 'null'
  }
  if (typeof value === 'number') {
    return Number.isInteger(value) ? 'unsafe integer' : 'non-integer number'
  }
  return typeof value
}

export class Encoder {
  private requests = 0

  constructor(
    private stream: ByteStream,
    private options: Pick<
      ResolvedOptions,
      'maxConversionDepth' | 'maxNestingDepth'
    >,
  ) {}

  /** Number of request headers written so far. */
  get requestCount(): number {
    return this.requests
  }

  /**
   * Writes a command as an array of bulk strings. The server only accepts bulk
   * strings in requests, so numbers are sent as their decimal text.
   */
  encodeRequest(args: readonly RequestArgument[]): void {
    writeLines(this.stream, [RESPFormatter.formatArrayHeader(args.length)])

    // Counted once the header is out, whether or not the arguments make it
    this.requests++

    for (const arg of args) {
      writeLines(this.stream, RESPFormatter.formatBulkString(toBytes(arg)))
    }
  }

  /**
   * Writes a single value. Nothing is written if any part of the value fails
   * to convert.
   */
  encodeValue(value: unknown): void {
    const lines: Line[] = []
    this.frame(value, 0, 0, lines)
    writeLines(this.stream, lines)
  }

  encodeStatus(text: string): void {
    writeLines(this.stream, [RESPFormatter.formatSimpleString(text)])
  }

  encodeError(text: string): void {
    writeLines(this.stream, [RESPFormatter.formatError(text)])
  }

  encodeNil(): void {
    writeLines(this.stream, RESPFormatter.formatBulkString(null))
  }

  /**
   * `conversions` counts toResp() calls along the current path and `nesting`
   * counts enclosing arrays. Arrays share the decoder's nesting limit.
   */
  private frame(
    value: unknown,
    conversions: number,
    nesting: number,
    lines: Line[],
  ): void {
    if (typeof value === 'string' || value instanceof Uint8Array) {
      lines.push(...RESPFormatter.formatBulkString(toBytes(value)))
    } else if (Array.isArray(value)) {
      if (nesting >= this.options.maxNestingDepth) {
        throw new ConversionError(
          `Unconvertible value: array nesting exceeds ${this.options.maxNestingDepth} levels`,
        )
      }
      const items: unknown[] = value
      lines.push(RESPFormatter.formatArrayHeader(items.length))
      for (const item of items) {
        this.frame(item, conversions, nesting + 1, lines)
      }
    } else if (
      typeof value === 'bigint' ||
      (typeof value === 'number' && Number.isSafeInteger(value))
    ) {
      lines.push(RESPFormatter.formatInteger(value))
    } else if (isEncodable(value)) {
      if (conversions >= this.options.maxConversionDepth) {
        throw new ConversionError(
          `Unconvertible value: more than ${this.options.maxConversionDepth} chained conversions`,
        )
      }
      const converted = value.toResp()
      if (converted === value) {
        throw new ConversionError('Unconvertible value: toResp() returned itself')
      }
      this.frame(converted, conversions + 1, nesting, lines)
    } else {
      throw new ConversionError(`Cannot encode value of type ${describe(value)}`)
    }
  }
}
