import type { ResolvedOptions } from './config'
import { CRLF, NULL_LENGTH, RESP_TYPE } from './constants'
import {
  ProtocolError,
  ServerError,
  UnexpectedEndOfStreamError,
} from './errors'
import type { ByteStream, RespValue } from './types'

const INTEGER_PATTERN = /^-?\d+$/
const INT64_MIN = -(2n ** 63n)
const INT64_MAX = 2n ** 63n - 1n

/**
 * Parses a decimal integer field. Safe integers come back as numbers, larger
 * 64-bit values as bigints.
 */
export function parseInteger(payload: string): number | bigint {
  if (!INTEGER_PATTERN.test(payload)) {
    throw new ProtocolError(`Invalid integer: ${JSON.stringify(payload)}`)
  }
  const num = Number(payload)
  if (Number.isSafeInteger(num)) {
    return num
  }
  const big = BigInt(payload)
  if (big < INT64_MIN || big > INT64_MAX) {
    throw new ProtocolError(`Integer out of range: ${payload}`)
  }
  return big
}

function parseLength(kind: string, payload: string): number {
  const length = parseInteger(payload)
  if (typeof length !== 'number' || length < NULL_LENGTH) {
    throw new ProtocolError(`Invalid ${kind}: ${payload}`)
  }
  return length
}

export class Decoder {
  constructor(
    private stream: ByteStream,
    private options: Pick<ResolvedOptions, 'maxNestingDepth' | 'maxBulkLength'>,
  ) {}

  /**
   * Reads exactly one reply. Error replies are thrown as ServerError rather
   * than returned.
   */
  async decodeValue(depth = 0): Promise<RespValue> {
    const line = await this.readLine()

    const marker = line.length > 0 ? String.fromCharCode(line[0]) : ''
    // Numeric fields keep every byte for error messages; text is UTF-8 and
    // invalid sequences become U+FFFD
    const payload = line.subarray(1).toString('latin1')
    const text = (): string => line.subarray(1).toString('utf8')

    switch (marker) {
      case RESP_TYPE.BULK_STRING: {
        const length = parseLength('bulk length', payload)
        if (length === NULL_LENGTH) {
          return { type: 'Nil' }
        }
        if (length > this.options.maxBulkLength) {
          throw new ProtocolError(
            `Bulk length ${length} exceeds limit of ${this.options.maxBulkLength}`,
          )
        }
        return { type: 'BulkString', value: await this.readData(length) }
      }
      case RESP_TYPE.ARRAY: {
        const count = parseLength('array length', payload)
        // Null array (https://redis.io/docs/reference/protocol-spec/#null-arrays)
        if (count === NULL_LENGTH) {
          return { type: 'Nil' }
        }
        if (depth >= this.options.maxNestingDepth) {
          throw new ProtocolError(
            `Array nesting exceeds ${this.options.maxNestingDepth} levels`,
          )
        }
        const items: RespValue[] = []
        for (let i = 0; i < count; i++) {
          items.push(await this.decodeValue(depth + 1))
        }
        return { type: 'Array', value: items }
      }
      case RESP_TYPE.INTEGER:
        return { type: 'Integer', value: parseInteger(payload) }
      case RESP_TYPE.ERROR:
        throw new ServerError(text())
      case RESP_TYPE.SIMPLE_STRING:
        return { type: 'SimpleString', value: text() }
      default:
        // Queued writes go out before the failure surfaces
        await this.stream.flush()
        throw new ProtocolError(
          `Unsupported reply type ${JSON.stringify(marker)}`,
        )
    }
  }

  private async readLine(): Promise<Buffer> {
    const line = await this.stream.readLine(CRLF)
    if (line === null) {
      throw new UnexpectedEndOfStreamError()
    }
    return line
  }

  /** The declared length excludes the trailing CRLF, which is read and dropped. */
  private async readData(length: number): Promise<Buffer> {
    const data = await this.stream.read(length)
    if (data === null || data.length < length) {
      throw new UnexpectedEndOfStreamError(
        `Expected ${length} bytes of bulk data`,
      )
    }
    const terminator = await this.stream.read(CRLF.length)
    if (terminator === null || terminator.length < CRLF.length) {
      throw new UnexpectedEndOfStreamError('Missing bulk string terminator')
    }
    return data
  }
}
