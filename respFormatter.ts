import { CRLF, NULL_LENGTH, RESP_TYPE } from './constants'
import { ConversionError } from './errors'
import type { ByteStream } from './types'

/** One wire line, without its terminator. */
export type Line = string | Buffer

function assertSingleLine(kind: string, text: string): void {
  if (text.includes('\r') || text.includes('\n')) {
    throw new ConversionError(`${kind} must not contain CR or LF`)
  }
}

export class RESPFormatter {
  static formatBulkString(bytes: Buffer | null): Line[] {
    if (bytes === null) {
      return [`${RESP_TYPE.BULK_STRING}${NULL_LENGTH}`]
    }
    return [`${RESP_TYPE.BULK_STRING}${bytes.length}`, bytes]
  }

  static formatArrayHeader(count: number): Line {
    return `${RESP_TYPE.ARRAY}${count}`
  }

  static formatError(message: string): Line {
    assertSingleLine('Error text', message)
    return `${RESP_TYPE.ERROR}${message}`
  }

  static formatInteger(num: number | bigint): Line {
    return `${RESP_TYPE.INTEGER}${num}`
  }

  static formatSimpleString(str: string): Line {
    assertSingleLine('Status text', str)
    return `${RESP_TYPE.SIMPLE_STRING}${str}`
  }
}

/**
 * Writes each line followed by CRLF. A command spans several lines, so this
 * never flushes; the caller flushes once per batch.
 */
export function writeLines(stream: ByteStream, lines: Line[]): void {
  for (const line of lines) {
    stream.write(line)
    stream.write(CRLF)
  }
}
