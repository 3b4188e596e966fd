export type RespValue =
  | { type: 'Nil' } // For '$-1' and '*-1'
  | { type: 'Integer'; value: number | bigint } // For ':' prefixed numbers
  | { type: 'BulkString'; value: Buffer } // For '$' prefixed strings
  | { type: 'SimpleString'; value: string } // For '+' prefixed strings
  | { type: 'Array'; value: RespValue[] } // For '*' prefixed arrays

export type RequestArgument = string | number | bigint | Uint8Array

/** A command is the ordered list of its arguments, name first. */
export type Command = RequestArgument[]

/**
 * The byte endpoint a connection sits on.
 *
 * `write` only buffers; nothing is guaranteed to reach the peer until `flush`
 * resolves. `read` and `readLine` resolve to `null` when the stream ends
 * before the requested data is available.
 */
export interface ByteStream {
  write(chunk: Uint8Array | string): void
  read(length: number): Promise<Buffer | null>
  /** Resolves to the line without its terminator. */
  readLine(terminator: string): Promise<Buffer | null>
  flush(): Promise<void>
  close(): void | Promise<void>
  isClosed(): boolean
}

/**
 * Implemented by values that know their own RESP representation. The result
 * is encoded in place of the value, so it may be a string, buffer, integer,
 * array or another Encodable.
 */
export interface Encodable {
  toResp(): unknown
}
