import type { ByteStream } from './types'

function toBuffer(chunk: Uint8Array | string): Buffer {
  return typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk)
}

/**
 * An in-process ByteStream. Reads are served from scripted input and writes
 * are kept in memory, split into what has been flushed and what is still
 * pending.
 */
export class MemoryStream implements ByteStream {
  private input: Buffer
  private pending: Buffer[] = []
  private output: Buffer[] = []
  private closed = false
  flushCount = 0

  constructor(input: Uint8Array | string = '') {
    this.input = toBuffer(input)
  }

  /** Appends more data for later reads. */
  feed(data: Uint8Array | string): void {
    this.input = Buffer.concat([this.input, toBuffer(data)])
  }

  /** Bytes written but not yet flushed. */
  get pendingOutput(): Buffer {
    return Buffer.concat(this.pending)
  }

  /** Bytes that have been flushed. */
  get flushedOutput(): Buffer {
    return Buffer.concat(this.output)
  }

  /** Unread input. */
  get remainingInput(): Buffer {
    return this.input
  }

  write(chunk: Uint8Array | string): void {
    if (this.closed) {
      throw new Error('Stream is closed')
    }
    this.pending.push(toBuffer(chunk))
  }

  async read(length: number): Promise<Buffer | null> {
    if (this.input.length < length) {
      return null
    }
    const data = this.input.subarray(0, length)
    this.input = this.input.subarray(length)
    return data
  }

  async readLine(terminator: string): Promise<Buffer | null> {
    const index = this.input.indexOf(terminator)
    if (index === -1) {
      return null
    }
    const line = this.input.subarray(0, index)
    this.input = this.input.subarray(index + Buffer.byteLength(terminator))
    return line
  }

  async flush(): Promise<void> {
    this.flushCount++
    this.output.push(...this.pending)
    this.pending = []
  }

  close(): void {
    this.closed = true
  }

  isClosed(): boolean {
    return this.closed
  }
}
