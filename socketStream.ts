import * as net from 'net'
import type { Duplex } from 'stream'
import type { ByteStream } from './types'

// Stop reading from the socket once this much sits unread with no reader waiting
const HIGH_WATER_MARK = 1024 * 1024

/**
 * ByteStream over a Node duplex, normally a net.Socket. Writes are held until
 * flush() so a pipelined batch goes out as one socket write.
 */
export class SocketStream implements ByteStream {
  private received: Buffer[] = []
  private receivedLength = 0
  private pending: Buffer[] = []
  private ended = false
  private failure: Error | null = null
  private wake: (() => void) | null = null

  constructor(private socket: Duplex) {
    socket.on('data', (chunk: Buffer | string) => {
      const data = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk
      this.received.push(data)
      this.receivedLength += data.length
      if (this.wake === null && this.receivedLength >= HIGH_WATER_MARK) {
        socket.pause()
      }
      this.notify()
    })
    socket.on('end', () => {
      this.ended = true
      this.notify()
    })
    socket.on('close', () => {
      this.ended = true
      this.notify()
    })
    socket.on('error', (error: Error) => {
      this.failure = error
      this.notify()
    })
  }

  static connect(port: number, host: string): Promise<SocketStream> {
    return new Promise((resolve, reject) => {
      const socket = net.createConnection({ port, host })
      socket.once('error', reject)
      socket.once('connect', () => {
        socket.off('error', reject)
        socket.setNoDelay(true)
        resolve(new SocketStream(socket))
      })
    })
  }

  write(chunk: Uint8Array | string): void {
    this.pending.push(
      typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk),
    )
  }

  async read(length: number): Promise<Buffer | null> {
    while (this.receivedLength < length) {
      if (!(await this.fill())) {
        return null
      }
    }
    return this.take(length)
  }

  async readLine(terminator: string): Promise<Buffer | null> {
    const marker = Buffer.from(terminator, 'utf8')
    let searchFrom = 0
    for (;;) {
      const index = this.search(marker, searchFrom)
      if (index !== -1) {
        const line = this.take(index)
        this.take(marker.length)
        return line
      }
      // Only data after this point, plus a possible straddle, is new next time
      searchFrom = Math.max(0, this.receivedLength - marker.length + 1)
      if (!(await this.fill())) {
        return null
      }
    }
  }

  async flush(): Promise<void> {
    if (this.pending.length === 0) {
      return
    }
    const data = Buffer.concat(this.pending)
    this.pending = []
    await new Promise<void>((resolve, reject) => {
      this.socket.write(data, (error?: Error | null) => {
        if (error) {
          reject(error)
        } else {
          resolve()
        }
      })
    })
  }

  close(): void {
    this.socket.end()
  }

  isClosed(): boolean {
    return this.socket.destroyed || this.socket.writableEnded
  }

  /**
   * Offset of the first terminator at or after `from` across the received
   * chunks, or -1. A match may begin in one chunk and end in the next.
   */
  private search(marker: Buffer, from: number): number {
    const keep = marker.length - 1
    let offset = 0
    let carry: Buffer = Buffer.alloc(0)
    for (const chunk of this.received) {
      const end = offset + chunk.length
      if (end > from) {
        if (carry.length > 0) {
          const joined = Buffer.concat([carry, chunk.subarray(0, keep)])
          const index = joined.indexOf(marker)
          if (index !== -1 && offset - carry.length + index >= from) {
            return offset - carry.length + index
          }
        }
        const index = chunk.indexOf(marker, Math.max(0, from - offset))
        if (index !== -1) {
          return offset + index
        }
      }
      if (keep > 0) {
        carry = Buffer.concat([
          carry,
          chunk.subarray(Math.max(0, chunk.length - keep)),
        ]).subarray(-keep)
      }
      offset = end
    }
    return -1
  }

  /** Removes and returns the first `count` received bytes. */
  private take(count: number): Buffer {
    let covered = 0
    let used = 0
    while (covered < count) {
      covered += this.received[used].length
      used++
    }
    const head =
      used === 1
        ? this.received[0]
        : Buffer.concat(this.received.slice(0, used), covered)
    const rest = head.subarray(count)
    this.received =
      rest.length > 0
        ? [rest, ...this.received.slice(used)]
        : this.received.slice(used)
    this.receivedLength -= count
    return head.subarray(0, count)
  }

  /** Waits for more data. Resolves false once no more can arrive. */
  private fill(): Promise<boolean> {
    if (this.failure) {
      return Promise.reject(this.failure)
    }
    if (this.ended) {
      return Promise.resolve(false)
    }
    if (this.socket.isPaused()) {
      this.socket.resume()
    }
    return new Promise<boolean>((resolve, reject) => {
      this.wake = () => {
        if (this.failure) {
          reject(this.failure)
        } else {
          // Resolving true on end lets the caller re-check what is buffered
          resolve(true)
        }
      }
    })
  }

  private notify(): void {
    const wake = this.wake
    this.wake = null
    wake?.()
  }
}
