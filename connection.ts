import {
  type ConnectionOptions,
  type ResolvedOptions,
  resolveOptions,
} from './config'
import { Decoder } from './decoder'
import { Encoder } from './encoder'
import { ProtocolError, ServerError, UnexpectedEndOfStreamError } from './errors'
import type { Logger } from './logger'
import type { ByteStream, RequestArgument, RespValue } from './types'

function describeArgument(argument: RequestArgument | undefined): string {
  if (argument === undefined) {
    return '(empty)'
  }
  return typeof argument === 'object'
    ? `<${argument.byteLength} bytes>`
    : String(argument)
}

/**
 * A RESP connection over one byte stream. Requests are buffered until
 * `flush()`, so several can be pipelined before any reply is read; replies
 * must then be read back in the same order.
 */
export class Connection {
  private encoder: Encoder
  private decoder: Decoder
  private logger: Logger

  constructor(
    readonly stream: ByteStream,
    options: ConnectionOptions = {},
  ) {
    const resolved: ResolvedOptions = resolveOptions(options)
    this.encoder = new Encoder(stream, resolved)
    this.decoder = new Decoder(stream, resolved)
    this.logger = resolved.logger
  }

  static client(stream: ByteStream, options?: ConnectionOptions): Connection {
    return new Connection(stream, options)
  }

  /** Number of requests written on this connection. */
  get count(): number {
    return this.encoder.requestCount
  }

  close(): void | Promise<void> {
    return this.stream.close()
  }

  flush(): Promise<void> {
    return this.stream.flush()
  }

  isClosed(): boolean {
    return this.stream.isClosed()
  }

  writeRequest(args: readonly RequestArgument[]): void {
    this.logger.debug(
      `[Request #${this.count + 1}]:`,
      describeArgument(args[0]),
      `(${args.length} arguments)`,
    )
    this.encoder.encodeRequest(args)
  }

  writeValue(value: unknown): void {
    this.encoder.encodeValue(value)
  }

  writeObject(value: unknown): void {
    this.writeValue(value)
  }

  writeStatus(text: string): void {
    this.encoder.encodeStatus(text)
  }

  writeError(text: string): void {
    this.encoder.encodeError(text)
  }

  writeNil(): void {
    this.encoder.encodeNil()
  }

  async readValue(): Promise<RespValue> {
    try {
      const value = await this.decoder.decodeValue()
      this.logger.debug(`[Response]: ${value.type}`)
      return value
    } catch (error) {
      if (error instanceof ServerError) {
        this.logger.info(`[Response]: -${error.message}`)
      } else if (
        error instanceof ProtocolError ||
        error instanceof UnexpectedEndOfStreamError
      ) {
        this.logger.error(
          `[Connection]: reply stream out of sync (${error.name}): ${error.message}`,
        )
      }
      throw error
    }
  }

  readResponse(): Promise<RespValue> {
    return this.readValue()
  }

  readObject(): Promise<RespValue> {
    return this.readValue()
  }
}
