export class RespCodecError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'RespCodecError'
  }
}

/** The stream ended part way through a frame; the connection cannot be reused. */
export class UnexpectedEndOfStreamError extends RespCodecError {
  constructor(message = 'Unexpected end of stream') {
    super(message)
    this.name = 'UnexpectedEndOfStreamError'
  }
}

/**
 * An error reply ('-' prefix) from the server. The connection stays in sync
 * and can be used for further requests.
 */
export class ServerError extends RespCodecError {
  constructor(message: string) {
    super(message)
    this.name = 'ServerError'
  }

  /** Leading error code such as ERR or WRONGTYPE, if the reply has one. */
  get code(): string | undefined {
    const match = /^[A-Z][A-Z0-9_]*(?=\s|$)/.exec(this.message)
    return match ? match[0] : undefined
  }
}

export class ProtocolError extends RespCodecError {
  constructor(message: string) {
    super(message)
    this.name = 'ProtocolError'
  }
}

export class ConversionError extends RespCodecError {
  constructor(message: string) {
    super(message)
    this.name = 'ConversionError'
  }
}
