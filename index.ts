export { type ConnectionOptions, resolveOptions } from './config'
export { Connection } from './connection'
export { CRLF, DEFAULT_LIMITS, RESP_TYPE } from './constants'
export { Decoder, parseInteger } from './decoder'
export { Encoder, isEncodable, toBytes } from './encoder'
export {
  ConversionError,
  ProtocolError,
  RespCodecError,
  ServerError,
  UnexpectedEndOfStreamError,
} from './errors'
export { createLogger, type Logger, silentLogger } from './logger'
export { MemoryStream } from './memoryStream'
export { RESPFormatter, writeLines } from './respFormatter'
export { SocketStream } from './socketStream'
export type {
  ByteStream,
  Command,
  Encodable,
  RequestArgument,
  RespValue,
} from './types'
