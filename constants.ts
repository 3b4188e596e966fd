export const CRLF = '\r\n'

export const RESP_TYPE = {
  // Reply type markers
  BULK_STRING: '$',
  ARRAY: '*',
  INTEGER: ':',
  ERROR: '-',
  SIMPLE_STRING: '+',
} as const

export type RespTypeMarker = (typeof RESP_TYPE)[keyof typeof RESP_TYPE]

export const NULL_LENGTH = -1

export const DEFAULT_LIMITS = {
  // Deepest array nesting accepted from the wire or written by the encoder
  MAX_NESTING_DEPTH: 128,
  // How many toResp() calls may chain along one path while encoding
  MAX_CONVERSION_DEPTH: 32,
  // Same ceiling as the server's proto-max-bulk-len default
  MAX_BULK_LENGTH: 512 * 1024 * 1024,
} as const
