import { beforeEach, describe, expect, it, vi } from 'vitest'
import { Connection } from './connection'
import { ProtocolError, ServerError } from './errors'
import { createLogger } from './logger'
import { MemoryStream } from './memoryStream'

describe('Connection', () => {
  let stream: MemoryStream
  let connection: Connection

  beforeEach(() => {
    stream = new MemoryStream()
    connection = Connection.client(stream)
  })

  it('should expose its stream', () => {
    expect(connection.stream).toBe(stream)
  })

  it('should pipeline requests until flushed', async () => {
    connection.writeRequest(['PING'])
    connection.writeRequest(['GET', 'key'])

    expect(connection.count).toBe(2)
    expect(stream.flushedOutput.length).toBe(0)

    await connection.flush()

    expect(stream.flushCount).toBe(1)
    expect(stream.flushedOutput.toString()).toBe(
      '*1\r\n$4\r\nPING\r\n*2\r\n$3\r\nGET\r\n$3\r\nkey\r\n',
    )
  })

  it('should read replies in order', async () => {
    stream.feed('+PONG\r\n$5\r\nvalue\r\n')

    expect(await connection.readResponse()).toEqual({
      type: 'SimpleString',
      value: 'PONG',
    })
    expect(await connection.readObject()).toEqual({
      type: 'BulkString',
      value: Buffer.from('value'),
    })
  })

  it('should stay usable after a server error', async () => {
    stream.feed('-WRONGTYPE Operation against a key\r\n:3\r\n')

    const error = await connection.readValue().catch((e: unknown) => e)
    expect(error).toBeInstanceOf(ServerError)
    expect(error instanceof ServerError && error.code).toBe('WRONGTYPE')

    connection.writeRequest(['INCR', 'counter'])
    expect(await connection.readValue()).toEqual({ type: 'Integer', value: 3 })
    expect(connection.count).toBe(1)
  })

  it('should write values and replies', () => {
    connection.writeValue(['a', 1])
    connection.writeObject('b')
    connection.writeStatus('OK')
    connection.writeError('ERR nope')
    connection.writeNil()

    expect(stream.pendingOutput.toString()).toBe(
      '*2\r\n$1\r\na\r\n:1\r\n$1\r\nb\r\n+OK\r\n-ERR nope\r\n$-1\r\n',
    )
    expect(connection.count).toBe(0)
  })

  it('should pass close through to the stream', async () => {
    expect(connection.isClosed()).toBe(false)
    await connection.close()
    expect(connection.isClosed()).toBe(true)
    expect(stream.isClosed()).toBe(true)
  })

  it('should reject invalid limits', () => {
    expect(() => new Connection(stream, { maxNestingDepth: 0 })).toThrowError(
      'maxNestingDepth must be a positive integer, got 0',
    )
  })

  it('should apply configured limits', async () => {
    const limited = new Connection(stream, { maxNestingDepth: 1 })
    stream.feed('*1\r\n*1\r\n:1\r\n')
    await expect(limited.readValue()).rejects.toThrowError(
      'Array nesting exceeds 1 levels',
    )
  })

  describe('logging', () => {
    const sink = () => ({ debug: vi.fn(), info: vi.fn(), error: vi.fn() })

    it('should log requests and replies at debug level', async () => {
      const logSink = sink()
      const logged = new Connection(stream, {
        logger: createLogger(true, logSink),
      })
      stream.feed('+OK\r\n')

      logged.writeRequest(['SET', 'key', 'value'])
      await logged.readValue()

      expect(logSink.debug).toHaveBeenNthCalledWith(
        1,
        '[Request #1]: SET (3 arguments)',
      )
      expect(logSink.debug).toHaveBeenNthCalledWith(
        2,
        '[Response]: SimpleString',
      )
    })

    it('should log server errors at info level', async () => {
      const logSink = sink()
      const logged = new Connection(stream, {
        logger: createLogger(true, logSink),
      })
      stream.feed('-ERR bad\r\n')

      await expect(logged.readValue()).rejects.toBeInstanceOf(ServerError)
      expect(logSink.info).toHaveBeenCalledWith('[Response]: -ERR bad')
      expect(logSink.error).not.toHaveBeenCalled()
    })

    it('should log protocol errors as a desync', async () => {
      const logSink = sink()
      const logged = new Connection(stream, {
        logger: createLogger(true, logSink),
      })
      stream.feed('?\r\n')

      await expect(logged.readValue()).rejects.toBeInstanceOf(ProtocolError)
      expect(logSink.error).toHaveBeenCalledWith(
        '[Connection]: reply stream out of sync (ProtocolError): Unsupported reply type "?"',
      )
    })
  })
})
