export interface Logger {
  debug: (...message: unknown[]) => void
  info: (...message: unknown[]) => void
  error: (...message: unknown[]) => void
}

type LogSink = Pick<Console, 'debug' | 'info' | 'error'>

export function createLogger(
  enabled = false,
  sink: LogSink = console,
): Logger {
  return {
    debug: (...message: unknown[]) => {
      if (enabled) {
        sink.debug(message.join(' '))
      }
    },
    info: (...message: unknown[]) => {
      if (enabled) {
        sink.info(message.join(' '))
      }
    },
    error: (...message: unknown[]) => {
      if (enabled) {
        sink.error(message.join(' '))
      }
    },
  }
}

export const silentLogger = createLogger(false)
