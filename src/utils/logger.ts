import pino from 'pino'
import type { Logger } from 'pino'

/**
 * Crea el logger según el entorno.
 * Siempre escribe a stderr: stdout queda libre para la salida de `dump`.
 */
function createLogger(): Logger {
  const env = process.env.NODE_ENV || 'development'
  const pretty = env !== 'production' && env !== 'test'
  const level = process.env.LOG_LEVEL || 'info'

  if (pretty) {
    return pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          destination: 2,
          colorize: true,
          translateTime: 'SYS:HH:MM:ss',
          ignore: 'pid,hostname',
        },
      },
    })
  }

  return pino(
    {
      level,
      formatters: {
        level: (label) => ({ level: label }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination(2)
  )
}

export const logger = createLogger()
