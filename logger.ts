// Off by default; enable temporarily to debug framing
let loggingEnabled = false

export function setLoggingEnabled(enabled: boolean) {
  loggingEnabled = enabled
}

const logger = {
  info: (...message: unknown[]) => {
    if (loggingEnabled) {
      console.info(message.join(' '))
    }
  },
  error: (...message: unknown[]) => {
    if (loggingEnabled) {
      console.error(message.join(' '))
    }
  },
}
export default logger
