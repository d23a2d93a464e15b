import chalk, { Chalk, type ChalkInstance } from 'chalk'
import type { LogLevel } from '@keel/kernel'

export interface Theme {
  readonly title: ChalkInstance
  readonly key: ChalkInstance
  readonly muted: ChalkInstance
  readonly ok: ChalkInstance
  readonly warning: ChalkInstance
  readonly error: ChalkInstance
}

export function createTheme(c: ChalkInstance = chalk): Theme {
  return {
    title: c.bold.hex('#4FC3F7'),
    key:   c.hex('#F2F2EC'),
    muted: c.hex('#666666'),
    ok:    c.hex('#81C784'),
    warning: c.hex('#D4880A'),
    error: c.hex('#CF6679'),
  }
}

/** Colors follow chalk's terminal detection. */
export const defaultTheme: Theme = createTheme()

/** No escape codes at all, whatever the terminal supports. */
export const plainTheme: Theme = createTheme(new Chalk({ level: 0 }))

export const levelColor = (theme: Theme, level: LogLevel): ChalkInstance => {
  switch (level) {
    case 'error':   return theme.error
    case 'warning': return theme.warning
    case 'info':    return theme.key
    case 'debug':   return theme.muted
  }
}
