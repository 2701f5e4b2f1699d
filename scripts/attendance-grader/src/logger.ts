export type Logger = Pick<Console, 'log' | 'warn' | 'error'>
