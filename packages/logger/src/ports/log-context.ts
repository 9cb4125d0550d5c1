export type LogContext = {
  module: string
  policy: string
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> & {
  err?: unknown
} & Record<string, unknown>

/**
 * Fields added to (or overriding) a logger's context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
