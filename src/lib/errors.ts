export class PolylistenError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = new.target.name
  }
}

// Malformed address, missing required field, duplicate or unknown query key
export class ConfigurationError extends PolylistenError {}

// Systemd activation handshake did not match what was asked for
export class ProtocolMismatchError extends PolylistenError {}

// Bind, chmod, unlink or descriptor wrap failed
export class OSResourceError extends PolylistenError {
  readonly code: string | undefined

  constructor(message: string, cause?: unknown) {
    super(message, { cause })
    this.code = errnoCode(cause)
  }
}

// Fatal error from a running serve loop
export class ServeError extends PolylistenError {}

// Graceful shutdown ran past its deadline; open connections were destroyed
export class ShutdownTimeoutError extends ServeError {}

export class IdlerAlreadyActiveError extends PolylistenError {
  constructor() {
    super("idler already waiting")
  }
}

export class IdlerMisuseError extends PolylistenError {}

export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code
  }
  return undefined
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
