export type AddressKind = "tcp" | "unix" | "sysd"

export interface UnixSocketConfig {
  // Absolute or relative path of the socket file, e.g. /run/app.sock
  readonly socketPath: string
  readonly socketMode: number
  // Delete whatever sits at socketPath before binding
  readonly removeExisting: boolean
}

/**
 * Selects one descriptor passed in by systemd. Exactly one of `fdIndex` and
 * `fdName` is set.
 */
export interface SysdConfig {
  readonly fdIndex?: number
  // FileDescriptorName= of the socket unit, or its file name by default
  readonly fdName?: string
  // Require LISTEN_PID to be this process
  readonly checkPid: boolean
  // Drop the LISTEN_* variables so child processes don't see them
  readonly unsetEnv: boolean
  // Shut the server down after this long without requests
  readonly idleTimeoutMs?: number
}

export type AddressSpec =
  | { readonly kind: "tcp"; readonly address: string }
  | { readonly kind: "unix"; readonly config: UnixSocketConfig }
  | { readonly kind: "sysd"; readonly config: SysdConfig }

export interface SystemdEnvironment {
  readonly pid: number
  readonly fdCount: number
  readonly fdNames: ReadonlyArray<string>
  // LISTEN_FDNAMES as it was read, for error messages
  readonly fdNamesRaw: string
}

export interface SystemdDescriptor {
  fd: number
  name: string
}
