export { serve, listenAndServe, describeAddress } from "./daemon/serve"
export { ServerHandle, type HttpServer, type ServerHandleInit } from "./daemon/handle"
export {
  DEFAULT_SHUTDOWN_TIMEOUT_MS,
  type LifecycleState,
  type ServeOptions,
  type TlsMaterial,
} from "./daemon/types"

export {
  resolveAddress,
  unixSocketConfig,
  sysdConfigWithIndex,
  sysdConfigWithName,
  DEFAULT_UNIX_SOCKET_CONFIG,
  DEFAULT_SYSD_CONFIG,
} from "./listener/address"
export {
  acquireListener,
  acquireTcpListener,
  acquireUnixListener,
  acquireSystemdListener,
  closeListener,
  splitHostPort,
  DEFAULT_TCP_ADDRESS,
  type AcquireOptions,
} from "./listener/factory"
export {
  createSystemdEnvironmentLoader,
  loadSystemdEnvironment,
  parseSystemdEnvironment,
  resolveSystemdDescriptor,
  unsetSystemdListenVars,
  SD_LISTEN_FDS_START,
} from "./listener/systemd"
export type {
  AddressKind,
  AddressSpec,
  SysdConfig,
  SystemdDescriptor,
  SystemdEnvironment,
  UnixSocketConfig,
} from "./listener/types"

export { createIdler, type Idler } from "./idle/idler"
export { globalWait, globalTick, globalIdler } from "./idle/global"
export {
  idleTicker,
  withIdleTick,
  withGlobalIdleTick,
  type FetchHandler,
} from "./idle/middleware"

export { parseDuration, formatDuration } from "./lib/duration"
export * from "./lib/errors"
