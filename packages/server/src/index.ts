import "./types/context"

export type { ErrorHandler } from "./errors/create-error-handler"
export type {
  ErrorMapping,
  ErrorMappingsConfig,
  ErrorResponse,
  FallbackMapping,
} from "./errors/errors"
export {
  isValidationError,
  parseOrThrow,
  ValidationError,
  type ValidationIssue,
} from "./errors/validation"
export type { StatusCode } from "./http/status-codes"
export type { ServerHandle } from "./lifecycle/create-stopper"
export type { LifecycleHook, LifecycleHookContext } from "./lifecycle/lifecycle-hook"
export type { StopResult } from "./lifecycle/shutdown"
export { StartupError } from "./lifecycle/startup-error"
export {
  DEFAULT_CONTENT_SECURITY_POLICY,
  type SecurityHeadersConfig,
} from "./middleware/security-headers"
export {
  type Application,
  type Context,
  createServer,
  type Middleware,
  type RequestHandler,
  Server,
} from "./server/server"
export type {
  ReadinessCheck,
  ServerDependencies,
  ServerOptions,
} from "./server/server-options"
export type { ServerEnv } from "./types/context"
