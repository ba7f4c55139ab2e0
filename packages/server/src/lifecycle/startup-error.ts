import { BaseError } from "@bucket-index/errors"
import type { StartResult } from "./startup"

export class StartupError extends BaseError<"server_startup_failed"> {
  static fromResult(result: StartResult): StartupError {
    const hooks = result.failures.map((f) => f.hook)
    const headline = result.timedOut
      ? "Server startup timed out"
      : `Server startup failed in hook(s): ${hooks.join(", ")}`

    return new StartupError(headline, {
      code: "server_startup_failed",
      context: { hooks, timedOut: result.timedOut },
      cause: result.failures[0]?.error,
      isOperational: false,
    })
  }
}
