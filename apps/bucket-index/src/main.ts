import { createPinoLogger } from "@bucket-index/logger"
import { run } from "./server"

run().catch((err: unknown) => {
  // The app logger may not exist yet when configuration is what failed.
  const logger = createPinoLogger({ service: "bucket-index" }, { level: "info" })

  logger.fatal("Startup failed", { err })
  process.exit(1)
})
