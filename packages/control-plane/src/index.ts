import { initTracing, isLogLevel, shutdownTracing, TracingLogger } from "@aether/shared/tracing"

import { buildApp } from "./app.js"
import { loadConfig } from "./config.js"
import { runMigrations } from "./db/auto-migrate.js"
import { createDatabase } from "./db/index.js"
import { KyselyMissionRequestStore } from "./dispatch/requests.js"
import type { TransportLink } from "./fleet/collaborators.js"
import { FleetManager } from "./fleet/manager.js"
import { KyselyDroneRegistry, KyselyMissionArchive, KyselyPlanFeedbackSink } from "./fleet/registry.js"
import { HttpTransportLink, LoopbackTransportLink } from "./transport/http-link.js"

const config = loadConfig()

// Initialize tracing before anything else
const tracing = initTracing({
  enabled: config.tracing.enabled,
  serviceName: config.tracing.serviceName,
  endpoint: config.tracing.endpoint,
  sampleRate: config.tracing.sampleRate,
  environment: config.nodeEnv,
  exporterType: config.tracing.exporterType,
})

const logger = new TracingLogger({
  level: isLogLevel(config.logLevel) ? config.logLevel : "info",
  serviceName: config.tracing.serviceName,
})
logger.info("tracing configured", { active: tracing, exporter: config.tracing.exporterType })

const { db, pool } = createDatabase(config.databaseUrl)

// Run pending migrations before starting the app
await runMigrations(pool)

const transport: TransportLink = config.transportUrl
  ? new HttpTransportLink(config.transportUrl)
  : new LoopbackTransportLink()
if (!config.transportUrl) {
  logger.warn("TRANSPORT_URL is not set; directives are acknowledged locally")
}

const fleet = new FleetManager({
  registry: new KyselyDroneRegistry(db),
  archive: new KyselyMissionArchive(db),
  feedback: new KyselyPlanFeedbackSink(db),
  transport,
  config,
  logger,
})
await fleet.start()

const { app } = await buildApp({
  db,
  pool,
  config,
  fleet,
  requests: new KyselyMissionRequestStore(db),
  logger,
})

// Shutdown tracing on app close
app.addHook("onClose", async () => {
  await shutdownTracing()
})

try {
  const address = await app.listen({ port: config.port, host: config.host })
  app.log.info(`Control plane listening on ${address}`)
} catch (err) {
  app.log.fatal(err)
  await fleet.shutdown()
  await shutdownTracing()
  process.exit(1)
}
