/**
 * Fleet Health Server
 *
 * Loads the config, starts monitoring, and serves the REST API, SSE stream,
 * agent webhook and MCP transports on one port.
 *
 *   HEALTH_CONFIG         path to the JSON config (default config/health.json)
 *   HEALTH_POLL_INTERVAL  background refresh period in ms (0 = off)
 *   PORT                  listen port when the config sets none (default 3100)
 */

import { loadConfig } from "./monitoring/config.js";
import type { ResolvedConfig } from "./monitoring/config.js";
import { initMonitoring, stopMonitoring } from "./monitoring/index.js";
import { broadcast } from "./monitoring/sse.js";
import { consoleNotifier } from "./monitoring/webhook.js";
import { errorMessage } from "./monitoring/errors.js";
import { createApp, monitoringDeps } from "./health-api.js";
import type { ApiDeps } from "./health-api.js";
import { closeMcpTransports, mountMcp } from "./health-mcp.js";

function readConfig(): ResolvedConfig {
  try {
    return loadConfig();
  } catch (err) {
    console.error(`[health] ${errorMessage(err)}`);
    process.exit(1);
  }
}

const config = readConfig();

initMonitoring(config);

const deps: ApiDeps = {
  ...monitoringDeps,
  webhook: config.webhooks.enabled
    ? {
        secret: config.webhooks.secret,
        notifier: consoleNotifier,
        onNotification: (text: string) => broadcast("notification", { text }),
      }
    : null,
};

if (config.webhooks.enabled && !config.webhooks.secret) {
  console.warn("[health] Webhooks enabled without a secret");
}

const app = createApp(deps);
mountMcp(app, deps);

const server = app.listen(config.port, () => {
  console.log(`[health] HTTP server listening on port ${config.port}`);
  console.log(`[health] Health:   http://localhost:${config.port}/api/health`);
  console.log(`[health] SSE:      http://localhost:${config.port}/api/health/sse`);
  console.log(`[health] MCP:      http://localhost:${config.port}/mcp`);
});

async function shutdown(signal: string): Promise<void> {
  console.log(`[health] ${signal} received, shutting down`);
  stopMonitoring();
  await closeMcpTransports();
  server.close(() => process.exit(0));
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err) => {
      console.error(`[health] Shutdown failed: ${errorMessage(err)}`);
      process.exit(1);
    });
  });
}
