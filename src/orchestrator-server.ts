import "dotenv/config";
import { setDefaultResultOrder } from "node:dns";
import type { Server } from "node:http";
import { createApp } from "./server.js";
import { startAuditTrail } from "./tasks/audit.js";
import type { AuditTrail } from "./tasks/audit.js";
import { loadConfig, loadServerConfig } from "./tasks/config.js";
import { openTasksDb } from "./tasks/db.js";
import { migrateTasksDb } from "./tasks/migrations.js";
import { TaskOrchestrator } from "./tasks/orchestrator.js";
import { SqliteTaskStore } from "./tasks/taskStore.js";

// Prefer IPv4 first (Windows can be weird with localhost resolution)
setDefaultResultOrder("ipv4first");

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
    server.closeAllConnections();
  });
}

async function main() {
  const config = loadConfig();
  const { port, bindHost } = loadServerConfig();

  const db = openTasksDb(config.dbPath);
  migrateTasksDb(db);

  const store = new SqliteTaskStore(db);
  const orchestrator = new TaskOrchestrator({ store, config });
  const audit: AuditTrail | null = config.auditLog ? startAuditTrail(orchestrator.bus) : null;
  orchestrator.start();

  const server = createApp(orchestrator).listen(port, bindHost, () => {
    console.log(`[orchestrator] listening on http://${bindHost}:${port}`);
    console.log(`[orchestrator] db=${config.dbPath} defaultLease=${config.defaultLeaseMs}ms audit=${config.auditLog}`);
  });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`[orchestrator] ${signal} received; shutting down`);
    await orchestrator.stop();
    await audit?.stop();
    await closeServer(server);
    await store.close();
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((e) => {
        console.error("[orchestrator] shutdown failed:", e);
        process.exit(1);
      });
    });
  }
}

main().catch((e) => {
  console.error("[orchestrator] fatal:", e);
  process.exit(1);
});
