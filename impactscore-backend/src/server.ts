import dotenv from "dotenv";
dotenv.config();

import { loadConfig, AppConfig } from "./config";
import { createApp } from "./app";

function start(config: AppConfig): void {
  const app = createApp(config);

  app.listen(config.port, () => {
    console.log(`
╔═══════════════════════════════════════════════════════════╗
║                                                           ║
║   ImpactScore Backend started                             ║
║                                                           ║
║   Port: ${String(config.port).padEnd(50)}║
║   Environment: ${config.nodeEnv.padEnd(43)}║
║   Policy: ${`${config.policy.id}@${config.policy.version}`.padEnd(48)}║
║   CORS Origins: ${String(config.allowedOrigins.length).padEnd(42)}║
║                                                           ║
║   Endpoints:                                              ║
║   • GET  /health                                          ║
║   • GET  /api/date-range                                  ║
║   • POST /api/alignment                                   ║
║   • POST /api/competencies                                ║
║                                                           ║
╚═══════════════════════════════════════════════════════════╝
    `);
  });
}

let config: AppConfig | null = null;
try {
  config = loadConfig();
} catch (err) {
  console.error(
    `[${new Date().toISOString()}] Startup aborted:`,
    err instanceof Error ? err.message : err
  );
}

if (config) {
  start(config);
} else {
  // invalid config or policy tables are fatal
  process.exitCode = 1;
}
