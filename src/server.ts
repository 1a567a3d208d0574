import path from "path";

import dotenv from "dotenv";
dotenv.config({ path: path.resolve(process.cwd(), ".env.local") });
dotenv.config({ path: path.resolve(process.cwd(), ".env") });

import { pino } from "pino";

import { loadConfig } from "./config.js";
import { makeApp, SERVICE_NAME } from "./app.js";
import { MemoryTicketStore, MemoryTransactionStore } from "./store/memory.js";
import { seedDemoData } from "./lib/demo_data.js";

const config = loadConfig();
const log = pino({ level: config.logLevel });

async function main() {
  const stores = {
    transactions: new MemoryTransactionStore(),
    tickets: new MemoryTicketStore()
  };

  if (config.seedDemoData) {
    const seeded = await seedDemoData(stores);
    log.info(seeded, "demo: seeded");
  }

  const app = makeApp({ stores, config, logger: log });

  app.listen(config.port, config.host, () => {
    log.info(
      {
        PORT: config.port,
        HOST: config.host,
        RATE_LIMIT: config.rateLimit.max > 0 ? config.rateLimit : "off",
        UPLOAD_MAX_BYTES: config.uploadMaxBytes
      },
      `${SERVICE_NAME} running (MemoryStore)`
    );
  });
}

main().catch((err) => {
  log.error({ err }, "fatal");
  process.exit(1);
});
