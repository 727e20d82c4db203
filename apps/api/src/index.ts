import { createServer } from "./server.js";
import { loadConfig } from "./config/env.js";
import { createServer as createHttpServer } from "http";
import { Server as SocketIOServer } from "socket.io";
import { createPool } from "./data/db.js";
import { log } from "./logger.js";
import { registerNotificationNamespace } from "./realtime/notificationNamespace.js";

const config = loadConfig();
const pool = createPool(config.databaseUrl);
const { app, hub } = createServer({ config, db: pool });
const httpServer = createHttpServer(app);

let io: SocketIOServer | null = null;
if (config.realtimeEnabled) {
  io = new SocketIOServer(httpServer, {
    cors: { origin: config.corsAllowedOrigins, credentials: true },
    serveClient: false
  });
  registerNotificationNamespace(io, { hub });
}

httpServer.listen(config.port, () => {
  // eslint-disable-next-line no-console
  console.log(`API listening on http://localhost:${config.port}`);
});

let shuttingDown = false;

async function shutdown(signal: NodeJS.Signals) {
  if (shuttingDown) return;
  shuttingDown = true;
  log({ level: "info", msg: "shutdown_started", signal });
  // Closing the hub ends every live stream, so open SSE responses finish.
  hub.close();
  if (io) {
    await new Promise<void>((resolve) => io?.close(() => resolve()));
  }
  await new Promise<void>((resolve, reject) =>
    httpServer.close((err) => (err ? reject(err) : resolve()))
  );
  await pool.end();
  log({ level: "info", msg: "shutdown_complete", signal });
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log({
          level: "error",
          msg: "shutdown_failed",
          signal,
          error: err instanceof Error ? err.message : String(err)
        });
        process.exit(1);
      });
  });
}
