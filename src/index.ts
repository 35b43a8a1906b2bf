import { buildServer } from "./api/server.js";

const port = Number.parseInt(process.env.PORT ?? "8080", 10);
const host = process.env.HOST ?? "0.0.0.0";

const app = buildServer();

let isShuttingDown = false;

async function gracefulShutdown(signal: string) {
  if (isShuttingDown) {
    return;
  }
  isShuttingDown = true;
  console.log(`\n${signal} received. Shutting down gracefully...`);
  try {
    await app.close();
    console.log("Server closed.");
  } catch (error) {
    console.error("Error during shutdown:", error);
    process.exitCode = 1;
  }
}

process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

app
  .listen({ port, host })
  .then(() => {
    console.log(`actuator-gate listening on http://${host}:${port}`);
  })
  .catch((error: unknown) => {
    console.error("Failed to start actuator-gate:", error);
    process.exitCode = 1;
  });
