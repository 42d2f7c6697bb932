import app from "./app";
import { createHttpTerminator } from "http-terminator";
import process from "process";
import { logger, logStackTrace } from "./logger";

const port = app.get("port");
const env = app.get("env");

/**
 * Let in-flight standardization requests finish, then exit with the signal
 * that stopped us.
 */
async function handleSignal(signal: NodeJS.Signals) {
  // A second identical signal kills the process right away.
  process.removeAllListeners(signal);

  logger.info(`${signal}: closing connections before stopping`);
  try {
    await serverTerminator.terminate();
    process.kill(process.pid, signal);
  } catch (error) {
    logStackTrace(logger, error);
    process.exit(1);
  }
}

for (const signal of ["SIGINT", "SIGTERM", "SIGBREAK"] as const) {
  process.on(signal, (received) => {
    handleSignal(received).catch((error) => logStackTrace(logger, error));
  });
}

const server = app.listen(port, () => {
  logger.info(`Standardizing addresses on port ${port} (${env})`);
});

const serverTerminator = createHttpTerminator({
  gracefulTerminationTimeout: 10_000,
  server,
});

export default server;
