import { createAppServer } from "./server.ts";

const SHUTDOWN_GRACE_MS = 5000;

const app = createAppServer();

try {
  await app.start();
} catch (error) {
  console.error("lazythumb server failed to start:", error);
  process.exit(1);
}

let shutdownPromise: Promise<void> | null = null;

const shutdown = (signal: NodeJS.Signals): Promise<void> => {
  if (shutdownPromise) {
    return shutdownPromise;
  }

  const forcedExitTimer = setTimeout(() => {
    console.error(`Force exiting after timeout during ${signal} shutdown.`);
    process.exit(1);
  }, SHUTDOWN_GRACE_MS);
  forcedExitTimer.unref();

  shutdownPromise = (async () => {
    let exitCode = 0;
    try {
      // Drops every open batch, which cancels queued and running thumbnail jobs.
      await app.stop();
    } catch (error) {
      console.error("Failed during graceful shutdown:", error);
      exitCode = 1;
    } finally {
      clearTimeout(forcedExitTimer);
      process.exit(exitCode);
    }
  })();

  return shutdownPromise;
};

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    void shutdown(signal);
  });
}
