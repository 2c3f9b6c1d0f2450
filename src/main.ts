import { settings } from "./core/config";
import { ConfigurationError, errorMessage } from "./core/errors";
import { logger } from "./core/logger";
import { buildApp } from "./server";

const main = async (): Promise<void> => {
  const app = await buildApp();
  const { scheduler, notifier, formatter, calendar } = app.services;

  const shutdown = (signal: string): void => {
    logger.info(`Received ${signal}, shutting down`);
    app.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error("Shutdown failed", error);
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  await app.listen({ host: settings.appHost, port: settings.appPort });
  logger.info(`${settings.appName} listening on http://${settings.appHost}:${settings.appPort}`);

  scheduler.start();
  try {
    await notifier.sendText(
      formatter.formatStartup({
        instrument: settings.underlyingInstrument,
        sessionStart: settings.sessionStart,
        sessionEnd: settings.sessionEnd,
        pollIntervalSeconds: settings.pollIntervalSeconds,
        paperTrading: app.services.runtimePolicy.getPolicy().paperTrading,
        nextExpiry: calendar.nextExpiry()
      })
    );
  } catch (error) {
    logger.warn("Startup notification failed", errorMessage(error));
  }
};

main().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    logger.error(error.message, error.issues);
  } else {
    logger.error("Failed to start server", error);
  }
  process.exit(1);
});
