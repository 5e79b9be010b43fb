import { createApp } from "./app";
import { loadEnv } from "./config/env";
import { createLogger } from "./config/logger";
import { loadReferenceData } from "./reference/reference-data.loader";

async function bootstrap(): Promise<void> {
  const env = loadEnv();
  const logger = createLogger({ minLevel: env.logLevel });
  const referenceData = await loadReferenceData(env.referenceDataDir);
  const { app } = createApp(env, referenceData, logger);

  app.listen(env.port, () => {
    logger.info("Server started", { port: env.port, nodeEnv: env.nodeEnv });
    logger.info("Reference data loaded", {
      directory: env.referenceDataDir,
      lexiconVersion: referenceData.lexicon.version,
      lexiconEntries: referenceData.lexicon.entries.length,
      contextPatterns: referenceData.context.patterns.length,
      sectors: referenceData.benchmarks.sectors.length,
    });
  });
}

bootstrap().catch((error) => {
  process.stderr.write(
    `Failed to start: ${error instanceof Error ? error.message : "Unknown error"}\n`,
  );
  process.exitCode = 1;
});
