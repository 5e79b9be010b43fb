import { BiasAnalysisEngine, createEngineOptions } from "../src/analysis/bias-analysis.engine";
import { loadEnv } from "../src/config/env";
import { createLogger } from "../src/config/logger";
import { loadReferenceData } from "../src/reference/reference-data.loader";

async function run(): Promise<void> {
  const env = loadEnv();
  const logger = createLogger({ minLevel: "warn" });
  const referenceData = await loadReferenceData(env.referenceDataDir);
  const engine = new BiasAnalysisEngine(referenceData, createEngineOptions(env), logger);

  const masculineAdvert =
    "We are looking for an aggressive, competitive and dominant sales rockstar. You must be driven, ambitious and fearless in a fast-paced environment.";
  const feminineAdvert =
    "Join our supportive and caring team. We value empathetic, compassionate colleagues who enjoy collaborating and nurturing long-term relationships.";
  const neutralAdvert =
    "The analyst prepares monthly reports, maintains the reporting database and presents findings to the finance team.";

  const scores = new Map<string, number>();
  for (const [name, text] of [
    ["masculine", masculineAdvert],
    ["feminine", feminineAdvert],
    ["neutral", neutralAdvert],
  ]) {
    const outcome = engine.analyze({ text, method: "comprehensive", includeRewrite: false });
    if (!outcome.ok) {
      throw new Error(`Analysis of ${name} advert failed: ${outcome.error_code}`);
    }
    scores.set(name, outcome.result.biasScore);
    console.log(`${name} advert:`, {
      biasScore: outcome.result.biasScore,
      classification: outcome.result.classification.label,
      subScores: outcome.result.subScores,
    });
  }

  const masculine = scores.get("masculine") ?? 0;
  const feminine = scores.get("feminine") ?? 0;
  const neutral = scores.get("neutral") ?? 0;

  if (!(masculine > neutral)) {
    throw new Error("Expected masculine advert to score above the neutral advert");
  }
  if (!(feminine < neutral)) {
    throw new Error("Expected feminine advert to score below the neutral advert");
  }

  const rewrite = engine.rewrite(masculineAdvert);
  if (!rewrite.ok) {
    throw new Error(`Rewrite failed: ${rewrite.error_code}`);
  }
  const rewritten = engine.analyze({ text: rewrite.output.improvedText, includeRewrite: false });
  if (!rewritten.ok || rewritten.result.biasScore >= masculine) {
    throw new Error("Expected the rewritten masculine advert to score lower");
  }
  console.log("Rewritten advert:", rewrite.output.improvedText);

  console.log("bias sanity passed");
}

run().catch((error) => {
  console.error("bias sanity failed:", error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
