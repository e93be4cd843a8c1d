#!/usr/bin/env node
import { config as loadDotenv } from "dotenv";
import { readFile } from "node:fs/promises";
import pino from "pino";
import { loadAnalyzerConfig, resolveConfigPath } from "../config/loadConfig";
import { createAnalysisLogger } from "../logging/analysisLogger";
import { runAnalysis } from "../modules/analysis/analysisPipeline";
import { DEFAULT_ARTIFACT_DIR, artifactStoreFor } from "../modules/analysis/artifactStore";
import { readAnalyzeArgs } from "./analyzeArgs";

loadDotenv();

async function main() {
  const args = readAnalyzeArgs(process.argv.slice(2));
  const config = await loadAnalyzerConfig(resolveConfigPath(args.configPath));
  const logger = createAnalysisLogger(config, pino({ level: "warn" }));

  const [severityDocument, ticketDataset] = await Promise.all([
    readFile(args.severityPath),
    readFile(args.ticketsPath),
  ]);

  const outcome = await runAnalysis({
    config,
    severityDocument,
    ticketDataset,
    store: artifactStoreFor(config, logger),
    logger,
  });

  if (outcome.status === "failed") {
    throw outcome.error;
  }

  const { analysis: _analysis, enhanced_dataset: _dataset, ...summary } = outcome.result;
  console.log(JSON.stringify({ ...summary, artifact_dir: config.artifact_dir ?? DEFAULT_ARTIFACT_DIR }, null, 2));
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
