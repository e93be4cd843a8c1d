import Fastify, { type FastifyServerOptions } from "fastify";
import multipart from "@fastify/multipart";
import { resolveConfigPath } from "./config/loadConfig";
import { registerAnalysisRoutes } from "./modules/analysis/analysis.routes";

export type BuildAppOptions = {
  configPath?: string;
  logger?: FastifyServerOptions["logger"];
};

// Upload cap for each of the two documents.
const MAX_UPLOAD_BYTES = 20 * 1024 * 1024;

export async function buildApp(opts: BuildAppOptions = {}) {
  const app = Fastify({ logger: opts.logger ?? true });

  await app.register(multipart, {
    limits: {
      files: 2,
      fileSize: MAX_UPLOAD_BYTES,
    },
  });

  app.get("/health", async () => ({ ok: true }));

  registerAnalysisRoutes(app, { configPath: resolveConfigPath(opts.configPath) });

  return app;
}
