import type { FastifyInstance } from "fastify";
import { createAnalysisController } from "./analysis.controller";

export function registerAnalysisRoutes(app: FastifyInstance, opts: { configPath: string }) {
  const controller = createAnalysisController(opts);

  app.post("/analyze", controller.analyze);  // Accepts the two uploads, runs the analysis and returns the summary with artifact handles.
  app.get("/download/markdown/:handle", controller.downloadMarkdown);  // Streams a persisted markdown report as an attachment.
  app.get("/download/json/:handle", controller.downloadJson);  // Streams a persisted enhanced dataset as an attachment.
}
