import { config as loadDotenv } from "dotenv";
import { buildApp } from "./app";

// .env in the working directory supplies PORT, HOST and ANALYZER_CONFIG_PATH.
loadDotenv();

async function start() {
  const app = await buildApp();

  const port = Number(process.env.PORT ?? 5000);
  const host = process.env.HOST ?? "127.0.0.1";

  await app.listen({ port, host });
}

start().catch((err) => {
  console.error(err);
  process.exit(1);
});
