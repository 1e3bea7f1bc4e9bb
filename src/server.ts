import { fileURLToPath } from "node:url";
import { buildApp } from "./app.js";
import { config } from "./config/index.js";
import { getPipeline } from "./pipeline.js";

export async function bootstrap(): Promise<void> {
  const pipeline = getPipeline();
  const app = await buildApp({
    lifecycle: {
      onReady: () => pipeline.restoreCache(),
      onShutdown: () => pipeline.persistCache()
    }
  });
  await app.listen({
    host: "0.0.0.0",
    port: config.PORT
  });
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  bootstrap().catch((error: unknown) => {
    console.error("Server startup failed", error);
    process.exitCode = 1;
  });
}
