import { buildApp } from "./app";
import { loadConfig } from "./config";
import packageJson from "../package.json";

async function main() {
  const config = loadConfig();
  const app = await buildApp({ config });

  try {
    await app.listen({ host: config.HTTP_HOST, port: config.HTTP_PORT });
    app.log.info(
      { http: `${config.HTTP_HOST}:${config.HTTP_PORT}`, version: packageJson.version },
      "CatalogService ready"
    );
  } catch (error) {
    app.log.error({ err: error }, "Failed to start CatalogService");
    await app.close();
    process.exit(1);
  }

  const shutdown = async (signal: NodeJS.Signals) => {
    app.log.info({ signal }, "Shutting down CatalogService");
    try {
      await app.close();
      process.exit(0);
    } catch (error) {
      app.log.error({ err: error }, "Error during shutdown");
      process.exit(1);
    }
  };

  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);
}

void main();
