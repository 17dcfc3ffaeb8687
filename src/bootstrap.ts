// src/bootstrap.ts
import { buildContainer, type AppContainer } from "./config/container";
import { loadConfig, loadDotenv } from "./config/env";

/**
 * Punto de entrada para quien embebe la librería (servidor HTTP, scripts).
 * Lee .env, valida la config y abre la DB.
 */
export function bootstrap(env: NodeJS.ProcessEnv = process.env): AppContainer {
  loadDotenv();
  return buildContainer(loadConfig(env));
}
