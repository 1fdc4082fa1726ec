import { getConfig, type AppConfig } from "./lib/config";
import { createLogger } from "./lib/logger";
import { createSupabaseClient } from "./lib/supabase";
import { SupabaseProcessRepository } from "./lib/persistence/process-repository";
import { ProcessService } from "./lib/process-service";
import { createProcessRoutes } from "./api/processes-route";

/** Wire the store client, repository, service and handlers from configuration. */
export function createApp(config: AppConfig = getConfig(), fetchImpl?: typeof fetch) {
  const client = createSupabaseClient(config, fetchImpl);
  const repository = new SupabaseProcessRepository(
    client,
    config.processTable,
    createLogger("ProcessStore", config.logLevel),
  );
  const service = new ProcessService(repository, createLogger("Processes", config.logLevel));
  const routes = createProcessRoutes(service, createLogger("ProcessRoutes", config.logLevel));
  return { client, repository, service, routes };
}

export type App = ReturnType<typeof createApp>;
