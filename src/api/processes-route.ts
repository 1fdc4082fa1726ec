import type { ProcessService, ServiceFailure } from "../lib/process-service";
import { ProcessStoreError } from "../lib/persistence/process-repository";
import { createLogger, type Logger } from "../lib/logger";

export interface RouteContext {
  params: { id: string };
}

function json(body: unknown, status: number): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function failure(result: ServiceFailure): Response {
  switch (result.reason) {
    case "invalid":
      return json({ error: "Invalid input", details: result.issues }, 400);
    case "missing_fields":
      return json({ error: "Missing required fields", missing: result.missing }, 422);
    case "not_found":
      return json({ error: `Process ${result.id} not found` }, 404);
  }
}

function parseId(raw: string): number | null {
  if (!/^\d+$/.test(raw)) return null;
  const id = Number(raw);
  return Number.isSafeInteger(id) ? id : null;
}

async function readBody(request: Request): Promise<{ ok: true; body: unknown } | { ok: false }> {
  try {
    return { ok: true, body: await request.json() };
  } catch {
    return { ok: false };
  }
}

/**
 * Fetch-style handlers for the process collection (`/processes`) and a single
 * process (`/processes/:id`).
 */
export function createProcessRoutes(service: ProcessService, logger: Logger = createLogger("ProcessRoutes")) {
  async function guard(operation: string, handler: () => Promise<Response>): Promise<Response> {
    try {
      return await handler();
    } catch (error) {
      if (error instanceof ProcessStoreError) {
        return json({ error: `Failed to ${error.operation} process`, details: error.message }, 500);
      }
      const message = error instanceof Error ? error.message : "Unknown error";
      logger.error(`${operation} failed: ${message}`);
      return json({ error: "Internal error", details: message }, 500);
    }
  }

  const invalidBody = () => json({ error: "Invalid input", details: "Request body is not valid JSON" }, 400);
  const invalidId = (raw: string) => json({ error: `Invalid process id "${raw}"` }, 400);

  return {
    async POST(request: Request): Promise<Response> {
      const read = await readBody(request);
      if (!read.ok) return invalidBody();
      const body = read.body;
      return guard("create", async () => {
        const result = await service.create(body);
        if (!result.ok) return failure(result);
        return json(result.value, 201);
      });
    },

    async GET(): Promise<Response> {
      return guard("list", async () => json({ processes: await service.list() }, 200));
    },

    async PUT(request: Request, { params }: RouteContext): Promise<Response> {
      const id = parseId(params.id);
      if (id === null) return invalidId(params.id);
      const read = await readBody(request);
      if (!read.ok) return invalidBody();
      const body = read.body;
      return guard("update", async () => {
        const result = await service.update(id, body);
        if (!result.ok) return failure(result);
        return json(result.value, 200);
      });
    },

    async DELETE(_request: Request, { params }: RouteContext): Promise<Response> {
      const id = parseId(params.id);
      if (id === null) return invalidId(params.id);
      return guard("delete", async () => {
        const result = await service.remove(id);
        if (!result.ok) return failure(result);
        return new Response(null, { status: 204 });
      });
    },
  };
}

export type ProcessRoutes = ReturnType<typeof createProcessRoutes>;
