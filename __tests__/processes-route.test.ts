import { describe, it, expect, beforeEach, vi } from "vitest";
import { createProcessRoutes, type ProcessRoutes } from "@/api/processes-route";
import { ProcessService } from "@/lib/process-service";
import { ProcessStoreError } from "@/lib/persistence/process-repository";
import { createLogger } from "@/lib/logger";
import { InMemoryProcessRepository } from "./helpers/in-memory-repository";
import { EVALUATED_AT, invoiceForm } from "./helpers/fixtures";

const BASE = "http://localhost/processes";

function jsonRequest(method: string, url: string, body: unknown): Request {
  return new Request(url, {
    method,
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
}

describe("process routes", () => {
  let repository: InMemoryProcessRepository;
  let routes: ProcessRoutes;

  beforeEach(() => {
    repository = new InMemoryProcessRepository();
    const service = new ProcessService(repository, undefined, () => EVALUATED_AT);
    routes = createProcessRoutes(service, createLogger("ProcessRoutes", "silent"));
  });

  describe("POST", () => {
    it("creates a process and returns 201 with its evaluation", async () => {
      const res = await routes.POST(jsonRequest("POST", BASE, invoiceForm));

      expect(res.status).toBe(201);
      expect(await res.json()).toMatchObject({
        id: 1,
        evaluation: { priority: "high", composite: { adjusted: 9.57 } },
      });
    });

    it("returns 400 for a body that is not JSON", async () => {
      const res = await routes.POST(new Request(BASE, { method: "POST", body: "{not json" }));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "Invalid input", details: "Request body is not valid JSON" });
    });

    it("returns 400 with field errors for invalid values", async () => {
      const res = await routes.POST(jsonRequest("POST", BASE, { ...invoiceForm, apiAccess: "Sometimes" }));

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: "Invalid input",
        details: { fieldErrors: { apiAccess: ["API access must be Yes, No or Unknown"] } },
      });
    });

    it("returns 422 listing missing required fields", async () => {
      const res = await routes.POST(jsonRequest("POST", BASE, { ...invoiceForm, description: " " }));

      expect(res.status).toBe(422);
      expect(await res.json()).toEqual({ error: "Missing required fields", missing: ["Description"] });
    });

    it("returns 500 when the store fails", async () => {
      vi.spyOn(repository, "insert").mockRejectedValue(new ProcessStoreError("insert", "boom"));

      const res = await routes.POST(jsonRequest("POST", BASE, invoiceForm));

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({
        error: "Failed to insert process",
        details: "Failed to insert process: boom",
      });
    });

    it("returns 500 for unexpected errors", async () => {
      vi.spyOn(repository, "insert").mockRejectedValue(new Error("socket hang up"));

      const res = await routes.POST(jsonRequest("POST", BASE, invoiceForm));

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({ error: "Internal error", details: "socket hang up" });
    });
  });

  describe("GET", () => {
    it("lists stored processes", async () => {
      await routes.POST(jsonRequest("POST", BASE, invoiceForm));

      const res = await routes.GET();

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ processes: [{ id: 1, name: "Invoice matching" }] });
    });
  });

  describe("PUT", () => {
    it("updates an existing process", async () => {
      await routes.POST(jsonRequest("POST", BASE, invoiceForm));

      const res = await routes.PUT(
        jsonRequest("PUT", `${BASE}/1`, { ...invoiceForm, name: "Invoice matching v2" }),
        { params: { id: "1" } },
      );

      expect(res.status).toBe(200);
      expect(repository.rows.get(1)?.name).toBe("Invoice matching v2");
    });

    it("returns 404 for an unknown id", async () => {
      const res = await routes.PUT(jsonRequest("PUT", `${BASE}/99`, invoiceForm), { params: { id: "99" } });

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "Process 99 not found" });
    });

    it("returns 400 for a malformed id", async () => {
      const res = await routes.PUT(jsonRequest("PUT", `${BASE}/abc`, invoiceForm), { params: { id: "abc" } });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'Invalid process id "abc"' });
    });
  });

  it("rejects an id beyond the safe integer range", async () => {
    const res = await routes.DELETE(
      new Request(`${BASE}/9007199254740993`, { method: "DELETE" }),
      { params: { id: "9007199254740993" } },
    );

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Invalid process id "9007199254740993"' });
  });

  describe("DELETE", () => {
    it("returns 204 and then 404", async () => {
      await routes.POST(jsonRequest("POST", BASE, invoiceForm));
      const request = new Request(`${BASE}/1`, { method: "DELETE" });

      const first = await routes.DELETE(request, { params: { id: "1" } });
      expect(first.status).toBe(204);

      const second = await routes.DELETE(new Request(`${BASE}/1`, { method: "DELETE" }), { params: { id: "1" } });
      expect(second.status).toBe(404);
    });
  });
});
