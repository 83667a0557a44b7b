/**
 * HTTP API Tests
 *
 * Runs the Express app on an ephemeral local port against the in-memory
 * test tables.
 */

import { createServer, type Server } from "http";
import type { AddressInfo } from "net";
import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { createApp } from "./app";
import { DEFAULT_APP_CONFIG, type AppConfig } from "./src/config";
import { ComplianceEngine } from "./src/compliance";
import { buildTestReferenceData } from "./src/compliance/testFixtures";

const config: AppConfig = { ...DEFAULT_APP_CONFIG, logging: { verbosity: "minimal" } };

let server: Server;
let baseUrl: string;

function post(path: string, body: unknown): Promise<Response> {
  return fetch(`${baseUrl}${path}`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
}

async function readBody(res: Response) {
  return JSON.parse(await res.text());
}

beforeAll(async () => {
  const engine = new ComplianceEngine(buildTestReferenceData(), config.engine);
  server = createServer(createApp(engine, config));
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
  const address: AddressInfo | string | null = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Server did not bind to a TCP port");
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
});

describe("HTTP API", () => {
  describe("GET /api/health", () => {
    it("reports the loaded table sizes", async () => {
      const res = await fetch(`${baseUrl}/api/health`);
      const body = await readBody(res);

      expect(res.status).toBe(200);
      expect(body.status).toBe("healthy");
      expect(body.referenceData).toEqual({ standards: 7, casMappings: 8, materials: 23 });
    });
  });

  describe("POST /api/compliance/calculate", () => {
    it("returns the compliance result", async () => {
      const res = await post("/api/compliance/calculate", {
        formula: [{ name: "X", amount: 100 }],
        finishedDosage: 100,
      });
      const body = await readBody(res);

      expect(res.status).toBe(200);
      expect(body.isCompliant).toBe(false);
      expect(body.results[0].ratio).toBe(5);
      expect(body.criticalComponent).toBe("Restricted X");
      expect(body.maxSafeDosage).toBe(20);
    });

    it("defaults the finished dosage to 100", async () => {
      const res = await post("/api/compliance/calculate", {
        formula: [{ name: "Mystery", concentration: "4" }],
      });
      const body = await readBody(res);

      expect(res.status).toBe(200);
      expect(body.finishedDosage).toBe(100);
      expect(body.unresolvedMaterials).toEqual(["Mystery"]);
    });

    it("serializes an unbounded ratio as null", async () => {
      const res = await post("/api/compliance/calculate", {
        formula: [{ name: "Banned", cas: "banned-1", concentration: 0.1 }],
      });
      const body = await readBody(res);

      expect(body.results[0].ratio).toBeNull();
      expect(body.maxSafeDosage).toBe(0);
    });

    it("points at the offending formula row", async () => {
      const res = await post("/api/compliance/calculate", {
        formula: [{ name: "Rose", amount: "lots" }],
      });
      const body = await readBody(res);

      expect(res.status).toBe(400);
      expect(body.error).toBe("Formula entry Rose has invalid amount");
      expect(body.entryIndex).toBe(0);
      expect(body.entryName).toBe("Rose");
      expect(body.details[0].field).toBe("amount");
    });

    it("rejects a finished dosage out of range", async () => {
      const res = await post("/api/compliance/calculate", {
        formula: [{ name: "X", amount: 1 }],
        finishedDosage: 0,
      });
      const body = await readBody(res);

      expect(res.status).toBe(400);
      expect(body.entryIndex).toBe(-1);
    });

    it("rejects a request without a formula", async () => {
      const res = await post("/api/compliance/calculate", { finishedDosage: 20 });
      const body = await readBody(res);

      expect(res.status).toBe(400);
      expect(body.error).toBe("Invalid request");
    });

    it("answers malformed JSON with 400", async () => {
      const res = await fetch(`${baseUrl}/api/compliance/calculate`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{ formula: ",
      });

      expect(res.status).toBe(400);
    });
  });

  describe("materials", () => {
    it("searches by name", async () => {
      const res = await fetch(`${baseUrl}/api/materials?q=compound`);
      const body = await readBody(res);

      expect(res.status).toBe(200);
      expect(body).toEqual({
        query: "compound",
        materials: [{ key: "compound a", name: "Compound A", constituentCount: 3 }],
      });
    });

    it("requires a query", async () => {
      const res = await fetch(`${baseUrl}/api/materials`);
      expect(res.status).toBe(400);
    });

    it("describes a single material", async () => {
      const res = await fetch(`${baseUrl}/api/materials/${encodeURIComponent("Compound A")}`);
      const body = await readBody(res);

      expect(res.status).toBe(200);
      expect(body.key).toBe("compound a");
      expect(body.totalPercentage).toBe(90);
      expect(body.complete).toBe(true);
    });

    it("returns 404 for unknown materials", async () => {
      const res = await fetch(`${baseUrl}/api/materials/mystery`);
      expect(res.status).toBe(404);
    });
  });

  describe("formula input", () => {
    it("parses pasted text", async () => {
      const res = await post("/api/formula/parse", { text: "Rose Base, 10\nbad line" });
      const body = await readBody(res);

      expect(res.status).toBe(200);
      expect(body).toEqual({
        formula: [{ kind: "amount", name: "Rose Base", amount: 10 }],
        skippedLines: [{ lineNumber: 2, text: "bad line", reason: "Expected 'Name, Amount'" }],
      });
    });

    it("scales a formula to a target total", async () => {
      const res = await post("/api/formula/scale", {
        mode: "total",
        targetTotal: 100,
        formula: [
          { name: "A", amount: 1 },
          { name: "B", amount: "3" },
        ],
      });
      const body = await readBody(res);

      expect(res.status).toBe(200);
      expect(body).toEqual({
        factor: 25,
        formula: [
          { kind: "amount", name: "A", amount: 25 },
          { kind: "amount", name: "B", amount: 75 },
        ],
      });
    });

    it("rejects an unknown scaling mode", async () => {
      const res = await post("/api/formula/scale", { mode: "double", formula: [{ name: "A", amount: 1 }] });
      expect(res.status).toBe(400);
    });
  });
});
