import { afterAll, describe, expect, it } from "vitest";
import { buildApp } from "../src/app.js";

describe("assembled app", () => {
  const appPromise = buildApp({ logger: false, registerInfrastructureHealth: false, lifecycle: { enableBootstrap: false } });

  afterAll(async () => {
    const app = await appPromise;
    await app.close();
  });

  it("reports liveness and echoes the request id", async () => {
    const app = await appPromise;
    const response = await app.inject({ method: "GET", url: "/health" });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: "ok" });
    expect(response.headers["x-request-id"]).toEqual(expect.any(String));
  });

  it("allows the dev frontend to post queries", async () => {
    const app = await appPromise;
    const response = await app.inject({
      method: "OPTIONS",
      url: "/query",
      headers: {
        origin: "http://127.0.0.1:5173",
        "access-control-request-method": "POST"
      }
    });

    expect(response.statusCode).toBe(204);
    expect(response.headers["access-control-allow-origin"]).toBe("http://127.0.0.1:5173");
  });

  it("rejects a query without text before touching any client", async () => {
    const app = await appPromise;
    const response = await app.inject({ method: "POST", url: "/query", payload: { query: "   " } });

    expect(response.statusCode).toBe(422);
    expect(response.json()).toEqual({
      detail: [{ type: "custom", loc: ["body", "query"], msg: "query must not be blank" }]
    });
  });
});
