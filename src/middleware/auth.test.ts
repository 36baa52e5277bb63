import { Hono } from "hono";
import { describe, expect, test } from "vitest";
import { bearerAuth } from "./auth.js";

const app = new Hono();
app.use("/mcp", bearerAuth("test-secret"));
app.post("/mcp", (c) => c.text("ok"));

describe("bearerAuth", () => {
  test("passes a matching token through", async () => {
    const res = await app.request("/mcp", {
      method: "POST",
      headers: { Authorization: "Bearer test-secret" },
    });
    expect(res.status).toBe(200);
    expect(await res.text()).toBe("ok");
  });

  test("rejects a missing header", async () => {
    const res = await app.request("/mcp", { method: "POST" });
    expect(res.status).toBe(401);
    expect(await res.json()).toMatchObject({ error: "unauthorized" });
  });

  test("rejects a wrong token", async () => {
    const res = await app.request("/mcp", {
      method: "POST",
      headers: { Authorization: "Bearer not-the-secret" },
    });
    expect(res.status).toBe(401);
    expect(await res.json()).toMatchObject({ error: "invalid_token" });
  });
});
