import { Hono } from "hono";
import { HTTPException } from "hono/http-exception";
import { z } from "zod";
import { createApiRouter, type ApiOptions } from "./api/v1";

const healthSchema = z.object({
  status: z.literal("ok"),
});

export function createApp(options: ApiOptions = {}) {
  const app = new Hono();
  const apiRouter = createApiRouter(options);

  app.get("/", (c) => {
    const payload = healthSchema.parse({ status: "ok" });
    return c.json({
      message: "Cash Flow Ledger API",
      ...payload,
    });
  });

  app.get("/v1/healthz", (c) => c.json({ ok: true }));

  app.route("/v1", apiRouter);
  app.route("/api/v1", apiRouter);

  app.onError((error, c) => {
    if (error instanceof HTTPException) {
      return error.getResponse();
    }
    console.error(`❌ ${c.req.method} ${c.req.path} failed:`, error);
    return c.json({ code: "INTERNAL_ERROR", message: "Unexpected server error" }, 500);
  });

  return app;
}
