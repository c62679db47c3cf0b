import { type Context, Hono } from "hono";
import { HTTPException } from "hono/http-exception";
import { z } from "zod";
import { fiscalWindows, parseIsoDate } from "../../calendar/fiscal";
import { DEFAULT_CATEGORY_CATALOG } from "../../config/categories";
import { buildCashFlowDashboard } from "../../dashboard";
import { flattenReconciliationRow } from "../../dashboard/format";
import { parseCsvTable } from "../../ingest/csv";
import type { CategoryCatalog, Table } from "../../types";

export interface ApiOptions {
  catalog?: CategoryCatalog;
  uploadRowLimit?: number;
  /** Reference clock used when a request omits `today`. */
  now?: () => Date;
}

const cellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const tableSchema = z.union([
  z.object({ csv: z.string() }),
  z.object({ rows: z.array(z.record(cellSchema)) }),
]);

const isoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD")
  .transform((value, ctx) => {
    const date = parseIsoDate(value);
    if (!date) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Not a calendar date" });
      return z.NEVER;
    }
    return date;
  });

const dashboardRequestSchema = z.object({
  expenses: tableSchema,
  inflows: tableSchema,
  today: isoDateSchema.optional(),
  project: z.string().optional(),
});

const windowsQuerySchema = z.object({
  today: isoDateSchema.optional(),
});

type TableInput = z.infer<typeof tableSchema>;

function toTable(input: TableInput): Table {
  if ("csv" in input) {
    return parseCsvTable(input.csv);
  }
  const columns = [...new Set(input.rows.flatMap((row) => Object.keys(row)))];
  return { columns, rows: input.rows };
}

function parseBody<T extends z.ZodTypeAny>(schema: T, payload: unknown): z.infer<T> {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new HTTPException(400, {
      message: "INVALID_REQUEST",
      res: new Response(JSON.stringify({ code: "INVALID_REQUEST", issues: parsed.error.issues }), {
        status: 400,
        headers: { "content-type": "application/json" },
      }),
    });
  }
  return parsed.data;
}

async function readJson(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    throw new HTTPException(400, { message: "INVALID_JSON" });
  }
}

export function createApiRouter(options: ApiOptions = {}) {
  const catalog = options.catalog ?? DEFAULT_CATEGORY_CATALOG;
  const uploadRowLimit = options.uploadRowLimit ?? 2000;
  const now = options.now ?? (() => new Date());
  const router = new Hono();

  router.post("/dashboard", async (c) => {
    const payload = parseBody(dashboardRequestSchema, await readJson(c));
    const expenses = toTable(payload.expenses);
    const inflows = toTable(payload.inflows);
    if (expenses.rows.length > uploadRowLimit || inflows.rows.length > uploadRowLimit) {
      throw new HTTPException(400, { message: "CSV_TOO_LARGE" });
    }

    const result = buildCashFlowDashboard({
      expenses,
      inflows,
      today: payload.today ?? now(),
      project: payload.project,
      catalog,
    });
    if (!result.success) {
      return c.json(
        {
          code: result.error.code,
          errors: result.error.errors.map((error) => error.toJSON()),
        },
        422,
      );
    }

    const dashboard = result.data;
    return c.json({
      data: {
        ...dashboard,
        reconciliationTable: dashboard.reconciliation.map(flattenReconciliationRow),
      },
    });
  });

  router.get("/windows", (c) => {
    const query = parseBody(windowsQuerySchema, c.req.query());
    return c.json({ data: fiscalWindows(query.today ?? now()) });
  });

  router.get("/categories", (c) => c.json({ data: catalog }));

  return router;
}
