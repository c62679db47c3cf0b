import { describe, expect, it } from "vitest";
import { createApp } from "../../app";

const expensesCsv = "category,month,year,actual,target\nRent,June,2025,100,150\nRent,July,2025,200,150";
const inflowsCsv = "project,month,year,dm inflow actual,dm inflow target\nTower A,July,2025,3000,2500";

const app = createApp({ now: () => new Date(2025, 7, 5), uploadRowLimit: 5 });

function post(path: string, body: unknown) {
  return app.request(path, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body),
  });
}

describe("api v1", () => {
  it("answers health checks", async () => {
    const response = await app.request("/v1/healthz");
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ ok: true });
  });

  it("builds a dashboard from CSV text", async () => {
    const response = await post("/v1/dashboard", {
      expenses: { csv: expensesCsv },
      inflows: { csv: inflowsCsv },
    });
    expect(response.status).toBe(200);
    const body: unknown = await response.json();
    expect(body).toMatchObject({ data: { windows: { mtd: { start: "2025-07-01" } } } });
    expect(body).toHaveProperty("data.reconciliationTable", [
      {
        label: "Total Inflow",
        "MTD Target": 2500,
        "MTD Achieved": 3000,
        "MTD Delta": 500,
        "QTD Target": 2500,
        "QTD Achieved": 3000,
        "QTD Delta": 500,
        "YTD Target": 2500,
        "YTD Achieved": 3000,
        "YTD Delta": 500,
      },
      {
        label: "Rent",
        "MTD Target": 150,
        "MTD Achieved": 200,
        "MTD Delta": 50,
        "QTD Target": 150,
        "QTD Achieved": 200,
        "QTD Delta": 50,
        "YTD Target": 300,
        "YTD Achieved": 300,
        "YTD Delta": 0,
      },
      {
        label: "Total Outflow",
        "MTD Target": 150,
        "MTD Achieved": 200,
        "MTD Delta": 50,
        "QTD Target": 150,
        "QTD Achieved": 200,
        "QTD Delta": 50,
        "YTD Target": 300,
        "YTD Achieved": 300,
        "YTD Delta": 0,
      },
      {
        label: "Net Cash Flow",
        "MTD Target": 2350,
        "MTD Achieved": 2800,
        "MTD Delta": 450,
        "QTD Target": 2350,
        "QTD Achieved": 2800,
        "QTD Delta": 450,
        "YTD Target": 2200,
        "YTD Achieved": 2700,
        "YTD Delta": 500,
      },
    ]);
  });

  it("accepts JSON rows and an explicit reference date", async () => {
    const response = await post("/api/v1/dashboard", {
      expenses: { rows: [{ Category: "Rent", Month: "June", Year: 2025, Actual: 100, Target: 150 }] },
      inflows: {
        rows: [{ Project: "Tower A", Month: "June", Year: 2025, "DM Inflow Actual": 10, "DM Inflow Target": 20 }],
      },
      today: "2025-07-11",
    });
    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      data: {
        windows: { mtd: { start: "2025-06-01" } },
        inflowDistribution: { total: { mtd: 10, qtd: 10, ytd: 10 } },
      },
    });
  });

  it("returns every input error with 422", async () => {
    const response = await post("/v1/dashboard", {
      expenses: { csv: "category,month,year\nRent,Junee,2025" },
      inflows: { csv: inflowsCsv },
    });
    expect(response.status).toBe(422);
    expect(await response.json()).toEqual({
      code: "INPUT_VALIDATION_FAILED",
      errors: [
        {
          code: "MISSING_COLUMNS",
          table: "expenses",
          message: "The expenses table is missing columns: actual, target",
          missing: ["actual", "target"],
        },
      ],
    });
  });

  it("rejects malformed requests", async () => {
    const response = await post("/v1/dashboard", { expenses: { csv: expensesCsv }, today: "2025-02-30" });
    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({ code: "INVALID_REQUEST" });
  });

  it("rejects uploads over the row limit", async () => {
    const rows = Array.from({ length: 6 }, () => "Rent,June,2025,1,1").join("\n");
    const response = await post("/v1/dashboard", {
      expenses: { csv: `category,month,year,actual,target\n${rows}` },
      inflows: { csv: inflowsCsv },
    });
    expect(response.status).toBe(400);
    expect(await response.text()).toBe("CSV_TOO_LARGE");
  });

  it("lists fiscal windows for a date", async () => {
    const response = await app.request("/v1/windows?today=2026-01-15");
    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      data: {
        qtd: { kind: "qtd", start: "2025-10-01", end: "2025-12-01", endsOn: "2025-12-31" },
        ytd: { start: "2025-04-01" },
      },
    });
  });

  it("reads a reference date before year 100 literally", async () => {
    const response = await app.request("/v1/windows?today=0050-03-10");
    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      data: {
        mtd: { kind: "mtd", start: "0050-02-01", end: "0050-02-01", endsOn: "0050-02-28" },
        qtd: { start: "0050-01-01" },
        ytd: { start: "0049-04-01" },
      },
    });
  });

  it("exposes the category catalog", async () => {
    const response = await app.request("/v1/categories");
    expect(await response.json()).toHaveProperty("data.version", 1);
  });
});
