const Series = {
  type: "array",
  items: {
    type: "object",
    properties: { period_start: { type: "string", format: "date-time" }, kwh: { type: "number" } }
  }
};

export const openapi = {
  openapi: "3.0.3",
  info: { title: "Campus Energy API", version: "1.0.0" },
  servers: [{ url: "/" }],
  components: {
    securitySchemes: {
      BearerAuth: { type: "http", scheme: "bearer" }
    },
    schemas: {
      RowsSource: {
        type: "object",
        required: ["origin","rows"],
        properties: {
          origin: { type: "string", description: "Source label; file-like names infer Building (Library.csv -> Library)" },
          rows: {
            type: "array",
            items: {
              type: "object",
              properties: {
                Date: { type: "string", example: "2023-01-01" },
                KWH: { type: "number", minimum: 0 },
                Building: { type: "string" },
                Month: { description: "ignored; derived from Date" }
              }
            }
          }
        }
      },
      CsvSource: {
        type: "object",
        required: ["origin","csv"],
        properties: {
          origin: { type: "string" },
          csv: { type: "string", description: "CSV text with a header row (Date,KWH[,Building])" }
        }
      },
      RunRequest: {
        type: "object",
        properties: {
          sources: { type: "array", maxItems: 100, items: { oneOf: [{ $ref: "#/components/schemas/RowsSource" }, { $ref: "#/components/schemas/CsvSource" }] } },
          bins: { type: "integer", minimum: 1, maximum: 500 },
          publish: { type: "boolean", default: false }
        }
      },
      Diagnostic: {
        type: "object",
        properties: {
          kind: { type: "string", enum: ["SOURCE_UNAVAILABLE","RECORD_MALFORMED","VALIDATION_FAILURE"] },
          origin: { type: "string" },
          row: { type: "integer" },
          reason: { type: "string" },
          message: { type: "string" }
        }
      },
      RunResult: {
        type: "object",
        required: ["status","diagnostics"],
        properties: {
          status: { type: "string", enum: ["ok","insufficient_data"] },
          reason: { type: "string" },
          rows: { type: "integer" },
          daily_totals: Series,
          weekly_totals: Series,
          building_summary: { type: "array", items: { type: "object" } },
          ledger_reports: { type: "array", items: { type: "object" } },
          summary: { type: "object" },
          views: { type: "object" },
          text: { type: "string" },
          diagnostics: { type: "array", items: { $ref: "#/components/schemas/Diagnostic" } }
        }
      }
    }
  },
  tags: [{ name: "Runs" }, { name: "Demo" }],
  paths: {
    "/v1/healthz": {
      get: {
        tags: ["Runs"],
        summary: "Service health",
        responses: { "200": { description: "OK" } }
      }
    },
    "/v1/runs": {
      post: {
        tags: ["Runs"],
        summary: "Ingest sources and compute rollups, building summary and executive summary",
        security: [{ BearerAuth: [] }],
        requestBody: {
          required: true,
          content: { "application/json": { schema: { $ref: "#/components/schemas/RunRequest" } } }
        },
        responses: {
          "200": { description: "Run finished (status ok or insufficient_data)", content: { "application/json": { schema: { $ref: "#/components/schemas/RunResult" } } } },
          "401": { description: "Unauthorized" },
          "422": { description: "Validation error" },
          "502": { description: "Publishing failed" },
          "503": { description: "Publishing not configured" }
        }
      }
    },
    "/simulate/run": {
      post: {
        tags: ["Demo"],
        summary: "Run the pipeline over generated sample buildings",
        requestBody: {
          required: false,
          content: { "application/json": { schema: {
            type: "object",
            properties: {
              buildings: { type: "array", items: { type: "string" }, default: ["Library","Dormitory","Cafeteria"] },
              from: { type: "string", format: "date", default: "2023-01-01" },
              days: { type: "integer", minimum: 1, maximum: 366, default: 28 },
              seed: { type: "integer", description: "Repeatable random readings" }
            }
          } } }
        },
        responses: { "200": { description: "OK" }, "422": { description: "Validation error" } }
      }
    }
  }
};
