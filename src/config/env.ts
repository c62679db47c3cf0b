import { z } from "zod";

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  CATEGORY_CATALOG_PATH: z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : undefined)),
  UPLOAD_ROW_LIMIT: z.coerce.number().int().positive().default(2000),
});

export interface AppConfig {
  port: number;
  categoryCatalogPath?: string;
  uploadRowLimit: number;
}

export function readConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid environment configuration. ${issues.join("; ")}`);
  }
  return {
    port: parsed.data.PORT,
    categoryCatalogPath: parsed.data.CATEGORY_CATALOG_PATH,
    uploadRowLimit: parsed.data.UPLOAD_ROW_LIMIT,
  };
}
