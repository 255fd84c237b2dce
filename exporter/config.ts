import * as path from "path";
import { z } from "zod";

const ConfigSchema = z.object({
  port: z.coerce.number().int().positive().default(3000),
  bucket: z.string().min(1).optional(),
  region: z.string().min(1).default("us-east-1"),
  cdnUrl: z.string().min(1).optional(),
  outputDir: z.string().min(1).default(path.resolve(__dirname, "..", "output")),
  presignTtlSeconds: z.coerce.number().int().positive().default(900),
});

export type ExporterConfig = z.infer<typeof ConfigSchema>;

let cachedConfig: ExporterConfig | null = null;

/**
 * Reads the exporter settings from the environment. Empty variables count as
 * unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ExporterConfig {
  const blank = (value: string | undefined) => (value && value.trim() ? value.trim() : undefined);
  const parsed = ConfigSchema.safeParse({
    port: blank(env.PORT),
    bucket: blank(env.EXPORT_BUCKET),
    region: blank(env.AWS_REGION),
    cdnUrl: blank(env.CDN_URL),
    outputDir: blank(env.EXPORT_OUTPUT_DIR),
    presignTtlSeconds: blank(env.EXPORT_LINK_TTL),
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid exporter configuration: ${issues}`);
  }
  return parsed.data;
}

export function getConfig(): ExporterConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
    console.log(`[config] bucket=${cachedConfig.bucket ?? "(none, local output)"} region=${cachedConfig.region}`);
  }
  return cachedConfig;
}
