import { readFileSync } from "fs";
import { dirname, resolve } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { findPackageRoot } from "../util/findPackageRoot.js";
import { ConfigError } from "../util/errors.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

const LocationSchema = z.object({
  countryCode: z.string(),
  countryName: z.string(),
  state: z.string(),
  city: z.string(),
  zipCode: z.string(),
  lat: z.number(),
  lng: z.number(),
  tz: z.string(),
  utcOffset: z.number().int(),
});

const nonEmpty = <T extends z.ZodTypeAny>(item: T) => z.array(item).min(1);

export const RecordTablesSchema = z.object({
  locations: nonEmpty(LocationSchema),
  networkTypes: nonEmpty(z.string()),
  isps: nonEmpty(z.string()),
  organizations: nonEmpty(z.string()),
  connectionTypes: nonEmpty(z.string()),
  usageTypes: nonEmpty(z.string()),
  bandwidthTiers: nonEmpty(z.string()),
  carriers: nonEmpty(z.string()),
  lineSpeeds: nonEmpty(z.string()),
  privacyLevels: nonEmpty(z.string()),
  regions: nonEmpty(z.string()),
  tags: z.array(z.string()).min(5),
  asns: nonEmpty(z.object({ asn: z.number().int(), name: z.string() })),
  domains: nonEmpty(z.string()),
  dnsServers: z.array(z.string()).min(4),
  noteTemplates: nonEmpty(z.string()),
  scanFrequencies: nonEmpty(z.string()),
  monitoringLevels: nonEmpty(z.string()),
  complianceStatuses: nonEmpty(z.string()),
  retentionDays: nonEmpty(z.number().int()),
  lastUpdated: z.string(),
  dataSource: z.string(),
});

export type RecordTables = z.infer<typeof RecordTablesSchema>;
export type Location = z.infer<typeof LocationSchema>;

let cached: RecordTables | null = null;

export function defaultTablesPath(): string {
  return resolve(findPackageRoot(__dirname), "data", "record-tables.json");
}

export function loadRecordTables(filePath: string = defaultTablesPath()): RecordTables {
  if (cached && filePath === defaultTablesPath()) {
    return cached;
  }

  const result = RecordTablesSchema.safeParse(
    JSON.parse(readFileSync(filePath, "utf-8")),
  );
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new ConfigError(`Invalid record tables in ${filePath}:\n${errors}`);
  }

  if (filePath === defaultTablesPath()) {
    cached = result.data;
  }
  return result.data;
}
