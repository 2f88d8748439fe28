import { existsSync, readFileSync } from "fs";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import type { VersionOptions } from "../types.js";
import { findPackageRoot } from "../../util/findPackageRoot.js";
import { TOOL_NAME, TOOL_VERSION } from "../../config/constants.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

const PackageJsonSchema = z.object({ version: z.string() });

export async function versionCommand(_options: VersionOptions): Promise<void> {
  const version = getVersion();

  console.log(`${TOOL_NAME} version: ${version}`);
  console.log("");
  console.log("Environment:");
  console.log(`  Node.js: ${process.version}`);
  console.log(`  Platform: ${process.platform}`);
  console.log(`  Arch: ${process.arch}`);
}

function getVersion(): string {
  const packageFile = resolve(findPackageRoot(__dirname), "package.json");
  if (!existsSync(packageFile)) {
    return TOOL_VERSION;
  }
  const parsed = PackageJsonSchema.safeParse(
    JSON.parse(readFileSync(packageFile, "utf-8")),
  );
  return parsed.success ? parsed.data.version : TOOL_VERSION;
}
