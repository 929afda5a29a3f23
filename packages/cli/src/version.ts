import { readFileSync } from "node:fs";

const DEV_VERSION = "0.0.0-dev";

/**
 * Version from this package's package.json, which sits one directory up
 * from both src/ and dist/.
 */
function readVersion(): string {
  try {
    const manifest: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
    if (typeof manifest === "object" && manifest !== null && "version" in manifest) {
      return typeof manifest.version === "string" ? manifest.version : DEV_VERSION;
    }
    return DEV_VERSION;
  } catch {
    return DEV_VERSION;
  }
}

export const version = readVersion();
