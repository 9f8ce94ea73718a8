import { createRequire } from "node:module";

// Sources live in src/; the build output adds one level (dist/src/).
const PACKAGE_JSON_CANDIDATES = ["../package.json", "../../package.json"];

function readVersionFromPackageJson(): string | null {
  const require = createRequire(import.meta.url);
  for (const candidate of PACKAGE_JSON_CANDIDATES) {
    try {
      const pkg: { name?: string; version?: string } = require(candidate);
      if (pkg.name === "cloud-optimizer" && pkg.version) return pkg.version;
    } catch {
      // try the next location
    }
  }
  return null;
}

export const VERSION =
  process.env.CLOUD_OPTIMIZER_VERSION || readVersionFromPackageJson() || "0.0.0";
