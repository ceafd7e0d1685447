import { readFileSync } from "node:fs";

// Resolves to packages/cli/package.json from both src/ and dist/
const packageJson: unknown = JSON.parse(
  readFileSync(new URL("../package.json", import.meta.url), "utf-8")
);

function versionOf(value: unknown): string {
  if (typeof value === "object" && value !== null && "version" in value) {
    return typeof value.version === "string" ? value.version : "0.0.0-dev";
  }
  return "0.0.0-dev";
}

export const version = versionOf(packageJson);
