import fs from "fs";
import path from "path";
import { errorMessage } from "./errors";
import type { VersionInfo } from "./types";

export const SERVICE_NAME = "wikipedia-agent";

function readManifestVersion(): string | undefined {
  try {
    const raw = fs.readFileSync(path.join(__dirname, "..", "package.json"), "utf-8");
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed === "object" && parsed !== null && "version" in parsed) {
      return typeof parsed.version === "string" ? parsed.version : undefined;
    }
  } catch (e) {
    console.warn("[version] package.json not readable:", errorMessage(e));
  }
  return undefined;
}

// APP_VERSION is set by the deploy script; the manifest is the fallback
export function resolveVersion(env: Record<string, string | undefined> = process.env): string {
  const injected = env.APP_VERSION?.trim();
  if (injected) return injected;
  return readManifestVersion() || "dev";
}

export function versionInfo(version: string): VersionInfo {
  return { name: SERVICE_NAME, version };
}
