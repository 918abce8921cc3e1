import { readFileSync } from "node:fs";
import { execSync } from "node:child_process";
import { platform as osPlatform, release as osRelease } from "node:os";
import type { PlatformContext, PlatformFamily, MACSystem } from "../types/platform.js";
import { logger } from "../logger.js";

/** Parse /etc/os-release into key-value pairs. */
export function parseOsRelease(content: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const line of content.split("\n")) {
    const match = line.match(/^([A-Z_]+)=(.*)$/);
    if (match) {
      result[match[1]] = match[2].replace(/^["']|["']$/g, "");
    }
  }
  return result;
}

/** Map Node's platform identifier to the families the rules know about. */
export function resolveFamily(nodePlatform: string): PlatformFamily {
  switch (nodePlatform) {
    case "linux":
      return "linux";
    case "sunos":
      return "solaris";
    case "freebsd":
      return "freebsd";
    case "darwin":
      return "darwin";
    default:
      logger.warn({ platform: nodePlatform }, "Unrecognised platform family");
      return "unknown";
  }
}

/** Run a command and return trimmed stdout, or null on failure. */
function tryExec(cmd: string): string | null {
  try {
    return execSync(cmd, { encoding: "utf-8", stdio: ["ignore", "pipe", "ignore"], timeout: 5_000 }).trim();
  } catch {
    return null;
  }
}

function detectMacSystem(): MACSystem {
  const getenforce = tryExec("getenforce 2>/dev/null");
  if (getenforce && ["enforcing", "permissive"].includes(getenforce.toLowerCase())) return "selinux";
  if (tryExec("test -d /sys/module/apparmor && echo yes") === "yes") return "apparmor";
  return "none";
}

/**
 * Detect the local platform and populate PlatformContext.
 * Accepts optional overrides from config.yaml.
 */
export function detectPlatform(overrides?: Partial<PlatformContext>): PlatformContext {
  const family = resolveFamily(osPlatform());
  let name: string = family;
  let version = osRelease();
  let macSystem: MACSystem = "none";

  if (family === "linux") {
    try {
      const fields = parseOsRelease(readFileSync("/etc/os-release", "utf-8"));
      name = fields.NAME ?? fields.ID ?? "Linux";
      version = fields.VERSION_ID ?? version;
    } catch {
      logger.warn("Could not read /etc/os-release; using kernel release as version");
    }
    macSystem = detectMacSystem();
  } else if (family === "darwin") {
    name = "Mac OS X";
    version = tryExec("sw_vers -productVersion") ?? version;
  }

  // Only explicitly set override fields replace detected values
  const context: PlatformContext = {
    family: overrides?.family ?? family,
    name: overrides?.name ?? name,
    version: overrides?.version ?? version,
    mac_system: overrides?.mac_system ?? macSystem,
  };
  logger.info({ platform: context }, "Platform detection complete");
  return context;
}

/** True when the process can change root-owned files. */
export function isRunningAsRoot(): boolean {
  return typeof process.getuid === "function" && process.getuid() === 0;
}
