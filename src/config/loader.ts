// Config loader: reads ~/.config/account-lockdown/config.yaml and deep-merges it over defaults.
// On first run (no config file) it writes DEFAULT_CONFIG_YAML and returns firstRun: true.
// The merged result is validated against ConfigSchema; an unreadable or invalid file throws INVALID_CONFIG.
// Config shape is defined in src/types/config.ts; add new fields there, here and in the YAML.
import { readFileSync, writeFileSync, mkdirSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { homedir } from "node:os";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { LockdownConfig, PermissionBaseline } from "../types/config.js";
import type { FilePermissions } from "../fs/file-access.js";
import { DEFAULT_UID_THRESHOLD } from "../accounts/types.js";
import { LockdownError, LockdownErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

const DEFAULT_CONFIG_DIR = join(homedir(), ".config", "account-lockdown");
const DEFAULT_CONFIG_PATH = join(DEFAULT_CONFIG_DIR, "config.yaml");

export const DEFAULT_CONFIG: LockdownConfig = {
  passwd_path: "/etc/passwd",
  state_dir: "/var/lib/account-lockdown",
  baseline: { uid: 0, gid: 0, mode: "0644" },
  rules: {
    block_system_accounts: { enabled: true, uid_threshold: DEFAULT_UID_THRESHOLD },
  },
  safety: { confirmation_threshold: "high", dry_run_bypass_confirmation: true },
};

/** Default config YAML written on first run. */
const DEFAULT_CONFIG_YAML = `# System Account Lockdown: configuration
# Generated automatically on first run. All values shown are defaults.

passwd_path: /etc/passwd

# Change journal and original-content snapshots used by accounts_undo
state_dir: /var/lib/account-lockdown

# Ownership and mode enforced on the account database
baseline:
  uid: 0
  gid: 0
  mode: "0644"

rules:
  block_system_accounts:
    # Set to false (or no) if system accounts on this host need valid
    # shells; accounts_fix then makes no changes.
    enabled: true
    # UIDs at or above this value are human accounts and are never blocked
    uid_threshold: ${DEFAULT_UID_THRESHOLD}

safety:
  confirmation_threshold: high
  dry_run_bypass_confirmation: true

# Platform override (auto-detected if omitted)
# platform:
#   family: linux
#   version: "9.3"
`;

// YAML 1.2 reads yes/no/on/off as strings; take them as booleans too
const TOGGLE_WORDS: Record<string, boolean> = { true: true, yes: true, on: true, false: false, no: false, off: false };

const ToggleSchema = z.preprocess(
  (value) => (typeof value === "string" ? TOGGLE_WORDS[value.trim().toLowerCase()] ?? value : value),
  z.boolean({ invalid_type_error: "must be true/false or yes/no" }),
);

const RiskLevelSchema = z.enum(["read-only", "low", "moderate", "high", "critical"]);

const ConfigSchema = z.object({
  passwd_path: z.string().min(1),
  state_dir: z.string().min(1),
  baseline: z.object({
    uid: z.number().int().nonnegative(),
    gid: z.number().int().nonnegative(),
    mode: z.string().regex(/^0?[0-7]{3,4}$/, "mode must be an octal string such as \"0644\""),
  }),
  rules: z.object({
    block_system_accounts: z.object({
      enabled: ToggleSchema,
      uid_threshold: z.number().int().positive(),
    }),
  }),
  safety: z.object({
    confirmation_threshold: RiskLevelSchema,
    dry_run_bypass_confirmation: z.boolean(),
  }),
  platform: z
    .object({
      family: z.enum(["linux", "solaris", "freebsd", "darwin", "unknown"]),
      name: z.string(),
      version: z.string(),
      mac_system: z.enum(["selinux", "apparmor", "none"]),
    })
    .partial()
    .optional(),
});

export interface ConfigResult {
  config: LockdownConfig;
  configPath: string;
  firstRun: boolean;
}

export function loadConfig(explicitPath?: string): ConfigResult {
  const configPath = explicitPath ?? DEFAULT_CONFIG_PATH;

  if (!existsSync(configPath)) {
    logger.info({ configPath }, "No config file found, generating defaults (first run)");
    try {
      mkdirSync(dirname(configPath), { recursive: true });
      writeFileSync(configPath, DEFAULT_CONFIG_YAML, "utf-8");
    } catch (err) {
      logger.warn({ configPath, error: err }, "Could not write default config file");
    }
    return { config: structuredClone(DEFAULT_CONFIG), configPath, firstRun: true };
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(configPath, "utf-8"));
  } catch (err) {
    const cause = err instanceof Error ? err.message : String(err);
    logger.error({ configPath, error: cause }, "Failed to read config");
    throw new LockdownError(LockdownErrorCode.INVALID_CONFIG, `${configPath} could not be read: ${cause}`, { configPath });
  }

  // An invalid file is fatal: falling back to defaults would re-enable a rule the user turned off
  const merged = deepMerge(toRecord(DEFAULT_CONFIG), isPlainObject(parsed) ? parsed : {});
  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    logger.error({ configPath, issues }, "Invalid config");
    throw new LockdownError(LockdownErrorCode.INVALID_CONFIG, `${configPath} is invalid: ${issues.join("; ")}`, { configPath, issues });
  }
  const config: LockdownConfig = result.data;
  return { config, configPath, firstRun: false };
}

/** Baseline ownership/mode from config as numeric permissions. */
export function baselinePermissions(baseline: PermissionBaseline): FilePermissions {
  return { uid: baseline.uid, gid: baseline.gid, mode: Number.parseInt(baseline.mode, 8) };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function toRecord(config: LockdownConfig): Record<string, unknown> {
  return { ...config };
}

/** Deep merge b into a (a provides defaults, b overrides). */
function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...a };
  for (const key of Object.keys(b)) {
    const aVal = a[key];
    const bVal = b[key];
    if (isPlainObject(aVal) && isPlainObject(bVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}
