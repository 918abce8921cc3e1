import type { RiskLevel } from "./risk.js";
import type { PlatformFamily, MACSystem } from "./platform.js";

/** Ownership and mode every account database must end up with. */
export interface PermissionBaseline {
  uid: number;
  gid: number;
  /** Octal string as written in YAML, e.g. "0644". */
  mode: string;
}

/** Settings for the BlockSystemAccounts rule. */
export interface BlockSystemAccountsSettings {
  /** Configuration item "blocksysaccounts": when false, fix makes no changes. */
  enabled: boolean;
  /** First UID treated as a human account. */
  uid_threshold: number;
}

/** Full server configuration. */
export interface LockdownConfig {
  passwd_path: string;
  state_dir: string;
  baseline: PermissionBaseline;
  rules: {
    block_system_accounts: BlockSystemAccountsSettings;
  };
  safety: {
    confirmation_threshold: RiskLevel;
    dry_run_bypass_confirmation: boolean;
  };
  platform?: Partial<{
    family: PlatformFamily;
    name: string;
    version: string;
    mac_system: MACSystem;
  }>;
}
