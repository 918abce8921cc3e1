/** OS family as far as account-database rules care. */
export type PlatformFamily = "linux" | "solaris" | "freebsd" | "darwin" | "unknown";

/** Mandatory access control system. */
export type MACSystem = "selinux" | "apparmor" | "none";

/**
 * Runtime platform context populated at startup.
 * Consumed by applicability checks and by security-label handling.
 */
export interface PlatformContext {
  readonly family: PlatformFamily;
  /** Marketing name, e.g. "Rocky Linux" or "Mac OS X". */
  readonly name: string;
  readonly version: string;
  readonly mac_system: MACSystem;
}
