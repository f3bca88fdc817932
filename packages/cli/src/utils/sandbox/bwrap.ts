// pattern: Mixed (unavoidable)
// Bubblewrap sandbox implementation for Linux.
// Builds command-line arguments for bwrap while also performing validation.

import { execFileSync } from "node:child_process";
import { existsSync } from "node:fs";

import which from "which";

import { SandboxImplementation } from "./base.js";

import type { SandboxArgs } from "./types.js";

/**
 * Bubblewrap (bwrap) sandbox implementation for Linux.
 * Always unshares the network namespace; the rest of the host is visible
 * only through the configured binds.
 */
export class BwrapSandbox extends SandboxImplementation {
  private bwrapPath: string | null = null;
  private validated = false;

  readonly name = "bubblewrap";

  buildSandboxArgs(
    command: string,
    args: string[],
    cwd?: string
  ): SandboxArgs | null {
    if (!this.config.enabled) {
      return null;
    }

    const bwrapArgs: string[] = [];

    this.addSecurityFlags(bwrapArgs);
    // No loopback-only exception: the build gets no network at all
    bwrapArgs.push("--unshare-net");
    this.addFilesystemMounts(bwrapArgs);

    if (cwd !== undefined) {
      bwrapArgs.push("--chdir", cwd);
    }

    bwrapArgs.push("--");
    bwrapArgs.push(command);
    bwrapArgs.push(...args);

    return {
      executable: this.bwrapPath ?? "bwrap",
      args: bwrapArgs,
    };
  }

  /**
   * Add security-related flags for namespace isolation and capability dropping
   */
  private addSecurityFlags(args: string[]): void {
    args.push("--new-session");
    args.push("--die-with-parent");
    args.push("--unshare-user");
    args.push("--unshare-pid");
    args.push("--unshare-ipc");
    args.push("--unshare-uts");
    args.push("--unshare-cgroup");
    args.push("--cap-drop", "ALL");
    args.push("--hostname", "sealcheck");

    // No --clearenv: the caller passes the merged environment to the child
  }

  /**
   * Add filesystem mount configurations
   */
  private addFilesystemMounts(args: string[]): void {
    args.push("--proc", "/proc");
    args.push("--dev", "/dev");
    args.push("--tmpfs", "/tmp");

    for (const path of this.config.allowRead) {
      if (existsSync(path)) {
        args.push("--ro-bind", path, path);
      } else {
        this.logger.debug({ path }, "Skipping non-existent read-only path");
      }
    }

    // Read-write binds come last so they win over a read-only parent
    for (const path of this.config.allowReadWrite) {
      if (existsSync(path)) {
        args.push("--bind", path, path);
      } else {
        this.logger.warn({ path }, "Skipping non-existent read-write path");
      }
    }
  }

  async validate(): Promise<boolean> {
    if (this.validated) {
      return this.bwrapPath !== null;
    }
    this.validated = true;

    const bwrapPath = await which("bwrap", { nothrow: true });
    if (bwrapPath === null) {
      this.logger.debug("Bwrap not found in PATH");
      return false;
    }
    this.logger.debug({ bwrapPath }, "Found bwrap binary");

    // Test basic functionality with a minimal sandbox
    try {
      execFileSync(
        bwrapPath,
        ["--ro-bind", "/", "/", "--unshare-net", "/bin/true"],
        { encoding: "utf-8", stdio: "pipe" }
      );
    } catch (testError) {
      const errorMessage =
        testError instanceof Error ? testError.message : String(testError);
      if (this.isUserNamespaceRestriction(errorMessage)) {
        this.logger.warn(
          { error: errorMessage },
          "Bubblewrap failed due to user namespace restrictions, likely AppArmor policy"
        );
        this.logger.info(
          "Workaround: 'sudo sysctl -w kernel.apparmor_restrict_unprivileged_userns=0' " +
            "allows unprivileged user namespaces until the next reboot"
        );
      } else {
        this.logger.error(
          { error: testError },
          "Bwrap is installed but failed basic functionality test"
        );
      }
      return false;
    }

    this.logger.debug("Bwrap validation successful");
    this.bwrapPath = bwrapPath;
    return true;
  }

  /**
   * Check if the error is related to AppArmor user namespace restrictions
   */
  private isUserNamespaceRestriction(errorMessage: string): boolean {
    const indicators = [
      "loopback: Failed RTM_NEWADDR: Operation not permitted",
      "setting up uid map: Permission denied",
      "No permissions to create new namespace",
      "Operation not permitted",
    ];

    return indicators.some(indicator =>
      errorMessage.toLowerCase().includes(indicator.toLowerCase())
    );
  }
}
