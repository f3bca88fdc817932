// pattern: Functional Core
// Platform detection for choosing a sandbox implementation

import { SandboxPlatform } from "./types.js";

export { SandboxPlatform };

/**
 * Detect the current platform for sandbox selection
 */
export function getPlatform(): SandboxPlatform {
  switch (process.platform) {
    case "linux":
      return SandboxPlatform.Linux;
    case "darwin":
      return SandboxPlatform.MacOS;
    case "win32":
      return SandboxPlatform.Windows;
    default:
      return SandboxPlatform.Unknown;
  }
}

/**
 * Only Linux has a sandbox that can take the network away (bubblewrap)
 */
export function isSandboxSupported(): boolean {
  return getPlatform() === SandboxPlatform.Linux;
}

/**
 * System paths a toolchain needs to start: binaries, shared libraries,
 * certificates and the dynamic loader's configuration
 */
export function getDefaultSystemPaths(): string[] {
  if (getPlatform() !== SandboxPlatform.Linux) {
    return [];
  }
  return [
    "/usr",
    "/bin",
    "/sbin",
    "/lib",
    "/lib32",
    "/lib64",
    "/etc/alternatives",
    "/etc/ld.so.cache",
    "/etc/ld.so.conf",
    "/etc/ld.so.conf.d",
    "/etc/ssl",
    "/etc/passwd",
    "/etc/group",
  ];
}
