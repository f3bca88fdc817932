// pattern: Imperative Shell
// Main entry point for the sandboxing module.
// Exports public APIs and integrates with CommandBuilder.

export { SandboxImplementation } from "./base.js";
export { createSandbox } from "./factory.js";
export {
  getDefaultSystemPaths,
  getPlatform,
  isSandboxSupported,
} from "./platform.js";
export type { SandboxResolverOptions } from "./resolver.js";
export { overlayPaths, resolveSandboxConfig } from "./resolver.js";
export type {
  FinalizedSandboxConfig,
  SandboxArgs,
  SandboxConfig,
} from "./types.js";
export { SandboxPlatform } from "./types.js";
