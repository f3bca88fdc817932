import { type Static, Type } from "@sinclair/typebox";

import { BuildOptionsV1, SmokeTestOptionsV1, SourceOptionsV1 } from "./build.js";
import { EnvironmentOptionsV1 } from "./environment.js";
import { ProbeOptionsV1 } from "./probe.js";
import { SandboxOptionsV1 } from "./sandbox.js";

export * from "./build.js";
export * from "./environment.js";
export * from "./probe.js";
export * from "./sandbox.js";

export const SettingsHarnessV1 = Type.Object(
  {
    version: Type.Literal(1),
    probe: Type.Optional(ProbeOptionsV1),
    environment: Type.Optional(EnvironmentOptionsV1),
    source: Type.Optional(SourceOptionsV1),
    build: Type.Optional(BuildOptionsV1),
    smokeTest: Type.Optional(SmokeTestOptionsV1),
    sandbox: Type.Optional(SandboxOptionsV1),
  },
  {
    additionalProperties: false,
    title: "sealcheck settings",
  }
);
export type SettingsHarnessV1 = Static<typeof SettingsHarnessV1>;
