import { type Static, Type } from "@sinclair/typebox";

import { ArgStringTemplate, ConfigPathString } from "../utils.js";

export const SourceOptionsV1 = Type.Object(
  {
    dir: Type.Optional(ConfigPathString),
  },
  { additionalProperties: false }
);
export type SourceOptionsV1 = Static<typeof SourceOptionsV1>;

export const BuildOptionsV1 = Type.Object(
  {
    command: Type.Optional(
      Type.String({
        minLength: 1,
        description:
          "The toolchain executable, looked up on PATH unless absolute.",
        default: "go",
      })
    ),
    args: Type.Optional(Type.Array(ArgStringTemplate)),
    output: Type.Optional(ConfigPathString),
  },
  { additionalProperties: false }
);
export type BuildOptionsV1 = Static<typeof BuildOptionsV1>;

export const SmokeTestOptionsV1 = Type.Object(
  {
    args: Type.Optional(Type.Array(ArgStringTemplate)),
    timeoutMs: Type.Optional(
      Type.Integer({
        minimum: 1,
        description: "How long the artifact may run before it is killed.",
        default: 10000,
      })
    ),
  },
  { additionalProperties: false }
);
export type SmokeTestOptionsV1 = Static<typeof SmokeTestOptionsV1>;
