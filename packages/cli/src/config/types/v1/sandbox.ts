import { type Static, Type } from "@sinclair/typebox";

import { ConfigPathString } from "../utils.js";

export const SandboxOptionsV1 = Type.Object(
  {
    enabled: Type.Optional(
      Type.Boolean({
        description:
          "Run the build and smoke test inside a network-less sandbox (bubblewrap on Linux). Defaults to false.",
        default: false,
      })
    ),
    allowRead: Type.Optional(
      Type.Array(ConfigPathString, {
        description:
          "Extra paths the build can read+execute. System paths are always included.",
      })
    ),
    allowReadWrite: Type.Optional(
      Type.Array(ConfigPathString, {
        description:
          "Extra paths the build can read+write+execute, such as the toolchain's build cache.",
      })
    ),
  },
  { additionalProperties: false }
);
export type SandboxOptionsV1 = Static<typeof SandboxOptionsV1>;
