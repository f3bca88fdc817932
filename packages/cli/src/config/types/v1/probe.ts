import { type Static, Type } from "@sinclair/typebox";

export const ProbeOptionsV1 = Type.Object(
  {
    url: Type.Optional(
      Type.String({
        format: "uri",
        description:
          "The URL that must NOT be reachable from the build environment. A HEAD request is sent to it.",
        default: "https://proxy.golang.org",
        errorMessage: { format: "must be an absolute URL such as https://host" },
      })
    ),
    timeoutMs: Type.Optional(
      Type.Integer({
        minimum: 1,
        maximum: 60000,
        description:
          "How long to wait for the probe before treating the host as unreachable.",
        default: 5000,
      })
    ),
  },
  { additionalProperties: false }
);
export type ProbeOptionsV1 = Static<typeof ProbeOptionsV1>;
