import { type Static, Type } from "@sinclair/typebox";

import { ConfigPathString } from "../utils.js";

export const ENVIRONMENT_FILE_FORMATS_V1 = ["auto", "env", "json"] as const;
export const EnvironmentFileFormatV1 = Type.Union(
  ENVIRONMENT_FILE_FORMATS_V1.map(value => Type.Literal(value))
);
export type EnvironmentFileFormatV1 = Static<typeof EnvironmentFileFormatV1>;

export const EnvironmentOptionsV1 = Type.Object(
  {
    file: Type.Optional(ConfigPathString),
    format: Type.Optional(EnvironmentFileFormatV1),
  },
  {
    additionalProperties: false,
    description:
      "The environment file written by the dependency prefetch tool, as shell KEY=VALUE lines or a JSON list of {name, value}.",
  }
);
export type EnvironmentOptionsV1 = Static<typeof EnvironmentOptionsV1>;
