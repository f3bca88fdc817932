import { brandedString } from "@coderspirit/nominal-typebox";
import { type Static } from "@sinclair/typebox";

export const ArgStringTemplate = brandedString<"ArgStringTemplate">({
  description:
    "A Mustache template string resolved into a literal command argument at runtime. Variables: output, sourceDir, env.",
});
export type ArgStringTemplate = Static<typeof ArgStringTemplate>;

export const ConfigPathString = brandedString<"ConfigPathString">({
  description:
    "A filesystem path. Relative paths resolve against the directory holding the config file.",
});
export type ConfigPathString = Static<typeof ConfigPathString>;
