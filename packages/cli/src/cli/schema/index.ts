// pattern: Imperative Shell

import { Command } from "@commander-js/extra-typings";
import YAML from "yaml";

import { SettingsHarnessV1 } from "../../config/types/v1/index.js";
import { withErrorHandling } from "../_utils/with-error-handling.js";
import { parseChoice } from "../_utils/parse-options.js";

const SCHEMA_FORMATS = ["json", "yaml"] as const;
type SchemaFormat = (typeof SCHEMA_FORMATS)[number];

/**
 * Renders a TypeBox schema in the requested format
 */
export function renderSchema(schema: object, format: SchemaFormat): string {
  if (format === "json") {
    return `${JSON.stringify(schema, null, 2)}\n`;
  }
  return YAML.stringify(schema);
}

/**
 * Creates the `schema` command
 */
// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeSchemaCommand() {
  return new Command("schema")
    .description("Output the JSON schema of the sealcheck config file")
    .addHelpText(
      "before",
      `
Output the JSON Schema definition of sealcheck.yaml (and its .yml, .json and
.toml variants). Useful for editor integration and validation tooling.
      `
    )
    .addHelpText(
      "after",
      `
Examples:
  sealcheck schema                       Output the schema as JSON
  sealcheck schema --format yaml         Output the schema as YAML
  sealcheck schema > sealcheck.schema.json
      `
    )
    .option(
      "--format <format>",
      "Output format (json or yaml)",
      parseChoice(SCHEMA_FORMATS),
      "json" as const
    )
    .action(
      withErrorHandling(options => {
        process.stdout.write(renderSchema(SettingsHarnessV1, options.format));
      })
    );
}
