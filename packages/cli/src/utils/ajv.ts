// pattern: Functional Core
import AjvModule from "ajv";
import ajvErrors from "ajv-errors";
import ajvFormats from "ajv-formats";

// ajv and its plugins are CommonJS modules exposing the class on `default`
const Ajv = AjvModule.default;
const addErrors = ajvErrors.default;
const addFormats = ajvFormats.default;

// Create singleton AJV instance configured for TypeBox schemas
const ajv = new Ajv({
  // Ignore TypeBox's custom attributes (Symbol keys)
  strict: false,
  code: { optimize: true },
  allowUnionTypes: true,
  // Required for ajv-errors, and so every bad field is reported at once
  allErrors: true,
});

// The settings schema only uses uri for the probe target
addFormats(ajv, ["uri", "uri-reference"]);

// Add enhanced error messages
addErrors(ajv);

/**
 * Flattens Ajv errors into "path: message" strings
 */
export function formatAjvErrors(
  errors: readonly { instancePath: string; message?: string }[] | null | undefined
): string[] {
  return (errors ?? []).map(
    err => `${err.instancePath || "root"}: ${err.message ?? "is invalid"}`
  );
}

export { ajv };
