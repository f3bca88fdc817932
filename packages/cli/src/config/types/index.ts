export * from "./utils.js";
export * from "./v1/index.js";

export {
  EnvironmentFileFormatV1 as EnvironmentFileFormat,
  SettingsHarnessV1 as SettingsHarness,
} from "./v1/index.js";
