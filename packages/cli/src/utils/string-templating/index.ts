// pattern: Functional Core
import { render } from "micromustache";

import { ConfigurationError } from "../errors.js";

import type { ArgStringTemplate } from "../../config/types/index.js";
import type { EnvironmentOverlay } from "../../hermetic/types.js";

/**
 * Variables available to build and smoke-test argument templates
 */
export interface ArgTemplateVariables {
  /** Absolute path of the artifact */
  output: string;
  /** Absolute path of the source tree */
  sourceDir: string;
  /** The injected environment overlay */
  env: EnvironmentOverlay;
}

/**
 * Renders one Mustache argument template.
 * A variable that does not exist is a configuration error, not an empty string.
 */
export function renderArgTemplate(
  template: ArgStringTemplate,
  variables: ArgTemplateVariables
): string {
  try {
    return render(template, { ...variables }, { propsExist: true });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(
      `Cannot render argument template "${template}": ${reason}`
    );
  }
}

/**
 * Renders every argument template, preserving order
 */
export function renderArgTemplates(
  templates: readonly ArgStringTemplate[],
  variables: ArgTemplateVariables
): string[] {
  return templates.map(template => renderArgTemplate(template, variables));
}
