// pattern: Functional Core
import { describe, expect, it } from "vitest";

import { ConfigurationError } from "../errors.js";

import { renderArgTemplate, renderArgTemplates } from "./index.js";

import type { ArgStringTemplate } from "../../config/types/index.js";

function templates(...values: string[]): ArgStringTemplate[] {
  return values.map(value => value as ArgStringTemplate);
}

const variables = {
  output: "/work/dist/retrodep",
  sourceDir: "/work/source",
  env: { GOFLAGS: "-mod=mod" },
};

describe("renderArgTemplates", () => {
  it("should render the default build arguments", () => {
    expect(
      renderArgTemplates(templates("build", "-o", "{{output}}"), variables)
    ).toEqual(["build", "-o", "/work/dist/retrodep"]);
  });

  it("should expose the source tree and the overlay", () => {
    expect(
      renderArgTemplates(
        templates("-C", "{{sourceDir}}", "--flags={{env.GOFLAGS}}"),
        variables
      )
    ).toEqual(["-C", "/work/source", "--flags=-mod=mod"]);
  });

  it("should leave literal arguments untouched", () => {
    expect(renderArgTemplates(templates("--help"), variables)).toEqual([
      "--help",
    ]);
  });
});

describe("renderArgTemplate", () => {
  it("should reject unknown variables", () => {
    const template = "{{ouptut}}" as ArgStringTemplate;

    expect(() => renderArgTemplate(template, variables)).toThrow(
      ConfigurationError
    );
  });
});
