import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FragmentStore } from "../core/FragmentStore.js";
import { ErrorSeverity, type Settings } from "../core/types.js";
import { Workspace } from "../core/Workspace.js";
import {
  MemoryModuleSource,
  makeTempDir,
  removeTempDir,
  testSettings,
  writeFiles,
} from "../test-support/fixtures.js";
import { Validator } from "./Validator.js";

describe("Validator", () => {
  let root: string;
  let settings: Settings;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    root = await makeTempDir();
    settings = testSettings(root);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(root);
  });

  function validator(installed: string[] = []): Validator {
    const workspace = new Workspace(settings);
    return new Validator(
      workspace,
      new FragmentStore(workspace.layout.fragmentsDir),
      new MemoryModuleSource(installed),
      settings,
    );
  }

  it("passes a complete workspace", async () => {
    await writeFiles(root, {
      "my_config/head": "[\n",
      "my_config/tail": "]\n",
      "my_config/pages": "{ module: \"MMM-pages\", modules: [[\"MODULE\"]] }\n",
      "my_config/config.Master": "{ module: \"clock\" }\n{ module: \"default/alert\" }\n",
      "my_config/templates/clock.js": "{\n  module: \"clock\"\n}",
    });

    const result = await validator(["clock"]).validate();

    expect(result).toEqual({ valid: true, errors: [] });
  });

  it("reports missing head and tail", async () => {
    const result = await validator().validate();

    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => e.code)).toEqual(["MISSING_HEAD", "MISSING_TAIL"]);
  });

  it("requires exactly one placeholder in the pages template", async () => {
    await writeFiles(root, {
      "my_config/head": "",
      "my_config/tail": "",
      "my_config/pages": "[[\"MODULE\"], [\"MODULE\"]]",
    });

    const result = await validator().validate();

    expect(result.errors).toEqual([
      {
        severity: ErrorSeverity.ERROR,
        code: "PAGES_PLACEHOLDER",
        message: "Pages template must contain the placeholder \"MODULE\" exactly once (found 2)",
        file: `${root}/my_config/pages`,
      },
    ]);
  });

  it("warns about broken templates without failing", async () => {
    await writeFiles(root, {
      "my_config/head": "",
      "my_config/tail": "",
      "my_config/templates/MMM-Open.js": "{\n  module: \"MMM-Open\",\n  config: {\n}",
      "my_config/templates/MMM-Copy.js": "{ module: \"MMM-Original\" }",
    });

    const result = await validator().validate();

    expect(result.valid).toBe(true);
    expect(result.errors.map((e) => [e.severity, e.code, e.message])).toEqual([
      [ErrorSeverity.WARNING, "FRAGMENT_NAME_MISMATCH", "Template for MMM-Copy declares MMM-Original"],
      [ErrorSeverity.WARNING, "UNBALANCED_FRAGMENT", "Template for MMM-Open has 1 unmatched opening brace(s)"],
    ]);
  });

  it("flags master modules without templates and notes installed ones", async () => {
    await writeFiles(root, {
      "my_config/head": "",
      "my_config/tail": "",
      "my_config/config.Master": "{ module: \"MMM-Calendar\" }",
    });

    const result = await validator(["MMM-News"]).validate();

    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => [e.severity, e.code])).toEqual([
      [ErrorSeverity.ERROR, "MISSING_FRAGMENT"],
      [ErrorSeverity.INFO, "NO_FRAGMENT"],
    ]);
  });
});
