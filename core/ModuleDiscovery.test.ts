import * as fs from "node:fs/promises";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  makeTempDir,
  removeTempDir,
  writeFiles,
} from "../test-support/fixtures.js";
import { ModuleDiscovery } from "./ModuleDiscovery.js";

describe("ModuleDiscovery", () => {
  let root: string;
  let modulesDir: string;
  let discovery: ModuleDiscovery;

  beforeEach(async () => {
    root = await makeTempDir();
    modulesDir = path.join(root, "modules");
    discovery = new ModuleDiscovery(modulesDir);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(root);
  });

  it("lists module directories without defaults, hidden entries or files", async () => {
    await writeFiles(root, {
      "modules/MMM-Real/MMM-Real.js": "",
      "modules/default/clock/clock.js": "",
      "modules/.cache/x": "",
      "modules/notes.txt": "",
    });

    expect(await discovery.listInstalled()).toEqual(["MMM-Real"]);
  });

  it("follows symlinked module directories", async () => {
    await writeFiles(root, {
      "modules/MMM-Real/MMM-Real.js": "",
      "checkout/MMM-Linked/MMM-Linked.js": "",
      "checkout/readme.txt": "",
    });
    await fs.symlink(path.join(root, "checkout", "MMM-Linked"), path.join(modulesDir, "MMM-Linked"));
    await fs.symlink(path.join(root, "checkout", "readme.txt"), path.join(modulesDir, "MMM-File"));
    await fs.symlink(path.join(root, "checkout", "gone"), path.join(modulesDir, "MMM-Dangling"));

    expect(await discovery.listInstalled()).toEqual(["MMM-Linked", "MMM-Real"]);
  });

  it("warns and returns nothing when the modules directory is missing", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    expect(await discovery.listInstalled()).toEqual([]);
    expect(warn).toHaveBeenCalledWith(`⚠️  Modules directory not found: ${modulesDir}`);
  });

  it("reads the README and the sample file", async () => {
    await writeFiles(root, {
      "modules/MMM-Real/README.md": "# MMM-Real",
      "modules/MMM-Real/sample/MMM-Real.js": "{ module: \"MMM-Real\" }",
    });

    expect(await discovery.readDocumentation("MMM-Real")).toBe("# MMM-Real");
    expect(await discovery.readSample("MMM-Real")).toBe("{ module: \"MMM-Real\" }");
    expect(await discovery.readDocumentation("MMM-Other")).toBeNull();
  });
});
