import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  FakeVerifier,
  MemoryModuleSource,
  makeTempDir,
  readText,
  removeTempDir,
  ScriptedPrompter,
  testSettings,
  writeFiles,
} from "../test-support/fixtures.js";
import { ConfigManager } from "./ConfigManager.js";
import type { Settings } from "./types.js";
import { resolveLayout } from "./Workspace.js";

const MASTER_WITH_PAGES =
  "[\n      { module: \"clock\" },\n      { module: \"MMM-pages\" }\n]\n";

const PAGES =
  "      { module: \"MMM-pages\", modules: [[\"clock\"], [\"MODULE\"]] }\n";

describe("ConfigManager", () => {
  let root: string;
  let settings: Settings;
  let verifier: FakeVerifier;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);

    root = await makeTempDir();
    settings = testSettings(root);
    verifier = new FakeVerifier(resolveLayout(settings).output);
    await writeFiles(root, {
      "MagicMirror/config/config.js": MASTER_WITH_PAGES,
      "my_config/head": "[\n",
      "my_config/tail": "]\n",
      "my_config/pages": PAGES,
      "my_config/templates/clock.js": "{ module: \"clock\" }",
      "my_config/templates/MMM-pages.js": "{ module: \"MMM-pages\" }",
      "my_config/templates/MMM-Weather.js": "{ module: \"MMM-Weather\" }",
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(root);
  });

  async function start(
    prompter: ScriptedPrompter,
    modules = new MemoryModuleSource([]),
  ): Promise<ConfigManager> {
    const manager = new ConfigManager({ settings }, { prompter, verifier, modules });
    await manager.initialize();
    return manager;
  }

  describe("testModule", () => {
    it("tests alone, on two pages, then accepts into the full master", async () => {
      const prompter = new ScriptedPrompter([true, true, true, true, true]);
      const manager = await start(prompter);

      const outcome = await manager.testModule("MMM-Weather");

      const finalConfig =
        "[\n      { module: \"clock\" },\n      { module: \"MMM-pages\" },\n      { module: \"MMM-Weather\" }\n]\n";
      expect(outcome?.state).toBe("accepted");
      expect(prompter.questions).toEqual([
        "Does the mirror look right?",
        "Test with 2 pages?",
        "Does the mirror look right?",
        "Test with full master?",
        "Update master?",
      ]);
      expect(verifier.seen).toEqual([
        "[\n      { module: \"MMM-Weather\" }\n]\n",
        MASTER_WITH_PAGES,
        "[\n      { module: \"clock\" },\n      { module: \"MMM-Weather\" },\n" +
          "      { module: \"MMM-pages\", modules: [[\"clock\"], [\"MMM-Weather\"]] }\n]\n",
        MASTER_WITH_PAGES,
        finalConfig,
      ]);
      expect(await readText(manager.workspace.layout.master)).toBe(finalConfig);
    });

    it("stops before the full master when declined", async () => {
      const prompter = new ScriptedPrompter([true, false, false]);
      const manager = await start(prompter);

      expect(await manager.testModule("MMM-Weather")).toBeNull();

      expect(prompter.questions.at(-1)).toBe("Test with full master?");
      expect(verifier.seen).toHaveLength(2);
      expect(await readText(manager.workspace.layout.master)).toBe(MASTER_WITH_PAGES);
      expect(await readText(manager.workspace.layout.output)).toBe(MASTER_WITH_PAGES);
    });

    it("skips the pages step when the master has no pages module", async () => {
      const master = "[\n      { module: \"clock\" }\n]\n";
      await writeFiles(root, { "my_config/config.Master": master });
      const prompter = new ScriptedPrompter([true, true, false]);
      const manager = await start(prompter);

      const outcome = await manager.testModule("MMM-Weather");

      expect(outcome?.state).toBe("rolled-back");
      expect(prompter.questions).toEqual([
        "Does the mirror look right?",
        "Test with full master?",
        "Update master?",
      ]);
      expect(await readText(manager.workspace.layout.master)).toBe(master);
    });

    it("does not add a module twice", async () => {
      const prompter = new ScriptedPrompter([true, false, true, true]);
      const manager = await start(prompter);

      await manager.testModule("clock");

      expect(await readText(manager.workspace.layout.master)).toBe(MASTER_WITH_PAGES);
    });

    it("leaves everything in place when the alone run fails", async () => {
      verifier = new FakeVerifier(resolveLayout(settings).output, ["fail"]);
      const prompter = new ScriptedPrompter([true]);
      const manager = await start(prompter);

      await expect(manager.testModule("MMM-Weather")).rejects.toThrow(
        "Verification of MagicMirror failed: process is errored",
      );

      expect(prompter.questions).toEqual([]);
      expect(await readText(manager.workspace.layout.output)).toBe(MASTER_WITH_PAGES);
    });
  });

  describe("removeModule", () => {
    it("drops the module once verified and accepted", async () => {
      const prompter = new ScriptedPrompter([true, true]);
      const manager = await start(prompter);

      const outcome = await manager.removeModule("MMM-pages");

      expect(outcome?.state).toBe("accepted");
      expect(prompter.questions).toEqual(["Remove MMM-pages from config?", "Update master?"]);
      expect(await readText(manager.workspace.layout.master)).toBe(
        "[\n      { module: \"clock\" }\n]\n",
      );
    });

    it("does nothing when not confirmed", async () => {
      const manager = await start(new ScriptedPrompter([false]));

      expect(await manager.removeModule("clock")).toBeNull();
      expect(verifier.seen).toEqual([]);
    });

    it("rejects a module that is not in the master config", async () => {
      const manager = await start(new ScriptedPrompter([]));

      await expect(manager.removeModule("MMM-Ghost")).rejects.toThrow(
        "Module MMM-Ghost is not in the master config",
      );
    });
  });

  describe("populate", () => {
    it("covers installed, master and baseline modules", async () => {
      await writeFiles(root, {
        "my_config/config.Master": [
          "[",
          "      {",
          "        module: \"MMM-Calendar\",",
          "        position: \"top_left\"",
          "      },",
          "]",
        ].join("\n"),
      });
      const modules = new MemoryModuleSource(
        ["MMM-News", "MMM-Weather"],
        {},
        { "MMM-News": "{ module: \"MMM-News\" }\n" },
      );
      const manager = await start(new ScriptedPrompter([]), modules);

      const report = await manager.populate();

      expect(report).toEqual({
        created: [
          { name: "MMM-News", source: "sample" },
          { name: "MMM-Calendar", source: "master" },
        ],
        existing: ["MMM-Weather", "clock"],
        skipped: [],
        protected: [],
      });
      expect(await manager.store.read("MMM-Calendar")).toBe(
        "      {\n        module: \"MMM-Calendar\",\n        position: \"top_left\"\n      },",
      );
    });
  });
});
