import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs/promises";
import path from "path";
import { DEFAULT_SETTINGS, loadSettings, mergeSettings } from "../settings";
import { makeTempDir, removeDir } from "./helpers/fakes";

describe("settings", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  async function writeConfig(content: unknown): Promise<string> {
    const file = path.join(dir, "digest.config.json");
    await fs.writeFile(file, typeof content === "string" ? content : JSON.stringify(content));
    return file;
  }

  describe("mergeSettings", () => {
    it("merges objects key by key and replaces arrays", () => {
      const merged = mergeSettings(
        { a: { x: 1, y: 2 }, list: [1, 2, 3] },
        { a: { y: 5 }, list: [9] }
      );
      expect(merged).toEqual({ a: { x: 1, y: 5 }, list: [9] });
    });
  });

  describe("loadSettings", () => {
    it("returns frozen defaults without a file", async () => {
      const settings = await loadSettings(path.join(dir, "missing.json"), {});
      expect(settings).toEqual(DEFAULT_SETTINGS);
      expect(Object.isFrozen(settings.search.categories)).toBe(true);
      expect(Object.isFrozen(DEFAULT_SETTINGS.search)).toBe(false);
    });

    it("overlays the file on the defaults", async () => {
      const file = await writeConfig({ filter: { threshold: 70 }, search: { categories: ["cs.RO"] } });

      const settings = await loadSettings(file, {});

      expect(settings.filter.threshold).toBe(70);
      expect(settings.filter.maxSelected).toBe(DEFAULT_SETTINGS.filter.maxSelected);
      expect(settings.search.categories).toEqual(["cs.RO"]);
    });

    it("applies environment overrides last", async () => {
      const file = await writeConfig({ llm: { apiKey: "from-file" } });

      const settings = await loadSettings(file, {
        DIGEST_LLM_API_KEY: "test-secret",
        DIGEST_LLM_PROVIDER: "anthropic",
        DIGEST_ROOT_FOLDER: "/tmp/digest-test"
      });

      expect(settings.llm.apiKey).toBe("test-secret");
      expect(settings.llm.provider).toBe("anthropic");
      expect(settings.rootFolder).toBe("/tmp/digest-test");
    });

    it("names every invalid field", async () => {
      const file = await writeConfig({ filter: { threshold: 150 }, search: { timezone: "Mars/Olympus" } });

      await expect(loadSettings(file, {})).rejects.toThrow(
        "Invalid settings: search.timezone: unknown IANA timezone; filter.threshold: Number must be less than or equal to 100"
      );
    });

    it("rejects a malformed schedule time", async () => {
      const file = await writeConfig({ schedule: { dailyTime: "8:30" } });
      await expect(loadSettings(file, {})).rejects.toThrow("schedule.dailyTime: expected HH:MM");
    });

    it("rejects a file that is not JSON", async () => {
      const file = await writeConfig("{ nope");
      await expect(loadSettings(file, {})).rejects.toThrow("is not valid JSON");
    });
  });
});
