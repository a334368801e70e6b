/**
 * Tests for the Tasklet config loader.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { loadConfig, resolveConfig, validateConfigShape } from "./config.js";

function withDirs(fn: (cwd: string, home: string) => void): void {
  const cwd = fs.mkdtempSync(path.join(os.tmpdir(), "tasklet-cwd-"));
  const home = fs.mkdtempSync(path.join(os.tmpdir(), "tasklet-home-"));
  try {
    fn(cwd, home);
  } finally {
    fs.rmSync(cwd, { recursive: true, force: true });
    fs.rmSync(home, { recursive: true, force: true });
  }
}

function writeUserConfig(home: string, body: string): string {
  const dir = path.join(home, ".tasklet");
  fs.mkdirSync(dir);
  const file = path.join(dir, "config.json");
  fs.writeFileSync(file, body);
  return file;
}

describe("Tasklet Config", () => {
  describe("resolveConfig", () => {
    it("falls back to the default when no files exist", () => {
      withDirs((cwd, home) => {
        assert.deepEqual(resolveConfig(cwd, home), {
          config: { version: 1, limits: {} },
          source: "default",
          path: null,
          skipped: [],
        });
      });
    });

    it("prefers the project file over the user file", () => {
      withDirs((cwd, home) => {
        fs.writeFileSync(path.join(cwd, ".tasklet.json"), JSON.stringify({ limits: { maxSteps: 10 } }));
        writeUserConfig(home, JSON.stringify({ limits: { maxSteps: 99 } }));
        const resolved = resolveConfig(cwd, home);
        assert.equal(resolved.source, "project");
        assert.equal(resolved.config.limits.maxSteps, 10);
      });
    });

    it("uses the user file when the project has none", () => {
      withDirs((cwd, home) => {
        const file = writeUserConfig(home, JSON.stringify({ version: 1, limits: { maxSteps: 99 } }));
        const resolved = resolveConfig(cwd, home);
        assert.equal(resolved.source, "user");
        assert.equal(resolved.path, file);
        assert.deepEqual(loadConfig(cwd, home), { version: 1, limits: { maxSteps: 99 } });
      });
    });

    it("skips a malformed project file and records why", () => {
      withDirs((cwd, home) => {
        const bad = path.join(cwd, ".tasklet.json");
        fs.writeFileSync(bad, JSON.stringify({ limits: { maxSteps: 0 } }));
        const resolved = resolveConfig(cwd, home);
        assert.equal(resolved.source, "default");
        assert.deepEqual(resolved.skipped, [
          { path: bad, reason: "Config 'limits.maxSteps' must be a positive integer." },
        ]);
      });
    });
  });

  describe("validateConfigShape", () => {
    it("defaults version and limits", () => {
      assert.deepEqual(validateConfigShape({}), { version: 1, limits: {} });
    });

    it("rejects non-objects", () => {
      assert.throws(() => validateConfigShape([]), /must be a JSON object/);
    });

    it("rejects a non-object limits field", () => {
      assert.throws(() => validateConfigShape({ limits: 5 }), /'limits' must be an object/);
    });

    it("rejects fractional step limits", () => {
      assert.throws(() => validateConfigShape({ limits: { maxSteps: 1.5 } }), /positive integer/);
    });
  });
});
