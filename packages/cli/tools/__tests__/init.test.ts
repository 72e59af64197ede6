import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, writeFileSync, rmSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { DEFAULT_FUNCTION, MANIFEST_FILE } from "@fndeploy/core";
import { initTool } from "../init";
import { parseManifest } from "../../lib/config";
import { createTestAdapter } from "./helpers/test-adapter";

describe("initTool", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), "init-tool-test-"));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it("writes a manifest holding the built-in function", async () => {
    const { adapter, ui } = createTestAdapter();

    const status = await initTool(adapter, { cwd: tmpDir });

    expect(status).toBe(0);
    const parsed = parseManifest(readFileSync(join(tmpDir, MANIFEST_FILE), "utf-8"));
    expect(parsed).toEqual({ ok: true, value: { functions: [DEFAULT_FUNCTION] } });
    expect(ui.messages("success")).toEqual([`Wrote ${join(tmpDir, MANIFEST_FILE)}`]);
  });

  it("refuses to overwrite an existing manifest", async () => {
    writeFileSync(join(tmpDir, MANIFEST_FILE), "keep: me\n");
    const { adapter, ui } = createTestAdapter();

    const status = await initTool(adapter, { cwd: tmpDir });

    expect(status).toBe(1);
    expect(readFileSync(join(tmpDir, MANIFEST_FILE), "utf-8")).toBe("keep: me\n");
    expect(ui.messages("error")).toEqual([
      `${MANIFEST_FILE} already exists in ${tmpDir}. Pass --force to overwrite it.`,
    ]);
  });

  it("overwrites with --force", async () => {
    writeFileSync(join(tmpDir, MANIFEST_FILE), "keep: me\n");
    const { adapter } = createTestAdapter();

    const status = await initTool(adapter, { cwd: tmpDir, force: true });

    expect(status).toBe(0);
    expect(parseManifest(readFileSync(join(tmpDir, MANIFEST_FILE), "utf-8")).ok).toBe(true);
  });
});
