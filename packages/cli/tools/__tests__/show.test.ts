import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, writeFileSync, rmSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { MANIFEST_FILE } from "@fndeploy/core";
import { showTool } from "../show";
import { createTestAdapter } from "./helpers/test-adapter";

describe("showTool", () => {
  let tmpDir: string;
  let printed: string[];
  const print = (line: string) => {
    printed.push(line);
  };

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), "show-tool-test-"));
    printed = [];
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it("prints the built-in command line without running it", async () => {
    const { adapter, exec } = createTestAdapter();

    const status = await showTool(adapter, { cwd: tmpDir, print });

    expect(status).toBe(0);
    expect(exec.calls).toHaveLength(0);
    expect(printed).toEqual([
      "gcloud functions deploy ack-fits-received --entry-point ack_fits_received --runtime python37 " +
        "--trigger-resource panoptes-survey --trigger-event google.storage.object.finalize",
    ]);
  });

  it("prints the resolved descriptor as JSON", async () => {
    const { adapter } = createTestAdapter();

    await showTool(adapter, { cwd: tmpDir, json: true, print });

    expect(JSON.parse(printed[0])).toEqual({
      name: "ack-fits-received",
      entryPoint: "ack_fits_received",
      runtime: "python37",
      triggerResource: "panoptes-survey",
      triggerEvent: "google.storage.object.finalize",
    });
  });

  it("quotes values that need it", async () => {
    writeFileSync(
      join(tmpDir, MANIFEST_FILE),
      [
        "functions:",
        "  - name: spaced",
        "    entryPoint: handler",
        "    runtime: nodejs20",
        "    triggerResource: my bucket",
        "    triggerEvent: google.storage.object.finalize",
        "",
      ].join("\n"),
    );
    const { adapter } = createTestAdapter();

    await showTool(adapter, { cwd: tmpDir, print });

    expect(printed).toEqual([
      "gcloud functions deploy spaced --entry-point handler --runtime nodejs20 " +
        "--trigger-resource 'my bucket' --trigger-event google.storage.object.finalize",
    ]);
  });

  it("logs resolution errors and returns 1", async () => {
    const { adapter, ui } = createTestAdapter();

    const status = await showTool(adapter, { cwd: tmpDir, name: "missing", print });

    expect(status).toBe(1);
    expect(printed).toEqual([]);
    expect(ui.messages("error")).toHaveLength(1);
  });
});
