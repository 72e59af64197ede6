import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { chmodSync, mkdtempSync, readFileSync, realpathSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { createCLIAdapter } from "../cli-adapter";

describe("CLI exec adapter", () => {
  const { exec } = createCLIAdapter();
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), "cli-adapter-test-"));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it("resolves to 0 when the command succeeds", async () => {
    expect(await exec.stream(process.execPath, ["-e", "process.exit(0)"])).toBe(0);
  });

  it("resolves to the exact non-zero exit code", async () => {
    expect(await exec.stream(process.execPath, ["-e", "process.exit(42)"])).toBe(42);
  });

  it("passes arguments verbatim without a shell", async () => {
    const out = join(tmpDir, "argv.json");
    const script = "require('fs').writeFileSync(process.argv[1], JSON.stringify(process.argv.slice(2)))";
    const args = ["my bucket", "it's", "$HOME", "a;b", ""];

    const status = await exec.stream(process.execPath, ["-e", script, out, ...args]);

    expect(status).toBe(0);
    expect(JSON.parse(readFileSync(out, "utf-8"))).toEqual(args);
  });

  it("runs in the given working directory", async () => {
    const out = join(tmpDir, "cwd.txt");
    const script = "require('fs').writeFileSync(process.argv[1], process.cwd())";

    await exec.stream(process.execPath, ["-e", script, out], { cwd: tmpDir });

    expect(realpathSync(readFileSync(out, "utf-8"))).toBe(realpathSync(tmpDir));
  });

  it("resolves to 127 when the command does not exist", async () => {
    expect(await exec.stream(join(tmpDir, "no-such-command"), [])).toBe(127);
  });

  it("resolves to 126 when the command is not executable", async () => {
    const file = join(tmpDir, "not-executable");
    writeFileSync(file, "#!/bin/sh\nexit 0\n");
    chmodSync(file, 0o644);

    expect(await exec.stream(file, [])).toBe(126);
  });

  it("reports a missing command as not existing", () => {
    expect(exec.commandExists("fndeploy-no-such-command")).toBe(false);
  });
});

describe.skipIf(process.platform === "win32")("CLI exec adapter with a restricted PATH", () => {
  const { exec } = createCLIAdapter();
  const originalPath = process.env.PATH;
  let binDir: string;

  beforeEach(() => {
    binDir = mkdtempSync(join(tmpdir(), "cli-adapter-path-"));
    const gcloud = join(binDir, "gcloud");
    writeFileSync(gcloud, "#!/bin/sh\nexit 0\n");
    chmodSync(gcloud, 0o755);
    process.env.PATH = binDir;
  });

  afterEach(() => {
    process.env.PATH = originalPath;
    rmSync(binDir, { recursive: true, force: true });
  });

  it("finds a command that is the only entry on PATH", () => {
    expect(exec.commandExists("gcloud")).toBe(true);
  });

  it("does not find a command missing from PATH", () => {
    expect(exec.commandExists("gsutil")).toBe(false);
  });

  it("treats the name as data, not shell syntax", () => {
    expect(exec.commandExists("gcloud; exit 0")).toBe(false);
    expect(exec.commandExists("$(exit 0)")).toBe(false);
  });

  it("runs the command found on PATH", async () => {
    expect(await exec.stream("gcloud", [])).toBe(0);
  });
});
