import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "fs-extra";
import path from "path";
import os from "os";
import { status } from "../status.js";
import type { CommandOptions, CommandRunner } from "../../utils.js";

describe("status command", () => {
  let projectDir: string;
  let calls: { command: string; options?: CommandOptions }[];
  let logOutput: () => string;

  const run: CommandRunner = async (file, args, options) => {
    calls.push({ command: [file, ...args].join(" "), options });
    return { stdout: "", stderr: "" };
  };

  beforeEach(async () => {
    projectDir = await fs.mkdtemp(path.join(os.tmpdir(), "status-test-"));
    await fs.writeFile(path.join(projectDir, "Dockerfile"), "FROM jenkins/jenkins:2.504.3\n");
    await fs.writeFile(path.join(projectDir, "compose.yaml"), "services: {}\n");
    calls = [];

    vi.stubGlobal(
      "fetch",
      vi.fn<typeof fetch>(async (input) =>
        String(input).endsWith("/api/json")
          ? Response.json({ version: "2.504.3" })
          : new Response("", { status: 200 })
      )
    );
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    logOutput = () => logSpy.mock.calls.map((call) => call.join(" ")).join("\n");
  });

  afterEach(async () => {
    await fs.remove(projectDir);
    vi.restoreAllMocks();
    vi.unstubAllGlobals();
    process.exitCode = undefined;
  });

  test("shows compose status, the pinned image and the running version", async () => {
    await status(projectDir, { run });

    expect(calls).toEqual([
      { command: "docker compose ps", options: { cwd: projectDir, inherit: true } },
    ]);
    const output = logOutput();
    expect(output).toContain("jenkins/jenkins:2.504.3");
    expect(output).toContain("http://localhost:8080/login");
  });

  test("fails outside a Jenkins project", async () => {
    await fs.remove(path.join(projectDir, "Dockerfile"));

    await status(projectDir, { run });

    expect(process.exitCode).toBe(1);
    expect(calls).toEqual([]);
  });
});
