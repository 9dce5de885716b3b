import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "fs-extra";
import path from "path";
import os from "os";
import { UpdateOrchestrator, type UpdateOrchestratorSettings } from "../update-orchestrator.js";
import { DockerfileVersionStore } from "../../utils/version-store.js";
import { BackupManager } from "../../utils/backup.js";
import {
  PinnedVersionSource,
  PlainTextVersionSource,
  type VersionSource,
} from "../../utils/version-source.js";
import {
  ApplyError,
  FetchError,
  HealthCheckTimeout,
  RollbackError,
  BackupError,
} from "../../errors.js";
import type { ServiceRuntime } from "../../utils/compose.js";
import type { HealthProbe } from "../../utils/health.js";
import type { CommandRunner } from "../../utils.js";

const DOCKERFILE = `# Controller image
FROM jenkins/jenkins:lts

USER root
COPY plugins.txt /usr/share/jenkins/ref/plugins.txt
`;

const BACKUP_TIME = new Date(2025, 9, 19, 14, 25, 30);

class FakeRuntime implements ServiceRuntime {
  events: string[] = [];

  constructor(private readonly failWhen?: (event: string, occurrence: number) => boolean) {}

  async stop() {
    this.record("stop");
  }

  async build({ noCache = false }: { noCache?: boolean } = {}) {
    this.record(noCache ? "build --no-cache" : "build");
  }

  async start() {
    this.record("start");
  }

  async isRunning() {
    return true;
  }

  private record(event: string) {
    this.events.push(event);
    const occurrence = this.events.filter((e) => e === event).length;
    if (this.failWhen?.(event, occurrence)) {
      throw new Error(`${event} failed`);
    }
  }
}

class FakeProbe implements HealthProbe {
  readonly url = "http://localhost:8080/login";
  calls = 0;

  /** healthyOnAttempt: first attempt that answers, or null for never */
  constructor(private readonly healthyOnAttempt: number | null) {}

  async isHealthy() {
    this.calls++;
    return this.healthyOnAttempt !== null && this.calls >= this.healthyOnAttempt;
  }

  async fetchVersion() {
    return "2.516.2";
  }
}

class FailingSource implements VersionSource {
  readonly description = "test source";

  async fetchLatest(): Promise<string> {
    throw new FetchError("Failed to fetch test source: connection refused");
  }
}

describe("UpdateOrchestrator", () => {
  let projectDir: string;
  let dockerCalls: string[];
  let failDockerRun: boolean;
  let sleeps: number[];

  const run: CommandRunner = async (file, args) => {
    const command = [file, ...args].join(" ");
    dockerCalls.push(command);
    if (failDockerRun && args[0] === "run") {
      throw new Error("volume jenkins_home not found");
    }
    return { stdout: "", stderr: "" };
  };

  const settings: UpdateOrchestratorSettings = {
    health: { maxAttempts: 12, intervalMs: 10_000 },
    startupDelayMs: 30_000,
    dataBackup: "warn",
    composeFile: null,
  };

  function createOrchestrator(options: {
    source?: VersionSource;
    runtime?: FakeRuntime;
    probe?: FakeProbe;
    settings?: Partial<UpdateOrchestratorSettings>;
  }) {
    const runtime = options.runtime ?? new FakeRuntime();
    const probe = options.probe ?? new FakeProbe(1);
    const store = new DockerfileVersionStore(projectDir, "Dockerfile", "jenkins/jenkins");
    const backups = new BackupManager({
      projectDir,
      dataVolume: "jenkins_home",
      backupVolume: "jenkins_backup",
      helperImage: "alpine",
      run,
      now: () => BACKUP_TIME,
    });

    const orchestrator = new UpdateOrchestrator(
      {
        source: options.source ?? new PinnedVersionSource("2.516.2"),
        store,
        runtime,
        backups,
        probe,
        sleep: async (ms) => {
          sleeps.push(ms);
        },
      },
      { ...settings, ...options.settings }
    );

    return { orchestrator, runtime, probe, store };
  }

  beforeEach(async () => {
    projectDir = await fs.mkdtemp(path.join(os.tmpdir(), "update-orchestrator-test-"));
    await fs.writeFile(path.join(projectDir, "Dockerfile"), DOCKERFILE);
    dockerCalls = [];
    failDockerRun = false;
    sleeps = [];

    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await fs.remove(projectDir);
    vi.restoreAllMocks();
    vi.unstubAllGlobals();
  });

  const readDockerfile = () => fs.readFile(path.join(projectDir, "Dockerfile"), "utf-8");

  describe("when already up to date", () => {
    beforeEach(async () => {
      await fs.writeFile(
        path.join(projectDir, "Dockerfile"),
        DOCKERFILE.replace("jenkins/jenkins:lts", "jenkins/jenkins:2.516.2")
      );
    });

    test("exits 0 without backup, apply or restart", async () => {
      const { orchestrator, runtime, probe } = createOrchestrator({});

      const outcome = await orchestrator.run();

      expect(outcome.state).toBe("up-to-date");
      expect(outcome.exitCode).toBe(0);
      expect(runtime.events).toEqual([]);
      expect(dockerCalls).toEqual([]);
      expect(probe.calls).toBe(0);
      expect(await fs.readdir(projectDir)).toEqual(["Dockerfile"]);
    });

    test("is up to date on every repeated run with no side effects", async () => {
      const first = await createOrchestrator({}).orchestrator.run();
      const { orchestrator, runtime } = createOrchestrator({});
      const second = await orchestrator.run();

      expect(first.state).toBe("up-to-date");
      expect(second.state).toBe("up-to-date");
      expect(second.exitCode).toBe(0);
      expect(runtime.events).toEqual([]);
      expect(await fs.readdir(projectDir)).toEqual(["Dockerfile"]);
    });

    test("ignores surrounding whitespace in the fetched version", async () => {
      vi.stubGlobal(
        "fetch",
        vi.fn(async () => new Response("2.516.2\n", { status: 200 }))
      );
      const { orchestrator } = createOrchestrator({
        source: new PlainTextVersionSource("https://updates.example.test/latestCore.txt"),
      });

      const outcome = await orchestrator.run();

      expect(outcome.state).toBe("up-to-date");
    });
  });

  describe("when the target cannot be fetched", () => {
    test("exits 1 on a malformed version and leaves the Dockerfile untouched", async () => {
      vi.stubGlobal(
        "fetch",
        vi.fn(async () => new Response("<html>rate limited</html>", { status: 200 }))
      );
      const { orchestrator, runtime } = createOrchestrator({
        source: new PlainTextVersionSource("https://updates.example.test/latestCore.txt"),
      });

      const outcome = await orchestrator.run();

      expect(outcome.state).toBe("aborted");
      expect(outcome.exitCode).toBe(1);
      expect(outcome.error).toBeInstanceOf(FetchError);
      expect(await readDockerfile()).toBe(DOCKERFILE);
      expect(runtime.events).toEqual([]);
      expect(await fs.readdir(projectDir)).toEqual(["Dockerfile"]);
    });

    test("exits 1 on a network failure before touching anything", async () => {
      const { orchestrator, runtime } = createOrchestrator({ source: new FailingSource() });

      const outcome = await orchestrator.run();

      expect(outcome.exitCode).toBe(1);
      expect(outcome.error).toBeInstanceOf(FetchError);
      expect(runtime.events).toEqual([]);
      expect(dockerCalls).toEqual([]);
    });
  });

  describe("when the update is healthy", () => {
    test("pins an alias to the fetched version", async () => {
      const { orchestrator } = createOrchestrator({});

      const outcome = await orchestrator.run();

      expect(outcome.state).toBe("updated");
      expect(outcome.exitCode).toBe(0);
      expect(outcome.currentVersion).toBe("lts");
      expect(outcome.targetVersion).toBe("2.516.2");
      expect(await readDockerfile()).toBe(
        DOCKERFILE.replace("jenkins/jenkins:lts", "jenkins/jenkins:2.516.2")
      );
    });

    test("stops, backs up, rebuilds and restarts in order", async () => {
      const { orchestrator, runtime } = createOrchestrator({});

      await orchestrator.run();

      expect(runtime.events).toEqual(["stop", "build --no-cache", "stop", "start"]);
      expect(dockerCalls).toEqual([
        "docker volume create jenkins_backup",
        "docker run --rm -v jenkins_home:/source:ro -v jenkins_backup:/backup alpine tar czf /backup/jenkins-backup-20251019-142530.tar.gz -C /source .",
      ]);
    });

    test("keeps the timestamped backup and removes the rollback copy", async () => {
      const { orchestrator, probe, store } = createOrchestrator({ probe: new FakeProbe(3) });

      const outcome = await orchestrator.run();

      expect(outcome.exitCode).toBe(0);
      expect(probe.calls).toBe(3);
      expect(sleeps).toEqual([30_000, 10_000, 10_000]);
      expect(outcome.backup?.directory).toBe(path.join(projectDir, "backup-20251019-142530"));
      expect(outcome.backup?.volumeArchive).toBe("jenkins-backup-20251019-142530.tar.gz");
      expect(
        await fs.readFile(path.join(projectDir, "backup-20251019-142530", "Dockerfile"), "utf-8")
      ).toBe(DOCKERFILE);
      expect(await fs.pathExists(path.join(projectDir, "Dockerfile.bak"))).toBe(false);

      // Cleanup is idempotent
      await expect(store.discardPrevious()).resolves.toBeUndefined();
    });

    test("continues with a warning when the data volume cannot be archived", async () => {
      failDockerRun = true;
      const { orchestrator } = createOrchestrator({});

      const outcome = await orchestrator.run();

      expect(outcome.state).toBe("updated");
      expect(outcome.backup?.volumeArchive).toBeUndefined();
      expect(outcome.backup?.warnings).toEqual([
        "Could not archive volume jenkins_home: volume jenkins_home not found",
      ]);
    });
  });

  describe("when the update is unhealthy", () => {
    test("rolls back exactly once after exhausting the attempts", async () => {
      const { orchestrator, runtime, probe } = createOrchestrator({ probe: new FakeProbe(null) });

      const outcome = await orchestrator.run();

      expect(outcome.state).toBe("rolled-back");
      expect(outcome.exitCode).toBe(1);
      expect(outcome.error).toBeInstanceOf(HealthCheckTimeout);
      expect(probe.calls).toBe(12);
      expect(sleeps).toEqual([30_000, ...Array<number>(11).fill(10_000)]);
      expect(runtime.events).toEqual([
        "stop",
        "build --no-cache",
        "stop",
        "start",
        "build --no-cache",
        "stop",
        "start",
      ]);
    });

    test("restores the Dockerfile to its pre-update bytes", async () => {
      const { orchestrator } = createOrchestrator({ probe: new FakeProbe(null) });

      await orchestrator.run();

      expect(await readDockerfile()).toBe(DOCKERFILE);
      expect(await fs.pathExists(path.join(projectDir, "Dockerfile.bak"))).toBe(false);
    });

    test("skips polling and rolls back when the rebuild fails", async () => {
      const runtime = new FakeRuntime((event, occurrence) => event === "build --no-cache" && occurrence === 1);
      const { orchestrator, probe } = createOrchestrator({ runtime, probe: new FakeProbe(1) });

      const outcome = await orchestrator.run();

      expect(outcome.state).toBe("rolled-back");
      expect(outcome.error).toBeInstanceOf(ApplyError);
      expect(outcome.error?.message).toBe("Image rebuild failed: build --no-cache failed");
      expect(probe.calls).toBe(0);
      expect(await readDockerfile()).toBe(DOCKERFILE);
    });

    test("reports manual recovery when the rollback itself fails", async () => {
      const runtime = new FakeRuntime((event, occurrence) => event === "build --no-cache" && occurrence === 2);
      const { orchestrator } = createOrchestrator({ runtime, probe: new FakeProbe(null) });

      const outcome = await orchestrator.run();

      expect(outcome.state).toBe("rollback-failed");
      expect(outcome.exitCode).toBe(1);
      expect(outcome.error).toBeInstanceOf(RollbackError);
      const remediation = outcome.error instanceof RollbackError ? outcome.error.remediation : [];
      expect(remediation).toEqual([
        "docker compose down",
        `cp ${path.join(projectDir, "backup-20251019-142530", "Dockerfile")} ${path.join(projectDir, "Dockerfile")}`,
        "docker volume rm jenkins_home",
        "docker volume create jenkins_home",
        "docker run --rm -v jenkins_backup:/backup -v jenkins_home:/restore alpine tar xzf /backup/jenkins-backup-20251019-142530.tar.gz -C /restore",
        "docker compose build --no-cache",
        "docker compose up -d",
      ]);
      // One rollback attempt only
      expect(runtime.events.filter((e) => e === "build --no-cache")).toHaveLength(2);
    });
  });

  describe("data backup policy", () => {
    test("required: aborts, restarts the old service and mutates nothing", async () => {
      failDockerRun = true;
      const { orchestrator, runtime } = createOrchestrator({ settings: { dataBackup: "required" } });

      const outcome = await orchestrator.run();

      expect(outcome.state).toBe("aborted");
      expect(outcome.exitCode).toBe(1);
      expect(outcome.error).toBeInstanceOf(BackupError);
      expect(runtime.events).toEqual(["stop", "start"]);
      expect(await readDockerfile()).toBe(DOCKERFILE);
    });

    test("skip: never runs the archive container", async () => {
      const { orchestrator } = createOrchestrator({ settings: { dataBackup: "skip" } });

      const outcome = await orchestrator.run();

      expect(outcome.state).toBe("updated");
      expect(dockerCalls).toEqual([]);
    });
  });

  test("dry run stops after the comparison", async () => {
    const { orchestrator, runtime } = createOrchestrator({ settings: { dryRun: true } });

    const outcome = await orchestrator.run();

    expect(outcome.state).toBe("planned");
    expect(outcome.exitCode).toBe(0);
    expect(runtime.events).toEqual([]);
    expect(await readDockerfile()).toBe(DOCKERFILE);
  });
});
