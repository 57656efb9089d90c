import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { existsSync, mkdirSync, rmSync, writeFileSync } from "node:fs";
import { delimiter, join } from "node:path";
import { KeyedMutex } from "./concurrency.js";
import { PluginNotFoundError } from "./errors.js";
import {
  DependencyInstaller,
  backoffDelay,
  targetVersion,
  type InstallerOptions,
} from "./installer.js";
import { PluginRegistry } from "./providers/registry.js";
import {
  FakeProvider,
  FakeRunner,
  deferred,
  permanent,
  tempDir,
  tick,
  transient,
  type FakeProviderInit,
} from "./test-support.js";
import type { ProjectProfile, TaskStatus } from "./types.js";

function profileOf(
  languages: Record<string, string | undefined>,
  tools: string[] = [],
): ProjectProfile {
  return {
    root: "/work/app",
    languages: Object.fromEntries(
      Object.entries(languages).map(([name, version]) => [
        name,
        version ? { version, confidence: 1, source: "test" } : { confidence: 1, source: "test" },
      ]),
    ),
    frameworks: [],
    tools: tools.map((name) => ({ name, confidence: 1, source: "test" })),
    scripts: {},
  };
}

async function until(condition: () => boolean, rounds = 50): Promise<void> {
  for (let i = 0; i < rounds && !condition(); i++) await tick();
}

describe("DependencyInstaller", () => {
  let cacheDir: string;
  let journal: string[];
  let registry: PluginRegistry;
  let sleeps: number[];

  const provider = (init: FakeProviderInit) => {
    const p = new FakeProvider(init, journal);
    registry.register(p);
    return p;
  };

  const installer = (opts: Partial<InstallerOptions> = {}) =>
    new DependencyInstaller(registry, {
      cacheDir,
      concurrency: 4,
      retry: { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 150 },
      runner: new FakeRunner(),
      env: { PATH: "/usr/bin" },
      sleep: async (ms) => {
        sleeps.push(ms);
      },
      ...opts,
    });

  beforeEach(() => {
    cacheDir = tempDir("devenv-cache-");
    journal = [];
    registry = new PluginRegistry();
    sleeps = [];
  });

  afterEach(() => {
    rmSync(cacheDir, { recursive: true, force: true });
  });

  describe("plan", () => {
    it("plans node 20.10.0 and python 3.11.0 as independent tasks", () => {
      provider({ name: "node", defaultVersion: "20.10.0" });
      provider({ name: "python", defaultVersion: "3.12.4" });
      const plan = installer().plan(profileOf({ node: "20.10.0", python: "3.11.0" }));
      assert.deepEqual(
        plan.tasks.map((t) => [t.plugin, t.version, t.dependsOn]),
        [
          ["node", "20.10.0", []],
          ["python", "3.11.0", []],
        ],
      );
    });

    it("adds dependencies at their default version, ordered first", () => {
      provider({ name: "node", defaultVersion: "20.10.0" });
      provider({ name: "yarn", kind: "tool", defaultVersion: "1.22.22", dependsOn: ["node"] });
      const plan = installer().plan(profileOf({}, ["yarn"]));
      assert.deepEqual(
        plan.tasks.map((t) => [t.plugin, t.version, t.requestedBy]),
        [
          ["node", "20.10.0", ["yarn"]],
          ["yarn", "1.22.22", ["yarn"]],
        ],
      );
    });

    it("skips tools no plugin provides but fails on unknown languages", () => {
      provider({ name: "node" });
      const plan = installer().plan(profileOf({ node: undefined }, ["docker"]));
      assert.deepEqual(plan.skipped, [
        { name: "docker", reason: 'No plugin registered for "docker"' },
      ]);
      assert.throws(() => installer().plan(profileOf({ cobol: undefined })), PluginNotFoundError);
    });
  });

  describe("targetVersion", () => {
    const python = new FakeProvider({ name: "python", defaultVersion: "3.12.4" });

    it("uses an exact request as is", () => {
      assert.equal(targetVersion(python, "v3.11.0"), "3.11.0");
    });

    it("prefers the default version when it satisfies the range", () => {
      assert.equal(targetVersion(python, ">=3.10"), "3.12.4");
      assert.equal(targetVersion(python, undefined), "3.12.4");
    });

    it("falls back to the lowest matching version", () => {
      assert.equal(targetVersion(python, "~3.9"), "3.9.0");
      assert.equal(targetVersion(python, "3.11"), "3.11.0");
    });
  });

  it("computes capped exponential backoff", () => {
    const retry = { maxAttempts: 6, baseDelayMs: 500, maxDelayMs: 3000 };
    assert.deepEqual(
      [1, 2, 3, 4, 5].map((n) => backoffDelay(n, retry)),
      [500, 1000, 2000, 3000, 3000],
    );
  });

  it("schedules the node and python tasks concurrently", async () => {
    const gate = deferred();
    provider({ name: "node", setup: () => gate.promise });
    provider({ name: "python", setup: () => gate.promise });
    const inst = installer();
    const running = inst.run(inst.plan(profileOf({ node: "20.10.0", python: "3.11.0" })));

    await until(() => journal.length >= 2);
    assert.deepEqual(journal, ["start:node", "start:python"]);
    gate.resolve();

    const report = await running;
    assert.equal(report.ok, true);
    assert.deepEqual(
      report.tasks.map((t) => [t.plugin, t.version, t.status]),
      [
        ["node", "20.10.0", "succeeded"],
        ["python", "3.11.0", "succeeded"],
      ],
    );
    assert.ok(existsSync(join(cacheDir, "node", "20.10.0", ".devenv-complete")));
  });

  it("never starts a task before its dependency succeeded", async () => {
    const slow = async () => {
      for (let i = 0; i < 5; i++) await tick();
    };
    provider({ name: "base", setup: slow });
    provider({ name: "mid", dependsOn: ["base"], setup: slow });
    provider({ name: "top", dependsOn: ["mid", "base"] });
    provider({ name: "side", setup: slow });
    const inst = installer();
    const report = await inst.run(inst.plan(profileOf({ top: undefined, side: undefined })));

    assert.equal(report.ok, true);
    const at = (event: string) => journal.indexOf(event);
    assert.ok(at("end:base") < at("start:mid"));
    assert.ok(at("end:mid") < at("start:top"));
    assert.ok(at("start:side") < at("end:base"), "independent branch runs alongside");
  });

  it("passes dependency activations to dependents", async () => {
    let seen: NodeJS.ProcessEnv = {};
    provider({ name: "node" });
    provider({
      name: "yarn",
      dependsOn: ["node"],
      setup: async (ctx) => {
        seen = ctx.env;
      },
    });
    const inst = installer();
    await inst.run(inst.plan(profileOf({}, ["yarn"])));

    const nodeDir = join(cacheDir, "node", "1.0.0");
    assert.equal(seen.NODE_HOME, nodeDir);
    assert.equal(seen.PATH, [join(nodeDir, "bin"), "/usr/bin"].join(delimiter));
  });

  it("finishes N independent tasks with K < N workers", async () => {
    let inFlight = 0;
    let peak = 0;
    const names = ["a", "b", "c", "d", "e", "f"];
    for (const name of names) {
      provider({
        name,
        setup: async () => {
          inFlight++;
          peak = Math.max(peak, inFlight);
          await tick();
          inFlight--;
        },
      });
    }
    const inst = installer({ concurrency: 2 });
    const report = await inst.run(
      inst.plan(profileOf(Object.fromEntries(names.map((n) => [n, undefined])))),
    );

    assert.deepEqual(
      report.tasks.map((t) => t.status),
      names.map((): TaskStatus => "succeeded"),
    );
    assert.equal(peak, 2);
  });

  it("ends Failed after exhausting retries on transient errors", async () => {
    const p = provider({
      name: "flaky",
      setup: async () => {
        throw transient("flaky");
      },
    });
    const statuses: TaskStatus[] = [];
    const inst = installer();
    const report = await inst.run(inst.plan(profileOf({ flaky: undefined })), {
      onTaskUpdate: (t) => statuses.push(t.status),
    });

    const [task] = report.tasks;
    assert.equal(task.status, "failed");
    assert.equal(task.attempts, 3);
    assert.equal(task.lastError, "flaky download timed out");
    assert.deepEqual(statuses, ["running", "retrying", "running", "retrying", "running", "failed"]);
    assert.deepEqual(sleeps, [100, 150]);
    assert.equal(p.calls.length, 3);
  });

  it("recovers when a retry succeeds", async () => {
    let calls = 0;
    provider({
      name: "flaky",
      setup: async () => {
        if (++calls === 1) throw transient("flaky");
      },
    });
    const inst = installer();
    const report = await inst.run(inst.plan(profileOf({ flaky: undefined })));
    assert.deepEqual(
      report.tasks.map((t) => [t.status, t.attempts]),
      [["succeeded", 2]],
    );
  });

  it("treats a task timeout as transient", async () => {
    provider({ name: "hang", setup: () => new Promise<void>(() => {}) });
    const inst = installer({
      taskTimeoutMs: 20,
      retry: { maxAttempts: 2, baseDelayMs: 0, maxDelayMs: 0 },
    });
    const report = await inst.run(inst.plan(profileOf({ hang: undefined })));
    const [task] = report.tasks;
    assert.equal(task.status, "failed");
    assert.equal(task.attempts, 2);
    assert.equal(task.lastError, "hang@1.0.0 install timed out after 20ms");
  });

  it("runs the fallback once after a permanent failure", async () => {
    const p = provider({
      name: "python",
      setup: async () => {
        throw permanent("python");
      },
      fallback: async () => {},
    });
    const inst = installer();
    const report = await inst.run(inst.plan(profileOf({ python: undefined })));
    assert.deepEqual(
      report.tasks.map((t) => [t.status, t.usedFallback, t.attempts]),
      [["succeeded", true, 1]],
    );
    assert.deepEqual(p.calls, ["start@1.0.0", "fallback@1.0.0"]);
    assert.deepEqual(sleeps, []);
  });

  it("fails when the fallback fails too", async () => {
    provider({
      name: "python",
      setup: async () => {
        throw permanent("python");
      },
      fallback: async () => {
        throw new Error("make: *** [install] Error 2");
      },
    });
    const inst = installer();
    const [task] = (await inst.run(inst.plan(profileOf({ python: undefined })))).tasks;
    assert.equal(task.status, "failed");
    assert.equal(task.lastError, "python@1.0.0 install failed: make: *** [install] Error 2");
  });

  it("keeps independent branches going when one task fails", async () => {
    provider({
      name: "a",
      setup: async () => {
        throw permanent("a");
      },
    });
    provider({ name: "b" });
    provider({ name: "c" });
    provider({ name: "d", dependsOn: ["a"] });
    const inst = installer();
    const report = await inst.run(
      inst.plan(profileOf({ a: undefined, b: undefined, c: undefined, d: undefined })),
    );

    assert.equal(report.ok, false);
    assert.deepEqual(
      report.tasks.map((t) => [t.plugin, t.status, t.blockedBy]),
      [
        ["a", "failed", undefined],
        ["b", "succeeded", undefined],
        ["c", "succeeded", undefined],
        ["d", "pending", "a"],
      ],
    );
    assert.equal(journal.includes("start:d"), false);
  });

  it("lets running tasks finish but starts nothing after an abort", async () => {
    const controller = new AbortController();
    provider({
      name: "a",
      setup: async () => {
        controller.abort();
        await tick();
      },
    });
    provider({ name: "b" });
    provider({ name: "c" });
    const inst = installer({ concurrency: 1 });
    const plan = inst.plan(profileOf({ a: undefined, b: undefined, c: undefined }));
    const report = await inst.run(plan, { signal: controller.signal });

    assert.equal(report.cancelled, true);
    assert.equal(report.ok, false);
    assert.deepEqual(
      report.tasks.map((t) => t.status),
      ["succeeded", "pending", "pending"],
    );
  });

  it("uses a completed cache entry and updates it when asked", async () => {
    const p = provider({ name: "go", defaultVersion: "1.22.5" });
    mkdirSync(join(cacheDir, "go", "1.22.5"), { recursive: true });
    writeFileSync(join(cacheDir, "go", "1.22.5", ".devenv-complete"), "1.22.5\n");

    const inst = installer({ autoUpdate: true });
    const report = await inst.run(inst.plan(profileOf({ go: "1.22.5" })));
    assert.deepEqual(
      report.tasks.map((t) => [t.status, t.cached]),
      [["succeeded", true]],
    );
    assert.deepEqual(p.calls, ["update@1.22.5"]);
  });

  it("lets only one writer populate a cache key", async () => {
    const p = provider({ name: "node", setup: () => tick() });
    const locks = new KeyedMutex();
    const first = installer({ locks });
    const second = installer({ locks });
    const profile = profileOf({ node: "20.10.0" });

    const reports = await Promise.all([
      first.run(first.plan(profile)),
      second.run(second.plan(profile)),
    ]);

    assert.deepEqual(p.calls, ["start@20.10.0"]);
    assert.deepEqual(
      reports.map((r) => r.tasks[0].cached),
      [false, true],
    );
  });

  describe("project dependencies", () => {
    it("installs through leaf plugins only", async () => {
      provider({ name: "node" });
      provider({ name: "yarn", dependsOn: ["node"] });
      const inst = installer();
      const report = await inst.run(inst.plan(profileOf({ node: undefined }, ["yarn"])), {
        projectPath: "/work/app",
        installDependencies: true,
      });
      assert.deepEqual(report.warnings, []);
      assert.ok(journal.includes("deps:yarn"));
      assert.equal(journal.includes("deps:node"), false);
    });

    it("runs a declared install script instead", async () => {
      provider({ name: "node" });
      const runner = new FakeRunner(() => ({ code: 2 }));
      const inst = installer({ runner });
      const report = await inst.run(inst.plan(profileOf({ node: undefined })), {
        projectPath: "/work/app",
        installDependencies: true,
        scripts: { install: "make deps" },
      });
      assert.deepEqual(runner.scripts(), ["make deps"]);
      assert.equal(runner.invocations[0].opts?.cwd, "/work/app");
      assert.deepEqual(report.warnings, ["install script exited with code 2"]);
      assert.equal(journal.includes("deps:node"), false);
    });

    it("records dependency failures as warnings", async () => {
      provider({
        name: "node",
        installDependencies: async () => {
          throw new Error("npm ERR! code E404");
        },
      });
      const inst = installer();
      const report = await inst.run(inst.plan(profileOf({ node: undefined })), {
        projectPath: "/work/app",
        installDependencies: true,
      });
      assert.equal(report.ok, true);
      assert.deepEqual(report.warnings, ["node: dependency install failed: npm ERR! code E404"]);
    });
  });
});
