import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { parse } from "yaml";
import { defaultSettings } from "./config.js";
import {
  createEngine,
  environmentNameFor,
  profileFromEnvironment,
  type OrchestrationEngine,
} from "./engine.js";
import type { Result } from "./errors.js";
import { silentLogger } from "./log.js";
import type { VariableTarget } from "./state-machine.js";
import { FakeProvider, FakeRunner, permanent, tempDir } from "./test-support.js";
import type { Environment, ProjectProfile } from "./types.js";

function valueOf<T>(result: Result<T>): T {
  if (!result.ok) assert.fail(`expected ok, got ${result.error.kind}: ${result.error.message}`);
  return result.value;
}

function errorKind<T>(result: Result<T>): string {
  if (result.ok) return assert.fail("expected an error result");
  return result.error.kind;
}

function profile(root: string, languages: Record<string, string>): ProjectProfile {
  return {
    root,
    languages: Object.fromEntries(
      Object.entries(languages).map(([name, version]) => [
        name,
        { version, confidence: 1, source: "test" },
      ]),
    ),
    frameworks: [{ name: "zap", language: "zig", confidence: 0.9, source: "test" }],
    tools: [],
    scripts: { test: "zig build test" },
  };
}

describe("environmentNameFor", () => {
  it("derives a valid name from a directory", () => {
    assert.equal(environmentNameFor("/work/My App"), "my-app");
    assert.equal(environmentNameFor("/work/_private"), "private");
  });
});

describe("profileFromEnvironment", () => {
  it("rebuilds the profile an environment was set up with", () => {
    const env: Environment = {
      name: "web",
      status: "degraded",
      projectPath: "/work/web",
      languages: { node: "20", python: "*" },
      tools: ["yarn"],
      frameworks: { nextjs: "node" },
      scripts: { install: "make deps" },
      plugins: {},
      variables: {},
      createdAt: "2024-05-01T10:00:00.000Z",
    };
    const rebuilt = profileFromEnvironment(env);

    assert.equal(rebuilt.root, "/work/web");
    assert.deepEqual(rebuilt.languages, {
      node: { version: "20", confidence: 1, source: "environment" },
      python: { confidence: 1, source: "environment" },
    });
    assert.deepEqual(rebuilt.frameworks, [
      { name: "nextjs", language: "node", confidence: 1, source: "environment" },
    ]);
    assert.deepEqual(rebuilt.tools, [{ name: "yarn", confidence: 1, source: "environment" }]);
    assert.deepEqual(rebuilt.scripts, { install: "make deps" });
  });
});

describe("OrchestrationEngine", () => {
  let home: string;
  let project: string;
  let target: VariableTarget;
  let zigBroken: boolean;
  let engine: OrchestrationEngine;

  const open = () =>
    createEngine(defaultSettings(join(home, ".devenv")), {
      runner: new FakeRunner(),
      logger: silentLogger,
      target,
      env: { PATH: "/usr/bin" },
      sleep: async () => {},
      providers: [
        new FakeProvider({
          name: "zig",
          defaultVersion: "0.11.0",
          setup: async () => {
            if (zigBroken) throw permanent("zig");
          },
        }),
        new FakeProvider({ name: "deno", defaultVersion: "1.40.0" }),
      ],
    });

  const cacheDir = () => join(home, ".devenv", "cache");

  beforeEach(async () => {
    home = tempDir("devenv-engine-");
    project = join(home, "app");
    mkdirSync(project);
    target = { PATH: "/usr/bin" };
    zigBroken = false;
    engine = await open();
  });

  afterEach(() => {
    rmSync(home, { recursive: true, force: true });
  });

  describe("detect", () => {
    it("returns the project profile", async () => {
      writeFileSync(join(project, ".nvmrc"), "v20.10.0\n");
      writeFileSync(join(project, "yarn.lock"), "");
      const detected = valueOf(await engine.detect(project));

      assert.equal(detected.root, project);
      assert.deepEqual(detected.languages, {
        node: { version: "20.10.0", confidence: 0.95, source: ".nvmrc" },
      });
      assert.deepEqual(
        detected.tools.map((t) => t.name),
        ["yarn"],
      );
    });

    it("applies devenv.yaml overrides", async () => {
      writeFileSync(join(project, ".nvmrc"), "18\n");
      writeFileSync(join(project, "devenv.yaml"), "languages:\n  node: '20'\n");
      const detected = valueOf(await engine.detect(project));
      assert.equal(detected.languages.node.version, "20");
      assert.equal(detected.languages.node.source, "devenv.yaml");
    });

    it("returns a configuration error for an invalid devenv.yaml", async () => {
      writeFileSync(join(project, "devenv.yaml"), "name: Not Valid\n");
      assert.equal(errorKind(await engine.detect(project)), "ConfigurationError");
    });

    it("returns a detection error for conflicting version files", async () => {
      writeFileSync(join(project, ".nvmrc"), "18\n");
      writeFileSync(join(project, ".node-version"), "20\n");
      assert.equal(errorKind(await engine.detect(project)), "DetectionAmbiguous");
    });
  });

  describe("setup and switching", () => {
    it("sets up and activates an environment", async () => {
      const { environment, report } = valueOf(
        await engine.setup(profile(project, { zig: "0.11.0" })),
      );

      assert.equal(environment.name, "app");
      assert.equal(environment.status, "active");
      assert.equal(report.ok, true);
      assert.deepEqual(environment.frameworks, { zap: "zig" });
      assert.deepEqual(environment.scripts, { test: "zig build test" });
      assert.equal(target.ZIG_HOME, join(cacheDir(), "zig", "0.11.0"));
    });

    it("reports a failed install as a degraded environment, not an error", async () => {
      zigBroken = true;
      const { environment, report } = valueOf(
        await engine.setup(profile(project, { zig: "0.11.0" }), { name: "broken" }),
      );
      assert.equal(environment.status, "degraded");
      assert.equal(report.tasks[0].lastError, "zig checksum mismatch");
    });

    it("returns PluginNotFound for a language nothing provides", async () => {
      const result = await engine.setup(profile(project, { cobol: "6.4" }));
      assert.equal(errorKind(result), "PluginNotFound");
    });

    it("refuses to take over an environment named for another project", async () => {
      const first = join(home, "a", "app");
      const second = join(home, "b", "app");
      mkdirSync(first, { recursive: true });
      mkdirSync(second, { recursive: true });
      valueOf(await engine.setup(profile(first, { zig: "0.11.0" })));

      const result = await engine.setup(profile(second, { deno: "1.40.0" }));
      assert.equal(errorKind(result), "NameConflict");

      const [app] = valueOf(await engine.list()).environments;
      assert.equal(app.projectPath, first);
      assert.deepEqual(app.plugins, { zig: "0.11.0" });
      assert.equal(app.status, "active");
    });

    it("takes the environment name from devenv.yaml", async () => {
      writeFileSync(join(project, "devenv.yaml"), "name: custom\n");
      const { environment } = valueOf(await engine.setup(profile(project, { zig: "0.11.0" })));
      assert.equal(environment.name, "custom");
    });

    it("switches between environments and lists the active one", async () => {
      valueOf(await engine.setup(profile(project, { zig: "0.11.0" }), { name: "app" }));
      valueOf(await engine.setup(profile(project, { deno: "1.40.0" }), { name: "tool" }));

      let listed = valueOf(await engine.list());
      assert.deepEqual(
        listed.environments.map((e) => [e.name, e.status]),
        [
          ["app", "inactive"],
          ["tool", "active"],
        ],
      );
      assert.equal(listed.active, "tool");
      assert.equal(target.ZIG_HOME, undefined);

      valueOf(await engine.switch("app"));
      listed = valueOf(await engine.list());
      assert.equal(listed.active, "app");
      assert.equal(target.DENO_HOME, undefined);
      assert.equal(target.ZIG_HOME, join(cacheDir(), "zig", "0.11.0"));
    });

    it("keeps the active environment across engine instances", async () => {
      valueOf(await engine.setup(profile(project, { zig: "0.11.0" })));
      const reopened = await open();
      assert.equal(valueOf(await reopened.list()).active, "app");
    });

    it("returns errors for unknown environments instead of throwing", async () => {
      assert.equal(errorKind(await engine.switch("ghost")), "EnvironmentNotFound");
      assert.equal(errorKind(await engine.status("ghost")), "EnvironmentNotFound");
      assert.equal(errorKind(await engine.remove("ghost")), "EnvironmentNotFound");
      assert.equal(errorKind(await engine.share("ghost")), "EnvironmentNotFound");
    });

    it("deactivates the active environment", async () => {
      valueOf(await engine.setup(profile(project, { zig: "0.11.0" })));
      const env = valueOf(await engine.deactivate());
      assert.equal(env?.name, "app");
      assert.deepEqual(target, { PATH: "/usr/bin" });
    });
  });

  describe("status", () => {
    it("records the health check on the environment", async () => {
      valueOf(await engine.setup(profile(project, { zig: "0.11.0" })));
      const record = valueOf(await engine.status("app"));

      assert.equal(record.status, "healthy");
      assert.equal(record.score, 100);
      const stored = valueOf(await (await open()).list()).environments[0];
      assert.equal(stored.health?.status, "healthy");
      assert.equal(stored.health?.checkedAt, record.checkedAt);
    });
  });

  describe("remove", () => {
    it("removes an active environment and frees its name", async () => {
      valueOf(await engine.setup(profile(project, { zig: "0.11.0" })));
      const script = valueOf(await engine.writeActivationScript("app", "export ZIG_HOME=x\n"));
      assert.equal(readFileSync(script, "utf-8"), "export ZIG_HOME=x\n");

      const removed = valueOf(await engine.remove("app"));
      assert.equal(removed.status, "removed");
      assert.deepEqual(valueOf(await engine.list()), { environments: [], active: undefined });
      assert.deepEqual(target, { PATH: "/usr/bin" });

      valueOf(await engine.setup(profile(project, { zig: "0.11.0" })));
    });
  });

  describe("share and import", () => {
    it("round-trips an environment through its shared descriptor", async () => {
      valueOf(await engine.setup(profile(project, { zig: "0.11.0" })));
      const shared = valueOf(await engine.share("app"));

      assert.deepEqual(parse(shared), {
        schema_version: 1,
        name: "app",
        languages: { zig: "0.11.0" },
        tools: [],
        frameworks: { zap: "zig" },
        scripts: { test: "zig build test" },
      });

      const imported = valueOf(await engine.import(shared, { name: "copy", projectPath: project }));
      assert.equal(imported.status, "uninitialized");
      assert.deepEqual(imported.languages, { zig: "0.11.0" });
      assert.deepEqual(imported.frameworks, { zap: "zig" });
      assert.equal(imported.projectPath, project);

      const { environment } = valueOf(await engine.repair("copy"));
      assert.equal(environment.status, "active");
      assert.deepEqual(environment.plugins, { zig: "0.11.0" });
    });

    it("rejects an import under a name that is taken", async () => {
      valueOf(await engine.setup(profile(project, { zig: "0.11.0" })));
      const shared = valueOf(await engine.share("app"));
      assert.equal(
        errorKind(await engine.import(shared, { projectPath: project })),
        "NameConflict",
      );
    });

    it("rejects descriptors that do not validate", async () => {
      const wrongVersion = "schema_version: 2\nname: app\nlanguages: {}\n";
      assert.equal(
        errorKind(await engine.import(wrongVersion, { projectPath: project })),
        "ConfigurationError",
      );
      assert.equal(
        errorKind(await engine.import("name: [unclosed", { projectPath: project })),
        "ConfigurationError",
      );
    });
  });

  describe("init", () => {
    it("writes devenv.yaml when the project has none", async () => {
      const { environment } = valueOf(await engine.init(project, { name: "app" }));
      assert.equal(environment.status, "active");
      assert.deepEqual(parse(readFileSync(join(project, "devenv.yaml"), "utf-8")), {
        name: "app",
        languages: {},
      });
    });

    it("names the environment after devenv.yaml", async () => {
      writeFileSync(join(project, "devenv.yaml"), "name: custom\nlanguages:\n  zig: 0.11.0\n");
      const { environment } = valueOf(await engine.init(project));
      assert.equal(environment.name, "custom");
      assert.deepEqual(
        valueOf(await engine.list()).environments.map((e) => e.name),
        ["custom"],
      );
    });

    it("leaves an existing devenv.yaml alone", async () => {
      writeFileSync(join(project, "devenv.yaml"), "languages:\n  zig: 0.11.0\n");
      const { environment } = valueOf(await engine.init(project));
      assert.deepEqual(environment.plugins, { zig: "0.11.0" });
      assert.equal(
        readFileSync(join(project, "devenv.yaml"), "utf-8"),
        "languages:\n  zig: 0.11.0\n",
      );
    });
  });

  describe("plugins", () => {
    it("lists built-in, extra and script plugins", async () => {
      const pluginsDir = join(home, ".devenv", "plugins");
      mkdirSync(pluginsDir, { recursive: true });
      writeFileSync(
        join(pluginsDir, "just.yaml"),
        [
          "name: just",
          "default_version: 1.25.0",
          "install: cargo install just --version {version} --root {install_dir}",
          "check: just --version",
        ].join("\n"),
      );
      const plugins = valueOf(await (await open()).plugins());
      const names = plugins.map((p) => p.name);

      assert.ok(names.includes("node"));
      assert.ok(names.includes("zig"));
      assert.deepEqual(
        plugins.find((p) => p.name === "just"),
        {
          name: "just",
          kind: "tool",
          provides: ["just"],
          versions: "*",
          defaultVersion: "1.25.0",
          dependsOn: [],
          fallback: false,
        },
      );
    });
  });
});
