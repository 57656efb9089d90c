import { describe, it, afterEach } from "node:test";
import assert from "node:assert/strict";
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { ProjectDetector, applyProjectConfig, emptyProfile } from "./detector.js";
import { DetectionAmbiguousError } from "./errors.js";
import { tempDir } from "./test-support.js";

function project(files: Record<string, string>): string {
  const root = tempDir("devenv-detect-");
  for (const [file, content] of Object.entries(files)) {
    mkdirSync(dirname(join(root, file)), { recursive: true });
    writeFileSync(join(root, file), content);
  }
  return root;
}

describe("ProjectDetector", () => {
  const detector = new ProjectDetector();
  const roots: string[] = [];
  const make = (files: Record<string, string>) => {
    const root = project(files);
    roots.push(root);
    return root;
  };

  afterEach(() => {
    for (const root of roots.splice(0)) rmSync(root, { recursive: true, force: true });
  });

  it("finds node from engines and python from .python-version", async () => {
    const root = make({
      "package.json": JSON.stringify({ name: "app", engines: { node: "20.10.0" } }),
      ".python-version": "3.11.0\n",
    });
    const profile = await detector.detect(root);
    assert.deepEqual(profile.languages, {
      node: { version: "20.10.0", confidence: 0.8, source: "package.json" },
      python: { version: "3.11.0", confidence: 0.95, source: ".python-version" },
    });
    assert.deepEqual(profile.tools, []);
    assert.deepEqual(profile.frameworks, []);
  });

  it("is idempotent on an unchanged directory", async () => {
    const root = make({
      "package.json": JSON.stringify({ dependencies: { react: "^18.0.0" } }),
      "yarn.lock": "",
      ".nvmrc": "v20.11.1",
    });
    assert.deepEqual(await detector.detect(root), await detector.detect(root));
  });

  it("lets a version file override the manifest", async () => {
    const root = make({
      "package.json": JSON.stringify({ engines: { node: ">=18" } }),
      ".nvmrc": "v18.19.0\n",
    });
    const { languages } = await detector.detect(root);
    assert.deepEqual(languages.node, { version: "18.19.0", confidence: 0.95, source: ".nvmrc" });
  });

  it("surfaces conflicting versions at the same rank", async () => {
    const root = make({ ".nvmrc": "18.19.0", ".node-version": "20.10.0" });
    await assert.rejects(
      () => detector.detect(root),
      (err: unknown) =>
        err instanceof DetectionAmbiguousError &&
        err.language === "node" &&
        err.sources.join(",") === ".nvmrc,.node-version",
    );
  });

  it("detects frameworks and the languages they imply", async () => {
    const root = make({
      "next.config.js": "module.exports = {}",
      "package.json": JSON.stringify({ dependencies: { next: "14.0.0", react: "18.2.0" } }),
    });
    const profile = await detector.detect(root);
    assert.deepEqual(
      profile.frameworks.map((f) => [f.name, f.source]),
      [
        ["nextjs", "next.config.js"],
        ["react", "package.json"],
      ],
    );
    assert.equal(profile.languages.node.source, "next.config.js");
    assert.equal(profile.languages.node.version, undefined);
  });

  it("reads the package manager version from packageManager", async () => {
    const root = make({
      "package.json": JSON.stringify({ packageManager: "yarn@4.1.0+sha512.abc" }),
      "yarn.lock": "",
    });
    const { tools } = await detector.detect(root);
    assert.deepEqual(tools, [
      { name: "yarn", version: "4.1.0", confidence: 0.9, source: "package.json" },
    ]);
  });

  it("maps asdf names in .tool-versions", async () => {
    const root = make({ ".tool-versions": "nodejs 20.11.0\ngolang 1.22.1\n# comment\n" });
    const { languages } = await detector.detect(root);
    assert.deepEqual(Object.keys(languages), ["go", "node"]);
    assert.equal(languages.go.version, "1.22.1");
    assert.equal(languages.node.version, "20.11.0");
  });

  it("keeps tooling out of the language map", async () => {
    const root = make({
      "package.json": JSON.stringify({ name: "app", engines: { node: "20.10.0" } }),
      "yarn.lock": "",
      Dockerfile: "FROM node:20\n",
      ".github/workflows/ci.yml": "on: push\n",
    });
    const { languages, tools } = await detector.detect(root);
    assert.deepEqual(Object.keys(languages), ["node"]);
    assert.deepEqual(tools.map((t) => t.name), ["docker", "github-actions", "yarn"]);
  });

  it("reads unknown .tool-versions entries as tools", async () => {
    const root = make({ ".tool-versions": "terraform 1.7.0\nnodejs 20.11.0\nruby 3.3.0\n" });
    const { languages, tools } = await detector.detect(root);
    assert.deepEqual(Object.keys(languages), ["node", "ruby"]);
    assert.deepEqual(tools, [
      { name: "terraform", version: "1.7.0", confidence: 0.9, source: ".tool-versions" },
    ]);
  });

  it("returns an empty profile when nothing clears the threshold", async () => {
    const root = make({ Makefile: "all:\n\ttrue\n" });
    assert.deepEqual(await detector.detect(root), emptyProfile(root));

    const lenient = new ProjectDetector(0.3);
    const { tools } = await lenient.detect(root);
    assert.deepEqual(tools.map((t) => t.name), ["make"]);
  });

  it("returns a frozen profile", async () => {
    const root = make({ "go.mod": "module example.com/app\n\ngo 1.22.5\n" });
    const profile = await detector.detect(root);
    assert.equal(profile.languages.go.version, "1.22.5");
    assert.ok(Object.isFrozen(profile));
    assert.ok(Object.isFrozen(profile.languages));
  });
});

describe("applyProjectConfig", () => {
  it("overlays declared languages, tools and scripts", () => {
    const base = emptyProfile("/work/api");
    const profile = applyProjectConfig(base, {
      languages: { python: "3.12", node: "v20.10.0" },
      tools: { poetry: "1.8.3" },
      scripts: { install: "make deps" },
    });
    assert.deepEqual(profile.languages, {
      node: { version: "20.10.0", confidence: 1, source: "devenv.yaml" },
      python: { version: "3.12", confidence: 1, source: "devenv.yaml" },
    });
    assert.deepEqual(profile.tools, [
      { name: "poetry", version: "1.8.3", confidence: 1, source: "devenv.yaml" },
    ]);
    assert.deepEqual(profile.scripts, { install: "make deps" });
  });

  it("returns the profile unchanged without a config", () => {
    const base = emptyProfile("/work/api");
    assert.equal(applyProjectConfig(base, undefined), base);
  });
});
