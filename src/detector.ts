import { readdir, readFile, stat } from "node:fs/promises";
import { join, resolve } from "node:path";
import { z } from "zod";
import { DetectionAmbiguousError } from "./errors.js";
import type { ProjectConfig } from "./schema.js";
import type {
  FrameworkDetection,
  LanguageDetection,
  ProjectProfile,
  ToolDetection,
} from "./types.js";

// Specificity ranks: a higher rank overrides a lower one for the same name.
const MANIFEST = 1;
const TOOLING = 2;
const FRAMEWORK = 3;
const VERSION_FILE = 4;

type Hit =
  | { kind: "language"; name: string; version?: string }
  | { kind: "framework"; name: string; language: string }
  | { kind: "tool"; name: string; version?: string };

interface Signature {
  /** Path relative to the project root. */
  file: string;
  rank: number;
  confidence: number;
  match(content: string): Hit[];
}

interface Match {
  hit: Hit;
  rank: number;
  order: number;
  confidence: number;
  source: string;
}

const PackageJson = z.object({
  engines: z.object({ node: z.string().optional() }).optional(),
  dependencies: z.record(z.string(), z.string()).optional(),
  devDependencies: z.record(z.string(), z.string()).optional(),
  packageManager: z.string().optional(),
});

type PackageJson = z.infer<typeof PackageJson>;

function parsePackageJson(content: string): PackageJson {
  try {
    const result = PackageJson.safeParse(JSON.parse(content));
    return result.success ? result.data : {};
  } catch {
    // An unparseable manifest still identifies a node project
    return {};
  }
}

const lang = (name: string, version?: string): Hit => ({ kind: "language", name, version });
const tool = (name: string, version?: string): Hit => ({ kind: "tool", name, version });
const framework = (name: string, language: string): Hit => ({ kind: "framework", name, language });

function versionFile(name: string) {
  return (content: string): Hit[] => {
    const line = content.split("\n")[0]?.trim() ?? "";
    return [lang(name, line ? cleanVersion(line) : undefined)];
  };
}

function firstMatch(content: string, pattern: RegExp): string | undefined {
  const found = content.match(pattern);
  return found?.[1] ? cleanVersion(found[1]) : undefined;
}

const NODE_FRAMEWORKS: Record<string, string> = {
  next: "nextjs",
  nuxt: "nuxt",
  "@angular/core": "angular",
  react: "react",
  vue: "vue",
  svelte: "svelte",
  express: "express",
};

const PYTHON_FRAMEWORKS = ["django", "flask", "fastapi"];

// asdf names that differ from ours
const TOOL_VERSIONS_ALIASES: Record<string, string> = {
  nodejs: "node",
  golang: "go",
};

const KNOWN_LANGUAGES = new Set(["node", "python", "go", "rust", "ruby"]);

function toolVersionsEntry(asdfName: string, version: string): Hit {
  const name = TOOL_VERSIONS_ALIASES[asdfName] ?? asdfName;
  return KNOWN_LANGUAGES.has(name) ? lang(name, cleanVersion(version)) : tool(name, cleanVersion(version));
}

function pythonFrameworks(content: string): Hit[] {
  const lower = content.toLowerCase();
  return PYTHON_FRAMEWORKS.filter((name) =>
    new RegExp(`(^|[\\s"'\\[])${name}([\\s=<>~!\\[;"']|$)`, "m").test(lower),
  ).map((name) => framework(name, "python"));
}

/**
 * Known signature files, most specific first. Position in this table breaks
 * ties between equally ranked matches.
 */
export const SIGNATURES: readonly Signature[] = [
  { file: ".nvmrc", rank: VERSION_FILE, confidence: 0.95, match: versionFile("node") },
  { file: ".node-version", rank: VERSION_FILE, confidence: 0.95, match: versionFile("node") },
  { file: ".python-version", rank: VERSION_FILE, confidence: 0.95, match: versionFile("python") },
  { file: ".go-version", rank: VERSION_FILE, confidence: 0.95, match: versionFile("go") },
  { file: ".ruby-version", rank: VERSION_FILE, confidence: 0.95, match: versionFile("ruby") },
  { file: "rust-toolchain", rank: VERSION_FILE, confidence: 0.95, match: versionFile("rust") },
  {
    file: "rust-toolchain.toml",
    rank: VERSION_FILE,
    confidence: 0.95,
    match: (c) => [lang("rust", firstMatch(c, /^\s*channel\s*=\s*"([^"]+)"/m))],
  },
  {
    file: ".tool-versions",
    rank: VERSION_FILE,
    confidence: 0.9,
    match: (c) =>
      c
        .split("\n")
        .map((line) => line.trim().split(/\s+/))
        .filter(([name, version]) => name && version && !name.startsWith("#"))
        .map(([name, version]) => toolVersionsEntry(name, version)),
  },

  { file: "next.config.js", rank: FRAMEWORK, confidence: 0.9, match: () => [framework("nextjs", "node")] },
  { file: "next.config.mjs", rank: FRAMEWORK, confidence: 0.9, match: () => [framework("nextjs", "node")] },
  { file: "next.config.ts", rank: FRAMEWORK, confidence: 0.9, match: () => [framework("nextjs", "node")] },
  { file: "nuxt.config.ts", rank: FRAMEWORK, confidence: 0.9, match: () => [framework("nuxt", "node")] },
  { file: "angular.json", rank: FRAMEWORK, confidence: 0.9, match: () => [framework("angular", "node")] },
  { file: "manage.py", rank: FRAMEWORK, confidence: 0.85, match: () => [framework("django", "python")] },
  {
    file: "package.json",
    rank: FRAMEWORK,
    confidence: 0.8,
    match: (c) => {
      const pkg = parsePackageJson(c);
      const deps = { ...pkg.devDependencies, ...pkg.dependencies };
      return Object.keys(NODE_FRAMEWORKS)
        .filter((dep) => dep in deps)
        .map((dep) => framework(NODE_FRAMEWORKS[dep], "node"));
    },
  },
  { file: "requirements.txt", rank: FRAMEWORK, confidence: 0.8, match: pythonFrameworks },
  { file: "pyproject.toml", rank: FRAMEWORK, confidence: 0.8, match: pythonFrameworks },

  {
    file: "package.json",
    rank: TOOLING,
    confidence: 0.9,
    match: (c) => {
      const spec = parsePackageJson(c).packageManager;
      if (!spec) return [];
      const [name, version] = spec.split("@");
      return [tool(name, version ? cleanVersion(version.split("+")[0]) : undefined)];
    },
  },
  { file: "yarn.lock", rank: TOOLING, confidence: 0.9, match: () => [tool("yarn")] },
  { file: "pnpm-lock.yaml", rank: TOOLING, confidence: 0.9, match: () => [tool("pnpm")] },
  { file: "package-lock.json", rank: TOOLING, confidence: 0.9, match: () => [tool("npm")] },
  { file: "poetry.lock", rank: TOOLING, confidence: 0.9, match: () => [tool("poetry")] },
  { file: "uv.lock", rank: TOOLING, confidence: 0.9, match: () => [tool("uv")] },
  { file: "Pipfile.lock", rank: TOOLING, confidence: 0.9, match: () => [tool("pipenv")] },
  { file: "Cargo.lock", rank: TOOLING, confidence: 0.9, match: () => [tool("cargo")] },
  { file: ".github/workflows", rank: TOOLING, confidence: 0.7, match: () => [tool("github-actions")] },
  { file: ".gitlab-ci.yml", rank: TOOLING, confidence: 0.7, match: () => [tool("gitlab-ci")] },
  { file: "Dockerfile", rank: TOOLING, confidence: 0.6, match: () => [tool("docker")] },
  { file: "Makefile", rank: TOOLING, confidence: 0.4, match: () => [tool("make")] },

  {
    file: "package.json",
    rank: MANIFEST,
    confidence: 0.8,
    match: (c) => {
      const node = parsePackageJson(c).engines?.node;
      return [lang("node", node ? cleanVersion(node) : undefined)];
    },
  },
  { file: "tsconfig.json", rank: MANIFEST, confidence: 0.6, match: () => [lang("node")] },
  {
    file: "pyproject.toml",
    rank: MANIFEST,
    confidence: 0.8,
    match: (c) => [lang("python", firstMatch(c, /^\s*requires-python\s*=\s*"([^"]+)"/m))],
  },
  {
    file: "Pipfile",
    rank: MANIFEST,
    confidence: 0.75,
    match: (c) => [lang("python", firstMatch(c, /^\s*python_version\s*=\s*"([^"]+)"/m))],
  },
  { file: "requirements.txt", rank: MANIFEST, confidence: 0.7, match: () => [lang("python")] },
  { file: "setup.py", rank: MANIFEST, confidence: 0.7, match: () => [lang("python")] },
  {
    file: "go.mod",
    rank: MANIFEST,
    confidence: 0.9,
    match: (c) => [lang("go", firstMatch(c, /^go\s+(\d+\.\d+(?:\.\d+)?)\s*$/m))],
  },
  {
    file: "Cargo.toml",
    rank: MANIFEST,
    confidence: 0.9,
    match: (c) => [lang("rust", firstMatch(c, /^\s*rust-version\s*=\s*"([^"]+)"/m))],
  },
  {
    file: "Gemfile",
    rank: MANIFEST,
    confidence: 0.8,
    match: (c) => [lang("ruby", firstMatch(c, /^\s*ruby\s+["']([^"']+)["']/m))],
  },
];

export function cleanVersion(raw: string): string {
  return raw.trim().replace(/^v(?=\d)/, "");
}

/** Reads each signature file at most once; directories read as "". */
async function readSignature(root: string, file: string, cache: Map<string, string | null>) {
  const cached = cache.get(file);
  if (cached !== undefined) return cached;

  const path = join(root, file);
  let content: string | null = null;
  try {
    const info = await stat(path);
    content = info.isDirectory()
      ? (await readdir(path)).length > 0
        ? ""
        : null
      : await readFile(path, "utf-8");
  } catch {
    content = null;
  }
  cache.set(file, content);
  return content;
}

function byPrecedence(a: Match, b: Match): number {
  return b.rank - a.rank || a.order - b.order;
}

function resolveLanguages(matches: Match[]): Record<string, LanguageDetection> {
  const grouped = new Map<string, Match[]>();
  for (const m of matches) {
    if (m.hit.kind === "tool") continue;
    const name = m.hit.kind === "framework" ? m.hit.language : m.hit.name;
    grouped.set(name, [...(grouped.get(name) ?? []), m]);
  }

  const languages: Record<string, LanguageDetection> = {};
  for (const name of [...grouped.keys()].sort()) {
    const group = (grouped.get(name) ?? []).sort(byPrecedence);
    const versioned = group.filter(
      (m): m is Match & { hit: { version: string } } =>
        m.hit.kind === "language" && m.hit.version !== undefined,
    );

    if (versioned.length > 0) {
      const top = versioned[0];
      const rival = versioned.find(
        (m) => m.rank === top.rank && m.hit.version !== top.hit.version,
      );
      if (rival) throw new DetectionAmbiguousError(name, [top.source, rival.source]);
    }

    const entry: LanguageDetection = {
      confidence: Math.max(...group.map((m) => m.confidence)),
      source: group[0].source,
    };
    if (versioned.length > 0) entry.version = versioned[0].hit.version;
    languages[name] = entry;
  }
  return languages;
}

function resolveFrameworks(matches: Match[]): FrameworkDetection[] {
  const out = new Map<string, FrameworkDetection>();
  for (const m of [...matches].sort(byPrecedence)) {
    if (m.hit.kind !== "framework") continue;
    const existing = out.get(m.hit.name);
    if (existing) {
      existing.confidence = Math.max(existing.confidence, m.confidence);
      continue;
    }
    out.set(m.hit.name, {
      name: m.hit.name,
      language: m.hit.language,
      confidence: m.confidence,
      source: m.source,
    });
  }
  return [...out.values()].sort((a, b) => a.name.localeCompare(b.name));
}

function resolveTools(matches: Match[]): ToolDetection[] {
  const out = new Map<string, ToolDetection>();
  for (const m of [...matches].sort(byPrecedence)) {
    if (m.hit.kind !== "tool") continue;
    const existing = out.get(m.hit.name);
    if (existing) {
      existing.confidence = Math.max(existing.confidence, m.confidence);
      existing.version ??= m.hit.version;
      continue;
    }
    const entry: ToolDetection = { name: m.hit.name, confidence: m.confidence, source: m.source };
    if (m.hit.version) entry.version = m.hit.version;
    out.set(m.hit.name, entry);
  }
  return [...out.values()].sort((a, b) => a.name.localeCompare(b.name));
}

export function freezeProfile(profile: ProjectProfile): ProjectProfile {
  for (const entry of Object.values(profile.languages)) Object.freeze(entry);
  profile.frameworks.forEach((f) => Object.freeze(f));
  profile.tools.forEach((t) => Object.freeze(t));
  Object.freeze(profile.languages);
  Object.freeze(profile.frameworks);
  Object.freeze(profile.tools);
  Object.freeze(profile.scripts);
  return Object.freeze(profile);
}

export function emptyProfile(root: string): ProjectProfile {
  return freezeProfile({ root, languages: {}, frameworks: [], tools: [], scripts: {} });
}

export class ProjectDetector {
  constructor(
    private readonly minConfidence = 0.5,
    private readonly signatures: readonly Signature[] = SIGNATURES,
  ) {}

  /**
   * Inspect a project directory. Side-effect free: the same directory
   * contents always yield the same profile.
   */
  async detect(rootPath: string): Promise<ProjectProfile> {
    const root = resolve(rootPath);
    const cache = new Map<string, string | null>();
    const matches: Match[] = [];

    for (const [order, sig] of this.signatures.entries()) {
      if (sig.confidence < this.minConfidence) continue;
      const content = await readSignature(root, sig.file, cache);
      if (content === null) continue;
      for (const hit of sig.match(content)) {
        matches.push({ hit, rank: sig.rank, order, confidence: sig.confidence, source: sig.file });
      }
    }

    if (matches.length === 0) return emptyProfile(root);

    return freezeProfile({
      root,
      languages: resolveLanguages(matches),
      frameworks: resolveFrameworks(matches),
      tools: resolveTools(matches),
      scripts: {},
    });
  }
}

/** Overlay the languages, tools and scripts a project declares in devenv.yaml. */
export function applyProjectConfig(
  profile: ProjectProfile,
  config: ProjectConfig | undefined,
): ProjectProfile {
  if (!config) return profile;
  const source = "devenv.yaml";

  const languages: Record<string, LanguageDetection> = { ...profile.languages };
  for (const [name, version] of Object.entries(config.languages ?? {})) {
    languages[name] = { version: cleanVersion(String(version)), confidence: 1, source };
  }

  const tools = new Map(profile.tools.map((t) => [t.name, t]));
  const declared = Array.isArray(config.tools)
    ? config.tools.map((name): [string, string | undefined] => [name, undefined])
    : Object.entries(config.tools ?? {}).map(([name, v]): [string, string | undefined] => [
        name,
        cleanVersion(String(v)),
      ]);
  for (const [name, version] of declared) {
    const entry: ToolDetection = { name, confidence: 1, source };
    if (version) entry.version = version;
    tools.set(name, entry);
  }

  const sortedLanguages: Record<string, LanguageDetection> = {};
  for (const name of Object.keys(languages).sort()) sortedLanguages[name] = { ...languages[name] };

  return freezeProfile({
    root: profile.root,
    languages: sortedLanguages,
    frameworks: profile.frameworks.map((f) => ({ ...f })),
    tools: [...tools.values()].map((t) => ({ ...t })).sort((a, b) => a.name.localeCompare(b.name)),
    scripts: { ...profile.scripts, ...config.scripts },
  });
}
