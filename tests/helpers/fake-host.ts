/**
 * In-process stand-in for the docker, tar, sudo and chown commands.
 *
 * Archives written by the fake are JSON documents mapping relative paths to
 * file contents, so tests can read back what was captured.
 */

import { cpSync, existsSync, mkdirSync, readdirSync, readFileSync, statSync, writeFileSync } from "node:fs";
import * as path from "node:path";
import type { CommandOptions, CommandResult } from "../../src/utils/exec";

export interface FakeMount {
  Type: "volume" | "bind";
  Source: string;
  Destination: string;
  Name?: string;
}

export interface FakeContainer {
  id: string;
  name: string;
  image: string;
  running: boolean;
  labels: Record<string, string>;
  mounts: FakeMount[];
  /** Files `docker cp` can copy out, by absolute path inside the container */
  files: Record<string, string>;
}

export interface RecordedCall {
  command: string;
  args: string[];
  cwd?: string;
}

interface Failure {
  matches: (command: string, args: string[]) => boolean;
  stderr: string;
}

type FileMap = Record<string, string>;

const ok = (stdout = ""): CommandResult => ({ success: true, stdout, stderr: "", exitCode: 0 });
const fail = (stderr: string, exitCode = 1): CommandResult => ({
  success: false,
  stdout: "",
  stderr,
  exitCode,
});

function walkFiles(root: string, base: string, into: FileMap): void {
  const stats = statSync(root);
  if (stats.isFile()) {
    into[path.relative(base, root)] = readFileSync(root, "utf-8");
    return;
  }
  for (const entry of readdirSync(root)) {
    walkFiles(path.join(root, entry), base, into);
  }
}

export function writeFakeArchive(archivePath: string, entries: FileMap): void {
  mkdirSync(path.dirname(archivePath), { recursive: true });
  writeFileSync(archivePath, JSON.stringify({ entries }));
}

/**
 * Entries of an archive written by the fake
 */
export function readFakeArchive(archivePath: string): FileMap {
  const parsed: unknown = JSON.parse(readFileSync(archivePath, "utf-8"));
  if (typeof parsed !== "object" || parsed === null || !("entries" in parsed)) {
    throw new Error(`Not a fake archive: ${archivePath}`);
  }
  const entries: unknown = parsed.entries;
  const files: FileMap = {};
  if (typeof entries === "object" && entries !== null) {
    for (const [key, value] of Object.entries(entries)) {
      if (typeof value === "string") {
        files[key] = value;
      }
    }
  }
  return files;
}

export class FakeHost {
  dockerAvailable = true;
  readonly volumes = new Map<string, FileMap>();
  readonly networks = new Set<string>(["bridge", "host", "none"]);
  readonly images = new Set<string>(["alpine:latest", "busybox:latest"]);
  readonly containers: FakeContainer[] = [];
  /** Images `docker pull` cannot fetch */
  readonly unpullable = new Set<string>();
  readonly calls: RecordedCall[] = [];
  readonly composeUps: string[] = [];
  readonly loadedArchives: string[] = [];
  readonly chowns: Array<{ owner: string; dir: string }> = [];
  /** Build contexts by image tag */
  readonly builds = new Map<string, string>();
  private readonly created = new Map<string, string>();
  private readonly failures: Failure[] = [];
  private nextId = 1;

  addVolume(name: string, files: FileMap = {}): void {
    this.volumes.set(name, { ...files });
  }

  addContainer(container: Partial<FakeContainer> & { name: string; image: string }): FakeContainer {
    const full: FakeContainer = {
      id: container.id ?? `c${this.nextId++}`,
      running: true,
      labels: {},
      mounts: [],
      files: {},
      ...container,
    };
    this.containers.push(full);
    this.images.add(full.image);
    return full;
  }

  /**
   * Make every matching invocation fail with `stderr`
   */
  failOn(matches: (command: string, args: string[]) => boolean, stderr = "simulated failure"): void {
    this.failures.push({ matches, stderr });
  }

  /** Calls made to one executable, e.g. "docker" */
  callsTo(command: string): string[][] {
    return this.calls.filter((c) => c.command === command).map((c) => c.args);
  }

  async run(command: string, args: string[], options: CommandOptions = {}): Promise<CommandResult> {
    this.calls.push(options.cwd ? { command, args, cwd: options.cwd } : { command, args });

    const failure = this.failures.find((f) => f.matches(command, args));
    if (failure) {
      return fail(failure.stderr);
    }

    switch (command) {
      case "docker":
        return this.docker(args, options);
      case "tar":
        return this.hostTar(args);
      case "sudo":
        return args[0] === "tar" ? this.hostTar(args.slice(1)) : fail(`sudo: ${args[0]}: unsupported`);
      case "chown":
        return this.chown(args);
      default:
        return fail(`${command}: command not found`, 127);
    }
  }

  private findContainer(ref: string): FakeContainer | undefined {
    return this.containers.find((c) => c.id === ref || c.name === ref);
  }

  private inspectJson(container: FakeContainer): object {
    return {
      Id: container.id,
      Name: `/${container.name}`,
      Config: { Image: container.image, Labels: container.labels },
      Mounts: container.mounts,
    };
  }

  private docker(args: string[], options: CommandOptions): CommandResult {
    if (!this.dockerAvailable) {
      return fail("Cannot connect to the Docker daemon at unix:///var/run/docker.sock");
    }

    const [sub, ...rest] = args;
    switch (sub) {
      case "info":
        return ok("Server Version: fake");
      case "volume":
        return this.volume(rest);
      case "network":
        return this.network(rest);
      case "ps":
        return this.ps(rest);
      case "inspect": {
        const found: object[] = [];
        for (const ref of rest) {
          const container = this.findContainer(ref);
          if (!container) {
            return fail(`Error: No such object: ${ref}`);
          }
          found.push(this.inspectJson(container));
        }
        return ok(JSON.stringify(found));
      }
      case "image":
        return rest[0] === "inspect" && rest[1] && this.images.has(rest[1])
          ? ok("[]")
          : fail(`Error: No such image: ${rest[1] ?? ""}`);
      case "pull": {
        const image = rest[0] ?? "";
        if (this.unpullable.has(image)) {
          return fail(`Error response from daemon: pull access denied for ${image}`);
        }
        this.images.add(image);
        return ok(`Status: Image is up to date for ${image}`);
      }
      case "save":
        return this.save(rest);
      case "load": {
        const archive = rest[1] ?? "";
        if (!existsSync(archive)) {
          return fail(`open ${archive}: no such file or directory`);
        }
        this.loadedArchives.push(archive);
        return ok("Loaded image");
      }
      case "images":
        return this.listImages(rest);
      case "build":
        return this.build(rest);
      case "create": {
        const image = rest[0] ?? "";
        if (!this.images.has(image)) {
          return fail(`Unable to find image '${image}' locally`);
        }
        const id = `created${this.nextId++}`;
        this.created.set(id, image);
        return ok(id);
      }
      case "cp":
        return this.copy(rest);
      case "rm":
        this.created.delete(rest[1] ?? "");
        return ok();
      case "compose":
        if (!options.cwd) {
          return fail("no configuration file provided: not found");
        }
        this.composeUps.push(options.cwd);
        return ok();
      case "run":
        return this.runHelper(rest);
      default:
        return fail(`docker: '${sub ?? ""}' is not a docker command`);
    }
  }

  private volume(args: string[]): CommandResult {
    const [action, name] = args;
    switch (action) {
      case "ls":
        return ok(
          [...this.volumes.keys()]
            .map((n) =>
              JSON.stringify({
                Driver: "local",
                Mountpoint: `/var/lib/docker/volumes/${n}/_data`,
                Name: n,
                Scope: "local",
              }),
            )
            .join("\n"),
        );
      case "create":
        if (name && !this.volumes.has(name)) {
          this.volumes.set(name, {});
        }
        return ok(name);
      case "inspect":
        return name && this.volumes.has(name) ? ok("[]") : fail(`Error: No such volume: ${name ?? ""}`);
      default:
        return fail(`unsupported volume action ${action ?? ""}`);
    }
  }

  private network(args: string[]): CommandResult {
    const [action, name] = args;
    if (action === "ls") {
      return ok([...this.networks].join("\n"));
    }
    if (action === "create" && name) {
      if (this.networks.has(name)) {
        return fail(`Error response from daemon: network with name ${name} already exists`);
      }
      this.networks.add(name);
      return ok("netid");
    }
    return fail(`unsupported network action ${action ?? ""}`);
  }

  private ps(args: string[]): CommandResult {
    const all = args.includes("-a") || args.includes("-aq");
    const selected = this.containers.filter((c) => all || c.running);
    if (args.includes("-q") || args.includes("-aq")) {
      return ok(selected.map((c) => c.id).join("\n"));
    }
    const format = args[args.indexOf("--format") + 1];
    if (format === "{{.Image}}") {
      return ok(selected.map((c) => c.image).join("\n"));
    }
    return ok(selected.map((c) => `${c.name}\t${c.image}`).join("\n"));
  }

  private save(args: string[]): CommandResult {
    const [flag, output, ...images] = args;
    if (flag !== "-o" || !output) {
      return fail("save: missing -o");
    }
    const missing = images.filter((i) => !this.images.has(i));
    if (missing.length > 0) {
      return fail(`Error response from daemon: reference does not exist: ${missing.join(", ")}`);
    }
    writeFileSync(output, JSON.stringify({ images }));
    return ok();
  }

  private listImages(args: string[]): CommandResult {
    const refs = [...this.images].sort();
    if (args[0] === "--format") {
      return ok(refs.join("\n"));
    }
    const repository = args[0] ?? "";
    return ok(
      refs
        .filter((ref) => ref.startsWith(`${repository}:`))
        .map((ref) => ref.slice(repository.length + 1))
        .join("\n"),
    );
  }

  private build(args: string[]): CommandResult {
    const [flag, tag, contextDir] = args;
    if (flag !== "-t" || !tag || !contextDir) {
      return fail("build: usage");
    }
    if (!existsSync(path.join(contextDir, "Dockerfile"))) {
      return fail("failed to read dockerfile: open Dockerfile: no such file or directory");
    }
    this.images.add(tag);
    this.builds.set(tag, contextDir);
    return ok(`naming to docker.io/library/${tag} done`);
  }

  private copy(args: string[]): CommandResult {
    const [source = "", destination = ""] = args;
    const split = source.indexOf(":");
    const ref = source.slice(0, split);
    const sourcePath = source.slice(split + 1);

    const image = this.created.get(ref);
    if (image) {
      const contextDir = this.builds.get(image);
      const from = contextDir ? path.join(contextDir, sourcePath) : "";
      if (!from || !existsSync(from)) {
        return fail(`Error: Could not find the file ${sourcePath} in container ${ref}`);
      }
      cpSync(from, path.join(destination, path.basename(sourcePath)), { recursive: true });
      return ok();
    }

    const container = this.findContainer(ref);
    const content = container?.files[sourcePath];
    if (content === undefined) {
      return fail(`Error response from daemon: Could not find the file ${sourcePath} in container ${ref}`);
    }
    writeFileSync(destination, content);
    return ok();
  }

  /**
   * `docker run --rm -v a:b[:ro]... IMAGE tar ...` against the volume maps
   */
  private runHelper(args: string[]): CommandResult {
    const mounts = new Map<string, string>();
    let i = 0;
    for (; i < args.length; i++) {
      const arg = args[i];
      if (arg === "--rm") {
        continue;
      }
      if (arg === "-v") {
        const [source = "", target = ""] = (args[i + 1] ?? "").split(":");
        mounts.set(target, source);
        i++;
        continue;
      }
      break;
    }

    const image = args[i] ?? "";
    if (!this.images.has(image)) {
      return fail(`Unable to find image '${image}' locally`);
    }

    const [tool, mode, archive = "", , into = ""] = args.slice(i + 1);
    if (tool !== "tar") {
      return fail(`unsupported helper command ${tool ?? ""}`);
    }

    const hostPath = (containerPath: string): string =>
      path.join(mounts.get(path.dirname(containerPath)) ?? "/nonexistent", path.basename(containerPath));

    if (mode === "-czf") {
      const volume = mounts.get(into) ?? "";
      const files = this.volumes.get(volume);
      if (!files) {
        return fail(`tar: ${into}: Cannot open: No such file or directory`);
      }
      writeFakeArchive(hostPath(archive), files);
      return ok();
    }

    if (mode === "-xzf") {
      const volume = mounts.get(into) ?? "";
      const source = hostPath(archive);
      if (!existsSync(source)) {
        return fail(`tar: ${archive}: Cannot open: No such file or directory`);
      }
      this.volumes.set(volume, { ...(this.volumes.get(volume) ?? {}), ...readFakeArchive(source) });
      return ok();
    }

    return fail(`unsupported tar mode ${mode ?? ""}`);
  }

  private hostTar(args: string[]): CommandResult {
    const [mode, archive = "", flag, dir = "", ...members] = args;
    if (flag !== "-C") {
      return fail("tar: missing -C");
    }

    if (mode === "-czf") {
      const entries: FileMap = {};
      for (const member of members) {
        const full = path.join(dir, member);
        if (!existsSync(full)) {
          return fail(`tar: ${member}: Cannot stat: No such file or directory`);
        }
        walkFiles(full, dir, entries);
      }
      writeFakeArchive(archive, entries);
      return ok();
    }

    if (mode === "-xzf") {
      if (!existsSync(archive)) {
        return fail(`tar: ${archive}: Cannot open: No such file or directory`);
      }
      for (const [relative, content] of Object.entries(readFakeArchive(archive))) {
        const target = path.join(dir, relative);
        mkdirSync(path.dirname(target), { recursive: true });
        writeFileSync(target, content);
      }
      return ok();
    }

    return fail(`tar: unsupported mode ${mode ?? ""}`);
  }

  private chown(args: string[]): CommandResult {
    const [flag, owner = "", dir = ""] = args;
    if (flag !== "-R") {
      return fail("chown: usage");
    }
    this.chowns.push({ owner, dir });
    return ok();
  }
}

let activeHost = new FakeHost();

/**
 * Replace the host the mocked runCommand talks to
 */
export function installFakeHost(): FakeHost {
  activeHost = new FakeHost();
  return activeHost;
}

export function runOnFakeHost(
  command: string,
  args: string[],
  options: CommandOptions = {},
): Promise<CommandResult> {
  return activeHost.run(command, args, options);
}
