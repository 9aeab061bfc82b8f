import { mkdir, writeFile } from "node:fs/promises";
import { basename, extname, join } from "node:path";

export type Snapshot = {
  tag: string;
  path: string;
  savedAt: number;
};

const pad = (value: number, width = 2): string => String(value).padStart(width, "0");

export const runStamp = (date: Date): string =>
  `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;

export const iterationTag = (iteration: number, suffix?: string): string =>
  `iter${pad(iteration, 3)}${suffix ? `_${suffix}` : ""}`;

const isAlreadyExists = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "EEXIST";

/** Creates `<base>/<stamp>`, or `<stamp>-2`, `<stamp>-3`, ... when a run already claimed it. */
const claimRunDir = async (base: string, stamp: string): Promise<string> => {
  await mkdir(base, { recursive: true });
  for (let attempt = 1; ; attempt += 1) {
    const dir = join(base, attempt === 1 ? stamp : `${stamp}-${attempt}`);
    try {
      await mkdir(dir);
      return dir;
    } catch (error) {
      if (!isAlreadyExists(error)) throw error;
    }
  }
};

/**
 * Append-only copies of the working file, one per tag, under
 * `<projectRoot>/<runsDir>/<stamp>/snapshots/<stem>.<tag><ext>`.
 */
export class SnapshotStore {
  readonly runDir: string;
  readonly snapshotsDir: string;
  private readonly stem: string;
  private readonly ext: string;
  private readonly now: () => number;
  private readonly saved: Snapshot[] = [];

  private constructor(args: { runDir: string; target: string; now: () => number }) {
    this.runDir = args.runDir;
    this.snapshotsDir = join(args.runDir, "snapshots");
    this.ext = extname(args.target);
    this.stem = basename(args.target, this.ext);
    this.now = args.now;
  }

  static async create(args: {
    projectRoot: string;
    target: string;
    runsDir?: string;
    now?: () => number;
  }): Promise<SnapshotStore> {
    const now = args.now ?? Date.now;
    const runDir = await claimRunDir(join(args.projectRoot, args.runsDir ?? ".agent_runs"), runStamp(new Date(now())));
    const store = new SnapshotStore({ runDir, target: args.target, now });
    await mkdir(store.snapshotsDir, { recursive: true });
    return store;
  }

  pathFor(tag: string): string {
    return join(this.snapshotsDir, `${this.stem}.${tag}${this.ext}`);
  }

  async save(tag: string, content: string): Promise<Snapshot> {
    const snapshot: Snapshot = { tag, path: this.pathFor(tag), savedAt: this.now() };
    await writeFile(snapshot.path, content, "utf8");
    this.saved.push(snapshot);
    return snapshot;
  }

  list(): Snapshot[] {
    return [...this.saved];
  }
}
