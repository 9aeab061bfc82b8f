import { mkdtemp, readFile, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, test } from "vitest";
import { runRepairSession, type ApplyPatchImpl } from "../src/loop/repairLoop.js";
import type { RepairEvent } from "../src/loop/events.js";
import { DecliningOracle } from "../src/oracle/decliningOracle.js";
import type { OracleReply, PatchOracle } from "../src/oracle/types.js";
import { FakeToolchain } from "./helpers/fakeToolchain.js";

const LOG_IMPORT = "import Mathlib.Analysis.SpecialFunctions.Log.Basic";

type ScriptedCall = { operation: "repair" | "extend" | "document"; fileText: string; extra?: string | string[] };

/** Replies are consumed in order per operation; an exhausted queue declines. */
class ScriptedOracle implements PatchOracle {
  readonly name = "scripted";
  readonly calls: ScriptedCall[] = [];
  private readonly replies: Record<ScriptedCall["operation"], Array<OracleReply | null>>;

  constructor(replies: Partial<Record<ScriptedCall["operation"], Array<OracleReply | null>>>) {
    this.replies = { repair: [...(replies.repair ?? [])], extend: [...(replies.extend ?? [])], document: [...(replies.document ?? [])] };
  }

  private next(operation: ScriptedCall["operation"]): OracleReply | null {
    return this.replies[operation].shift() ?? null;
  }

  async repair(fileText: string, errors: string[]): Promise<OracleReply | null> {
    this.calls.push({ operation: "repair", fileText, extra: errors });
    return this.next("repair");
  }

  async extend(fileText: string, theme: string): Promise<OracleReply | null> {
    this.calls.push({ operation: "extend", fileText, extra: theme });
    return this.next("extend");
  }

  async document(fileText: string): Promise<OracleReply | null> {
    this.calls.push({ operation: "document", fileText });
    return this.next("document");
  }
}

const setup = async (source: string) => {
  const root = await mkdtemp(join(tmpdir(), "leanmend-loop-"));
  const target = join(root, "Main.lean");
  await writeFile(target, source, "utf8");
  return { root, target };
};

const tagsOf = (snapshots: Array<{ tag: string }>): string[] => snapshots.map((snapshot) => snapshot.tag);

describe("repair loop", () => {
  test("accepts the deterministic import fix and finishes", async () => {
    const source = "theorem log_one : Real.log 1 = 0 := by simp\n";
    const { root, target } = await setup(source);
    const toolchain = new FakeToolchain({
      root,
      target,
      errorsFor: (content) => (content.includes(LOG_IMPORT) ? [] : ["unknown identifier 'Real.log'"])
    });
    const oracle = new ScriptedOracle({});

    const result = await runRepairSession({ target, toolchain, oracle });

    expect(result.ok).toBe(true);
    expect(result.status).toBe("ok");
    expect(result.iterations).toBe(2);
    expect(result.reason).toBe("build ok; no documentation produced");
    expect(await readFile(target, "utf8")).toBe(`${LOG_IMPORT}\n${source}`);
    expect(tagsOf(result.snapshots)).toEqual(["iter000", "iter001_det"]);
    expect(toolchain.checks).toEqual([source, `${LOG_IMPORT}\n${source}`]);
    expect(oracle.calls.map((call) => call.operation)).toEqual(["document"]);
  });

  test("runs exactly two extension cycles before documenting once", async () => {
    const { root, target } = await setup("def a := 1\n");
    const toolchain = new FakeToolchain({ root, target, errorsFor: () => [] });
    const oracle = new ScriptedOracle({
      extend: [
        { kind: "file", content: "def a := 1\ndef b := 2\n" },
        { kind: "file", content: "def a := 1\ndef b := 2\ndef c := 3\n" }
      ],
      document: [{ kind: "file", content: "-- numbers\ndef a := 1\ndef b := 2\ndef c := 3\n" }]
    });

    const result = await runRepairSession({ target, toolchain, oracle, updates: 2, theme: "X" });

    expect(result.status).toBe("ok");
    expect(result.iterations).toBe(3);
    expect(result.documented).toBe(true);
    expect(result.reason).toBe("build ok; documentation added");
    expect(oracle.calls.map((call) => [call.operation, call.extra])).toEqual([
      ["extend", "X"],
      ["extend", "X"],
      ["document", undefined]
    ]);
    expect(toolchain.builds).toHaveLength(4);
    expect(tagsOf(result.snapshots)).toEqual(["iter000", "iter001_extend", "iter002_extend", "iter003_docs"]);
    expect(await readFile(target, "utf8")).toBe("-- numbers\ndef a := 1\ndef b := 2\ndef c := 3\n");
  });

  test("reverts documentation that breaks the build byte for byte", async () => {
    const original = "def a := 1\r\n-- keep this  \n";
    const { root, target } = await setup(original);
    const toolchain = new FakeToolchain({
      root,
      target,
      errorsFor: (content) => (content.includes("BROKEN") ? ["unexpected token"] : [])
    });
    const oracle = new ScriptedOracle({ document: [{ kind: "file", content: "BROKEN doc\n" }] });
    const events: RepairEvent[] = [];

    const result = await runRepairSession({ target, toolchain, oracle, onEvent: (event) => events.push(event) });

    expect(await readFile(target, "utf8")).toBe(original);
    expect(result.status).toBe("ok");
    expect(result.documented).toBe(true);
    expect(result.reason).toBe("build ok; documentation reverted");
    expect(tagsOf(result.snapshots)).toEqual(["iter000", "iter001_docs", "iter001_docs_revert"]);
    expect(await readFile(result.snapshots[2].path, "utf8")).toBe(original);
    expect(events.some((event) => event.type === "document_reverted")).toBe(true);
    expect(oracle.calls.filter((call) => call.operation === "document")).toHaveLength(1);
  });

  test("stops as stuck without further iterations when a patch fails to apply", async () => {
    const { root, target } = await setup("theorem a : 1 = 2 := rfl\n");
    const toolchain = new FakeToolchain({ root, target, errorsFor: () => ["type mismatch"] });
    const oracle = new ScriptedOracle({ repair: [{ kind: "diff", patch: "--- Main.lean\n+++ Main.lean\n@@ -1 +1 @@\n-x\n+y\n" }] });
    const patches: Array<{ diffText: string; cwd: string }> = [];
    const applyPatch: ApplyPatchImpl = async (diffText, cwd) => {
      patches.push({ diffText, cwd });
      return { ok: false, noop: false, stdout: "", stderr: "Hunk #1 FAILED" };
    };

    const result = await runRepairSession({ target, toolchain, oracle, applyPatch, maxIters: 5 });

    expect(result.status).toBe("stuck");
    expect(result.ok).toBe(false);
    expect(result.iterations).toBe(1);
    expect(result.reason).toBe("patch failed to apply");
    expect(toolchain.builds).toHaveLength(1);
    expect(patches).toEqual([{ diffText: "--- Main.lean\n+++ Main.lean\n@@ -1 +1 @@\n-x\n+y\n", cwd: root }]);
    expect(tagsOf(result.snapshots)).toEqual(["iter000"]);
  });

  test("snapshots the patched content after a diff repair applies", async () => {
    const { root, target } = await setup("theorem a : 1 = 2 := rfl\n");
    const toolchain = new FakeToolchain({ root, target, errorsFor: (content) => (content.includes("1 = 2") ? ["type mismatch"] : []) });
    const oracle = new ScriptedOracle({ repair: [{ kind: "diff", patch: "patch body\n" }] });
    const applyPatch: ApplyPatchImpl = async () => {
      await writeFile(target, "theorem a : 1 = 1 := rfl\n", "utf8");
      return { ok: true, noop: false, stdout: "patching file Main.lean", stderr: "" };
    };

    const result = await runRepairSession({ target, toolchain, oracle, applyPatch });

    expect(result.status).toBe("ok");
    expect(tagsOf(result.snapshots)).toEqual(["iter000", "iter001_repair_patch"]);
    expect(await readFile(result.snapshots[1].path, "utf8")).toBe("theorem a : 1 = 1 := rfl\n");
  });

  test("terminates within the iteration budget when the oracle never helps", async () => {
    const { root, target } = await setup("theorem a : 1 = 2 := rfl\n");
    const toolchain = new FakeToolchain({ root, target, errorsFor: () => ["type mismatch"] });
    const oracle = new ScriptedOracle({
      repair: Array.from({ length: 10 }, (_, idx): OracleReply => ({ kind: "file", content: `theorem a : 1 = 2 := rfl -- try ${idx}\n` }))
    });

    const result = await runRepairSession({ target, toolchain, oracle, maxIters: 4 });

    expect(result.status).toBe("dirty");
    expect(result.ok).toBe(false);
    expect(result.iterations).toBe(4);
    expect(result.reason).toBe("iteration budget exhausted");
    expect(toolchain.builds).toHaveLength(4);
    expect(result.errors).toEqual(["type mismatch"]);
  });

  test("without an oracle an unknown error ends stuck instead of throwing", async () => {
    const { root, target } = await setup("theorem a : 1 = 2 := rfl\n");
    const toolchain = new FakeToolchain({ root, target, errorsFor: () => ["type mismatch"] });

    const result = await runRepairSession({ target, toolchain, oracle: new DecliningOracle() });

    expect(result.status).toBe("stuck");
    expect(result.reason).toBe("oracle returned no repair");
    expect(result.iterations).toBe(1);
  });

  test("rejects a deterministic fix that adds errors and leaves the file untouched", async () => {
    const source = "example : Real.log 1 = 0 := by simp\n";
    const { root, target } = await setup(source);
    const toolchain = new FakeToolchain({
      root,
      target,
      errorsFor: (content) => (content.includes(LOG_IMPORT) ? ["unknown package", "bad import"] : ["unknown identifier 'Real.log'"])
    });
    const events: RepairEvent[] = [];

    const result = await runRepairSession({
      target,
      toolchain,
      oracle: new DecliningOracle(),
      onEvent: (event) => events.push(event)
    });

    expect(result.status).toBe("stuck");
    expect(await readFile(target, "utf8")).toBe(source);
    expect(tagsOf(result.snapshots)).toEqual(["iter000"]);
    expect(events.filter((event) => event.type === "fix_trial")).toEqual([
      { type: "fix_trial", iteration: 1, note: "import log", errorCount: 2, baseline: 1 }
    ]);
  });

  test("a missing lean checker leaves the session stuck without asking the oracle", async () => {
    const { root, target } = await setup("def a := 1\n");
    const toolchain = new FakeToolchain({ root, target, errorsFor: () => ["unknown package 'Mathlib'"], checkUnavailable: true });
    const oracle = new ScriptedOracle({ repair: [{ kind: "file", content: "x\n" }] });

    const result = await runRepairSession({ target, toolchain, oracle });

    expect(result.status).toBe("stuck");
    expect(result.reason).toBe("toolchain unavailable (tried: lake env lean, lean)\nlean: spawn lean ENOENT");
    expect(oracle.calls).toEqual([]);
  });

  test("a missing build executable stops the session even when single-file checks still run", async () => {
    const source = "def a := 1\n";
    const { root, target } = await setup(source);
    const toolchain = new FakeToolchain({ root, target, errorsFor: () => [], buildMissing: true });
    const oracle = new ScriptedOracle({ repair: [{ kind: "file", content: "-- rewrite\n" }] });

    const result = await runRepairSession({ target, toolchain, oracle, maxIters: 3 });

    expect(result.status).toBe("stuck");
    expect(result.iterations).toBe(1);
    expect(result.reason).toBe("toolchain unavailable (lake build): spawn lake ENOENT");
    expect(result.errors).toEqual(["toolchain unavailable (lake build): spawn lake ENOENT"]);
    expect(oracle.calls).toEqual([]);
    expect(toolchain.checks).toEqual([]);
    expect(await readFile(target, "utf8")).toBe(source);
  });

  test("reverts a documentation diff that fails to apply", async () => {
    const original = "def a := 1\ndef b := 2\n";
    const { root, target } = await setup(original);
    const toolchain = new FakeToolchain({ root, target, errorsFor: () => [] });
    const oracle = new ScriptedOracle({ document: [{ kind: "diff", patch: "doc patch\n" }] });
    const applyPatch: ApplyPatchImpl = async () => {
      await writeFile(target, "-- half\ndef a := 1\n", "utf8");
      return { ok: false, noop: false, stdout: "", stderr: "Hunk #2 FAILED at 2." };
    };

    const result = await runRepairSession({ target, toolchain, oracle, applyPatch });

    expect(result.status).toBe("ok");
    expect(result.reason).toBe("build ok; documentation reverted");
    expect(tagsOf(result.snapshots)).toEqual(["iter000", "iter001_docs_revert"]);
    expect(toolchain.builds).toHaveLength(1);
    expect(await readFile(target, "utf8")).toBe(original);
  });

  test("reverts an applied documentation diff that breaks the build", async () => {
    const original = "def a := 1\n";
    const { root, target } = await setup(original);
    const toolchain = new FakeToolchain({
      root,
      target,
      errorsFor: (content) => (content.includes("BROKEN") ? ["unexpected token"] : [])
    });
    const oracle = new ScriptedOracle({ document: [{ kind: "diff", patch: "doc patch\n" }] });
    const applyPatch: ApplyPatchImpl = async () => {
      await writeFile(target, "BROKEN\ndef a := 1\n", "utf8");
      return { ok: true, noop: false, stdout: "patching file Main.lean", stderr: "" };
    };

    const result = await runRepairSession({ target, toolchain, oracle, applyPatch });

    expect(result.reason).toBe("build ok; documentation reverted");
    expect(tagsOf(result.snapshots)).toEqual(["iter000", "iter001_docs_patch", "iter001_docs_revert"]);
    expect(await readFile(result.snapshots[1].path, "utf8")).toBe("BROKEN\ndef a := 1\n");
    expect(toolchain.builds).toEqual([original, "BROKEN\ndef a := 1\n"]);
    expect(await readFile(target, "utf8")).toBe(original);
  });

  test("snapshots an applied extension diff and documents on the next iteration", async () => {
    const { root, target } = await setup("def a := 1\n");
    const toolchain = new FakeToolchain({ root, target, errorsFor: () => [] });
    const oracle = new ScriptedOracle({ extend: [{ kind: "diff", patch: "extension patch\n" }] });
    const patches: Array<{ diffText: string; cwd: string }> = [];
    const applyPatch: ApplyPatchImpl = async (diffText, cwd) => {
      patches.push({ diffText, cwd });
      await writeFile(target, "def a := 1\ndef b := 2\n", "utf8");
      return { ok: true, noop: false, stdout: "patching file Main.lean", stderr: "" };
    };

    const result = await runRepairSession({ target, toolchain, oracle, applyPatch, updates: 1 });

    expect(result.status).toBe("ok");
    expect(result.iterations).toBe(2);
    expect(result.reason).toBe("build ok; no documentation produced");
    expect(patches).toEqual([{ diffText: "extension patch\n", cwd: root }]);
    expect(tagsOf(result.snapshots)).toEqual(["iter000", "iter001_extend_patch"]);
    expect(await readFile(result.snapshots[1].path, "utf8")).toBe("def a := 1\ndef b := 2\n");
    expect(oracle.calls.map((call) => call.operation)).toEqual(["extend", "document"]);
  });

  test("an extension diff that fails to apply ends stuck and leaves recovery to the snapshots", async () => {
    const source = "def a := 1\n";
    const { root, target } = await setup(source);
    const toolchain = new FakeToolchain({ root, target, errorsFor: () => [] });
    const oracle = new ScriptedOracle({ extend: [{ kind: "diff", patch: "extension patch\n" }] });
    const applyPatch: ApplyPatchImpl = async () => {
      await writeFile(target, "def a := 1\ndef", "utf8");
      return { ok: false, noop: false, stdout: "", stderr: "Hunk #2 FAILED at 3." };
    };

    const result = await runRepairSession({ target, toolchain, oracle, applyPatch, updates: 2 });

    expect(result.status).toBe("stuck");
    expect(result.reason).toBe("patch failed to apply");
    expect(result.iterations).toBe(1);
    expect(tagsOf(result.snapshots)).toEqual(["iter000"]);
    expect(await readFile(result.snapshots[0].path, "utf8")).toBe(source);
    expect(await readFile(target, "utf8")).toBe("def a := 1\ndef");
    expect(oracle.calls.map((call) => call.operation)).toEqual(["extend"]);
  });

  test("a clean build with a placeholder marker is repaired through the oracle", async () => {
    const { root, target } = await setup("theorem t : True := by sorry\n");
    const toolchain = new FakeToolchain({ root, target, errorsFor: () => [] });
    const oracle = new ScriptedOracle({ repair: [{ kind: "file", content: "theorem t : True := trivial\n" }] });

    const result = await runRepairSession({ target, toolchain, oracle });

    expect(result.status).toBe("ok");
    expect(oracle.calls[0]).toEqual({
      operation: "repair",
      fileText: "theorem t : True := by sorry\n",
      extra: ["contains `sorry`"]
    });
    expect(tagsOf(result.snapshots)).toEqual(["iter000", "iter001_repair"]);
  });

  test("a declined extension moves straight to documentation in the same iteration", async () => {
    const { root, target } = await setup("def a := 1\n");
    const toolchain = new FakeToolchain({ root, target, errorsFor: () => [] });
    const oracle = new ScriptedOracle({ extend: [null] });

    const result = await runRepairSession({ target, toolchain, oracle, updates: 3 });

    expect(result.status).toBe("ok");
    expect(result.iterations).toBe(1);
    expect(oracle.calls.map((call) => call.operation)).toEqual(["extend", "document"]);
  });

  test("writes an audit log and ends with a done event", async () => {
    const { root, target } = await setup("def a := 1\n");
    const toolchain = new FakeToolchain({ root, target, errorsFor: () => [] });
    const events: RepairEvent[] = [];

    const result = await runRepairSession({
      target,
      toolchain,
      oracle: new DecliningOracle(),
      onEvent: (event) => events.push(event)
    });

    expect(result.auditPath).toBe(join(result.runDir, "audit.json"));
    const audit: unknown = JSON.parse(await readFile(result.auditPath, "utf8"));
    expect(audit).toEqual(
      expect.arrayContaining([
        expect.objectContaining({ kind: "snapshot", iteration: 0, data: { tag: "iter000", path: result.snapshots[0].path } }),
        expect.objectContaining({ kind: "decision", iteration: 1, data: { action: "document", markers: [] } }),
        expect.objectContaining({ kind: "oracle", iteration: 1, data: { operation: "document", oracle: "none", reply: "declined" } })
      ])
    );
    expect(events[0].type).toBe("session_start");
    expect(events[events.length - 1]).toEqual({
      type: "done",
      status: "ok",
      iterations: 1,
      reason: "build ok; no documentation produced",
      auditPath: result.auditPath
    });
  });

  test("throws for a target that does not exist", async () => {
    const root = await mkdtemp(join(tmpdir(), "leanmend-loop-"));
    const toolchain = new FakeToolchain({ root, target: join(root, "Missing.lean"), errorsFor: () => [] });

    await expect(
      runRepairSession({ target: join(root, "Missing.lean"), toolchain, oracle: new DecliningOracle() })
    ).rejects.toThrow("Target file does not exist");
  });
});
