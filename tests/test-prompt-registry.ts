/**
 * Tests for prompt-registry.ts — standard prompts, fuzzy prompts and the override switch.
 * Run: npx tsx tests/test-prompt-registry.ts
 */

import * as path from "node:path";
import * as os from "node:os";

import { NoteGraph } from "../extensions/lib/note-graph.ts";
import { PromptRegistry, listPrompts, fuzzyPrompts, type PromptEnv } from "../extensions/lib/prompt-registry.ts";
import { ScriptedBackend, CountingPreviewHost, typeText, submit } from "./fakes.ts";

// ---- Test harness ----
let PASS = 0;
let FAIL = 0;

function assert(condition: boolean, label: string): void {
  if (condition) {
    console.log(`  PASS: ${label}`);
    PASS++;
  } else {
    console.error(`  FAIL: ${label}`);
    FAIL++;
  }
}

function assertEq<T>(actual: T, expected: T, label: string): void {
  const a = JSON.stringify(actual);
  const e = JSON.stringify(expected);
  if (a === e) {
    console.log(`  PASS: ${label}`);
    PASS++;
  } else {
    console.error(`  FAIL: ${label} -- expected ${e}, got ${a}`);
    FAIL++;
  }
}

const DIR = path.join(os.tmpdir(), "vault-picker-prompt-test");

const graph = NoteGraph.fromContents(DIR, {
  "one.md": "---\nrefs: [doe2019]\n---\n# Same Title\n",
  "two.md": "# Same Title\n",
  "three.md": "# Third\n",
});

function envWith(backend: ScriptedBackend, previews = new CountingPreviewHost()): PromptEnv {
  return { graph, backend, previews };
}

// ================================================================
// Switch
// ================================================================
console.log("\n-- enable / disable --");
{
  const reg = new PromptRegistry();
  assertEq(reg.isEnabled, false, "starts disabled");
  assertEq(reg.active.name, "list", "standard prompts active");
  assertEq(reg.enable(), true, "first enable changes state");
  assertEq(reg.enable(), false, "second enable is a no-op");
  assertEq(reg.active.name, "fuzzy", "override active");
  assertEq(reg.disable(), true, "first disable changes state");
  assertEq(reg.disable(), false, "second disable is a no-op");
  assertEq(reg.toggle(), true, "toggle on");
  assertEq(reg.toggle(), false, "toggle off");
  reg.enable();
  reg.reset();
  assertEq(reg.isEnabled, false, "reset restores the standard prompts");
}

console.log("\n-- entry points before, during and after the override --");
{
  const reg = new PromptRegistry();
  const backend = new ScriptedBackend([submit], (labels) => labels[2]);
  const env = envWith(backend);

  const before = await reg.readNode(env);
  assertEq(backend.chooses.length, 1, "before: plain select used");
  assertEq(backend.reads.length, 0, "before: fuzzy picker unused");

  reg.enable();
  const during = await reg.readNode(env);
  await reg.readRef(env);
  assertEq(backend.reads.length, 2, "during: both entry points use the fuzzy picker");
  assertEq(backend.chooses.length, 1, "during: plain select unused");

  reg.disable();
  const after = await reg.readNode(env);
  assertEq(backend.chooses.length, 2, "after: plain select used again");
  assertEq(backend.reads.length, 2, "after: no fuzzy reads");

  assertEq(before.kind === "found" ? before.value.id : "", "two", "before: third label picked");
  assertEq(after, before, "after behaves exactly like before");
  assertEq(during.kind === "found" ? during.value.id : "", "one", "during: fuzzy submit picks the first");
}

// ================================================================
// Standard prompts
// ================================================================
console.log("\n-- listPrompts --");
{
  const backend = new ScriptedBackend([], (labels) => labels[2]);
  const sel = await listPrompts.readNode(envWith(backend));
  assertEq(backend.chooses[0]?.labels, ["Same Title", "Third", "Same Title (2)"], "duplicate labels made unique");
  assertEq(sel.kind === "found" ? sel.value.id : "", "two", "second duplicate maps to its own note");

  const filtered = new ScriptedBackend([], () => undefined);
  const cancelled = await listPrompts.readNode(envWith(filtered), { filter: (n) => n.id === "three" });
  assertEq(filtered.chooses[0]?.labels, ["Third"], "filter applied to the list");
  assertEq(cancelled, { kind: "cancelled" }, "escape cancels");

  const asking = new ScriptedBackend([], () => undefined, ["Brand new"]);
  const fresh = await listPrompts.readNode(envWith(asking), { filter: () => false });
  assertEq(asking.asks.length, 1, "empty list falls back to free text input");
  assertEq(fresh, { kind: "not-found", text: "Brand new" }, "typed text is not-found");

  const strict = new ScriptedBackend([], () => undefined, ["ignored"]);
  const none = await listPrompts.readNode(envWith(strict), { filter: () => false, requireMatch: true });
  assertEq(none, { kind: "cancelled" }, "require-match with nothing to pick cancels");
  assertEq(strict.asks.length, 0, "no free text asked for");

  const seeded = new ScriptedBackend([], (labels) => labels[0]);
  const narrowed = await listPrompts.readNode(envWith(seeded), { initialInput: "third" });
  assertEq(seeded.chooses[0]?.labels, ["Third"], "initial input narrows the list");
  assertEq(narrowed.kind === "found" ? narrowed.value.id : "", "three", "narrowed pick maps back");

  const unmatched = new ScriptedBackend([], (labels) => labels[0]);
  const typed = await listPrompts.readNode(envWith(unmatched), { initialInput: " New Thing " });
  assertEq(typed, { kind: "not-found", text: "New Thing" }, "unmatched initial input is not-found");
  assertEq(unmatched.chooses.length + unmatched.asks.length, 0, "no prompt for unmatched input");

  const required = new ScriptedBackend([], (labels) => labels[1]);
  await listPrompts.readNode(envWith(required), { initialInput: "zzz", requireMatch: true });
  assertEq(required.chooses[0]?.labels, ["Same Title", "Third", "Same Title (2)"], "require-match ignores unmatched input");

  const refs = new ScriptedBackend([], (labels) => labels[0]);
  const ref = await listPrompts.readRef(envWith(refs));
  assertEq(refs.chooses[0]?.labels, ["@doe2019  Same Title"], "reference labels");
  assertEq(ref.kind === "found" ? ref.value.key : "", "doe2019", "reference returned");
}

// ================================================================
// Fuzzy prompts
// ================================================================
console.log("\n-- fuzzyPrompts --");
{
  const previews = new CountingPreviewHost();
  const backend = new ScriptedBackend([typeText("Third"), submit]);
  const sel = await fuzzyPrompts.readNode(envWith(backend, previews), { prompt: "Pick: " });
  assertEq(sel.kind === "found" ? sel.value.id : "", "three", "typed label selected");
  assertEq(backend.reads[0]?.prompt, "Pick: ", "prompt passed through");
  assertEq(backend.reads[0]?.hasPreview, true, "preview attached");
  assertEq(previews.opened, [path.join(DIR, "one.md"), path.join(DIR, "three.md")], "previewed first, then the match");
  assertEq(previews.closed.length, previews.opened.length, "previews closed");

  const strict = new ScriptedBackend([typeText("qqqq"), submit]);
  const none = await fuzzyPrompts.readNode(envWith(strict), { requireMatch: true });
  assertEq(none, { kind: "cancelled" }, "require-match blocks free text");

  const free = new ScriptedBackend([typeText("qqqq"), submit]);
  const created = await fuzzyPrompts.readNode(envWith(free));
  assert(created.kind === "not-found" && created.text === "qqqq", "free text returned as not-found");
}

// ==================================================
// Summary
// ==================================================
console.log(`\n--- Results: ${PASS} passed, ${FAIL} failed ---`);
process.exit(FAIL > 0 ? 1 : 0);
