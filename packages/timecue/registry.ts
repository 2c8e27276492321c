/**
 * @description Central operation registry.
 * All ops in one array, plus the listing printed by `timecue doctor --ops`.
 */
import type { OpDef } from "./define-op.ts";
import { timelineOps } from "./ops/timeline.ts";
import { editOps } from "./ops/edit.ts";
import { captionOps } from "./ops/captions.ts";
import { toolOps } from "./ops/tools.ts";

/** Every registered operation, ordered by category. */
export const ops: readonly OpDef[] = [
  ...timelineOps,
  ...editOps,
  ...captionOps,
  ...toolOps,
];

const CATEGORY_ORDER: ReadonlyArray<OpDef["category"]> = ["timeline", "narration", "edit", "captions", "tool"];

/** Get all operations in a specific category. */
export function getOpsByCategory(category: OpDef["category"]): readonly OpDef[] {
  return ops.filter((op) => op.category === category);
}

/** CLI operations grouped by category, with descriptions and examples. */
export function formatOpsHelp(): string {
  const lines: string[] = [];
  for (const category of CATEGORY_ORDER) {
    const group = getOpsByCategory(category).filter((op) => op.cli);
    if (group.length === 0) continue;
    lines.push(`${category}:`);
    for (const op of group) {
      lines.push(`  ${op.name.padEnd(22)} ${op.summary}`);
      lines.push(`    ${op.description}`);
      for (const example of op.examples ?? []) {
        lines.push(`    $ ${example.code}  # ${example.title}`);
      }
    }
  }
  return lines.join("\n");
}
