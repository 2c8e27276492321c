/**
 * @description defineOp(): the building block for the operation registry.
 * Each operation carries runtime metadata (name, docs, Zod schemas)
 * that the CLI consumes: summaries for help, input schemas for argument
 * validation, output schemas for results, docs for `timecue doctor --ops`.
 */
import { type ZodType } from "zod";

export interface OpExample {
  title: string;
  code: string;
}

export interface OpDef<I extends ZodType = ZodType, O extends ZodType = ZodType> {
  /** Dot-namespaced identifier, e.g. "timeline.place" or "edit.speedGaps". */
  name: string;
  /** Grouping category for registry filtering. */
  category: "timeline" | "narration" | "edit" | "captions" | "tool";
  /** One-line summary (appears in CLI help). */
  summary: string;
  /** Extended description (Markdown-safe). */
  description: string;
  /** Zod schema for the operation's input. */
  input: I;
  /** Zod schema for the operation's output. */
  output: O;
  /** Shown by `timecue doctor --ops`. */
  examples?: OpExample[];
  /** When true, this operation is exposed as a CLI command. */
  cli?: boolean;
}

/**
 * Define a timeline operation.
 * The returned object IS the definition: no wrapper class needed.
 */
export function defineOp<I extends ZodType, O extends ZodType>(
  def: OpDef<I, O>,
): OpDef<I, O> {
  return def;
}
