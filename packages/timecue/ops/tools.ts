/**
 * @description Environment tooling.
 */
import { z } from "zod";
import { defineOp } from "../define-op.ts";

export const doctorTool = defineOp({
  name: "tool.doctor",
  category: "tool",
  summary: "Print environment diagnostics.",
  description: "Report platform, Node.js and ffmpeg/ffprobe availability, and list registered operations.",
  input: z.object({
    ops: z.boolean().default(false).describe("Also list every registered operation."),
  }),
  output: z.object({
    platform: z.string(),
    node: z.string(),
    ffmpeg: z.string().optional().describe("First line of `ffmpeg -version`, when found."),
    ffprobe: z.string().optional(),
  }),
  cli: true,
});

export const toolOps = [doctorTool] as const;
