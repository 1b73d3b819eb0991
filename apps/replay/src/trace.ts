import { readFile } from "node:fs/promises";

import { z } from "zod";

const ratio = z.number().min(0).max(1);
const timestamp = z.number().nonnegative();

const boxSchema = z
  .object({
    x: ratio,
    y: ratio,
    width: ratio,
    height: ratio
  })
  .strict();

export const detectionEventSchema = z
  .object({
    at: timestamp,
    label: z.string().min(1),
    confidence: ratio,
    box: boxSchema.optional()
  })
  .strict();

const frameDetectionSchema = z
  .object({
    label: z.string().min(1),
    confidence: ratio,
    box: boxSchema.optional()
  })
  .strict();

/** Several detections reported together for one camera frame. */
export const frameEventSchema = z
  .object({
    at: timestamp,
    detections: z.array(frameDetectionSchema)
  })
  .strict();

export const commandEventSchema = z
  .object({
    at: timestamp,
    command: z.string()
  })
  .strict();

export const replayTraceSchema = z
  .object({
    config: z.unknown().optional(),
    tailMs: timestamp.optional(),
    events: z.array(z.union([detectionEventSchema, frameEventSchema, commandEventSchema]))
  })
  .strict();

export type DetectionEvent = z.infer<typeof detectionEventSchema>;
export type FrameEvent = z.infer<typeof frameEventSchema>;
export type CommandEvent = z.infer<typeof commandEventSchema>;
export type TraceEvent = DetectionEvent | FrameEvent | CommandEvent;
export type ReplayTrace = z.infer<typeof replayTraceSchema>;

export class TraceFormatError extends Error {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Invalid trace ${source}: ${issues.join("; ")}`);
    this.name = "TraceFormatError";
    this.issues = issues;
  }
}

export function parseTrace(input: unknown, source = "(inline)"): ReplayTrace {
  const parsed = replayTraceSchema.safeParse(input);
  if (!parsed.success) {
    throw new TraceFormatError(
      source,
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }
  return parsed.data;
}

/** Reads and parses a JSON file; `invalid` builds the error for text that is not JSON. */
export async function readJsonFile(path: string, invalid: (reason: string) => Error): Promise<unknown> {
  const raw = await readFile(path, "utf8");
  try {
    const data: unknown = JSON.parse(raw);
    return data;
  } catch (error) {
    throw invalid(error instanceof Error ? error.message : String(error));
  }
}

export async function loadTrace(path: string): Promise<ReplayTrace> {
  const data = await readJsonFile(path, (reason) => new TraceFormatError(path, [`not valid JSON (${reason})`]));
  return parseTrace(data, path);
}
