import { z } from "zod";

export const TaskRecordStateSchema = z.enum([
  "pending",
  "in_progress",
  "completed",
  "failed",
  "skipped",
]);
export type TaskRecordState = z.infer<typeof TaskRecordStateSchema>;

export const TaskRecordSchema = z.object({
  task_id: z.string().min(1),
  text: z.string().min(1),
  state: TaskRecordStateSchema,
  attempts: z.number().int().nonnegative().default(0),
  start_time: z.string().nullable().default(null),
  end_time: z.string().nullable().default(null),
  error_message: z.string().nullable().default(null),
  instruction_progress: z.number().int().nonnegative().default(0),
  category: z.string().optional(),
  skip_reason: z.string().optional(),
});

export type TaskRecord = z.infer<typeof TaskRecordSchema>;

export const CheckpointLedgerSchema = z.object({
  version: z.literal(1).default(1),
  session_id: z.string().nullable().default(null),
  last_start_time: z.string().nullable().default(null),
  last_stop_time: z.string().nullable().default(null),
  clean_shutdown: z.boolean().default(true),
  last_stop_reason: z.string().nullable().default(null),
  iteration_count: z.number().int().nonnegative().default(0),
  tasks: z.array(TaskRecordSchema).default([]),
});

export type CheckpointLedger = z.infer<typeof CheckpointLedgerSchema>;

export function createEmptyLedger(): CheckpointLedger {
  return {
    version: 1,
    session_id: null,
    last_start_time: null,
    last_stop_time: null,
    clean_shutdown: true,
    last_stop_reason: null,
    iteration_count: 0,
    tasks: [],
  };
}
