import { z } from 'zod';

/** Stored memory record, one JSON file per memory */
export const MemoryRecordSchema = z.object({
  id: z.string().min(1),
  intent: z.string().default(''),
  content: z.unknown().default({}),
  triggers: z.array(z.string()).default([]),
  tension: z.number().min(0).max(1).default(0.5),
  success_rate: z.number().min(0).max(1).default(0.5),
  times_used: z.number().int().min(0).default(0),
  created_at: z.string().optional(),
  last_activated: z.string().nullish(),
});

export type MemoryRecord = z.infer<typeof MemoryRecordSchema>;

/** Payload of a memory produced by `learn` */
export interface LessonContent {
  lesson: string;
  sourceTask: string;
  sourceResult: string;
  wasSuccessful: boolean;
}

export interface MemoryStats {
  count: number;
  avgTension: number;
  maxTension: number;
  minTension: number;
  avgSuccessRate: number;
  totalUses: number;
}

export interface LivingMemoryOptions {
  /** Memories activated per query */
  topK: number;
  /** Initial tension of new memories */
  newMemoryTension: number;
  /** EMA rate for success feedback */
  learningRate: number;
}
