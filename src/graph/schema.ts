import { z } from 'zod';
import { NODE_STATES, NODE_TYPES, PHASES, UNIT_TYPES } from './types.js';

// ===== Stored record shapes (snake_case, one JSON file per unit) =====

export const NodeRecordSchema = z.object({
  id: z.string().min(1),
  type: z.enum(NODE_TYPES),
  phase: z.enum(PHASES),
  description: z.string().default(''),
  primitive: z.string().min(1).nullish(),
  unit_ref: z.string().min(1).nullish(),
  input: z.unknown().optional(),
  output: z.string().nullish(),
  args: z.record(z.unknown()).default({}),
  tension: z.number().min(0).max(1).default(0.5),
  state: z.enum(NODE_STATES).default('pending'),
});

export const EdgeRecordSchema = z.object({
  from: z.string().min(1),
  to: z.string().min(1),
  condition: z.string().nullish(),
});

export const TensionProfileRecordSchema = z.object({
  max_tension: z.number().default(1),
  node_conflicts: z.array(z.string()).default([]),
  barriers: z.array(z.string()).default([]),
  unresolved_desires: z.array(z.string()).default([]),
  blocked_by: z.array(z.string()).default([]),
});

export const MetadataRecordSchema = z.object({
  created_at: z.string().optional(),
  updated_at: z.string().optional(),
  version: z.number().int().min(1).default(1),
  parent_id: z.string().nullish(),
  deadline: z.string().nullish(),
});

export const UnitRecordSchema = z.object({
  id: z.string().min(1),
  type: z.enum(UNIT_TYPES).default('composite'),
  intent: z.string().min(1),
  phases: z.array(z.enum(PHASES)).default(['sense', 'act', 'feedback']),
  tension: z.number().min(0).max(1),
  importance: z.number().min(0).max(1).default(0.5),
  nodes: z.array(NodeRecordSchema).min(1),
  edges: z.array(EdgeRecordSchema).default([]),
  tension_profile: TensionProfileRecordSchema.default({}),
  metadata: MetadataRecordSchema.default({}),
});

export type NodeRecord = z.infer<typeof NodeRecordSchema>;
export type EdgeRecord = z.infer<typeof EdgeRecordSchema>;
export type UnitRecord = z.infer<typeof UnitRecordSchema>;
/** Shape accepted before defaults are applied */
export type UnitRecordInput = z.input<typeof UnitRecordSchema>;

/**
 * Flatten zod issues into `path: message` lines.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
