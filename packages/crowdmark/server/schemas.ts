/**
 * Zod schemas for persisted snapshots and JSON request bodies.
 * Optional snapshot fields carry their documented defaults.
 */

import { z } from 'zod';
import { ResourceError } from './errors.js';

// ============================================================================
// PERSISTED SNAPSHOTS
// ============================================================================

const timestamp = z.number().nullable().default(null);

/** `[clientId, color]` pairs in vote order; older snapshots stored a plain object. */
export const voteBucketSchema = z.union([
  z.array(z.tuple([z.string(), z.string()])),
  z.record(z.string(), z.string()),
]);

export type VoteBucketJson = z.infer<typeof voteBucketSchema>;

export const docSnapshotSchema = z.object({
  tokens: z.array(z.string()).default([]),
  votes: z.array(voteBucketSchema).default([]),
  updated: timestamp,
  sourceName: z.string().nullable().optional(),
});

export type DocSnapshot = z.infer<typeof docSnapshotSchema>;

/** Body of POST /api/import: the payload of GET /api/export?fmt=json. */
export const docExportSchema = docSnapshotSchema.extend({
  docId: z.string().optional(),
  locked: z.boolean().optional(),
});

export type DocExport = z.infer<typeof docExportSchema>;

export const formResponseSchema = z.object({
  seq: z.number().int(),
  clientId: z.string(),
  answer: z.string(),
  question: z.string(),
  submitted: z.number(),
});

export type FormResponse = z.infer<typeof formResponseSchema>;

export const formSnapshotSchema = z.object({
  question: z.string().nullable().optional(),
  cooldown: z.number().nullable().optional(),
  allowRepeat: z.boolean().default(true),
  locked: z.boolean().default(false),
  responses: z.array(formResponseSchema.partial({ seq: true })).default([]),
  lastByClient: z.record(z.string(), z.number()).default({}),
  nextSeq: z.number().int().nullable().optional(),
  updated: timestamp,
});

export const buttonEventSchema = z.object({
  seq: z.number().int(),
  buttonId: z.string(),
  label: z.string(),
  direction: z.enum(['minus', 'plus']),
  clientId: z.string(),
  timestamp: z.number(),
});

export type ButtonEvent = z.infer<typeof buttonEventSchema>;

export const buttonInfoSchema = z.object({
  label: z.string().optional(),
  minus: z.number().int().default(0),
  plus: z.number().int().default(0),
});

export const buttonSnapshotSchema = z.object({
  buttons: z.record(z.string(), buttonInfoSchema).default({}),
  events: z.array(buttonEventSchema.partial({ seq: true })).default([]),
  locked: z.boolean().default(false),
  cooldown: z.number().nullable().optional(),
  lastByClient: z.record(z.string(), z.number()).default({}),
  nextSeq: z.number().int().nullable().optional(),
  updated: timestamp,
});

// ============================================================================
// REQUEST BODIES
// ============================================================================

export const formSubmitBody = z.object({
  formId: z.string().nullish(),
  clientId: z.string().min(1).max(128),
  answer: z.string().min(1),
});

export const formConfigBody = z.object({
  formId: z.string().nullish(),
  question: z.string().max(280).nullish(),
  cooldown: z.number().nullish(),
  allowRepeat: z.boolean().nullish(),
  locked: z.boolean().nullish(),
});

export const buttonFireBody = z.object({
  panelId: z.string().nullish(),
  clientId: z.string().min(1).max(128),
  buttonId: z.string().min(1).max(64),
  direction: z.string().min(1).max(16),
});

export const buttonConfigBody = z.object({
  panelId: z.string().nullish(),
  cooldown: z.number().nullish(),
  locked: z.boolean().nullish(),
});

export const routerCommandBody = z.object({
  action: z.enum(['navigate', 'reload']).default('navigate'),
  target: z.string().nullish(),
  group: z.string().nullish(),
  preserveClient: z.boolean().default(true),
  preserveParams: z.array(z.string()).nullish(),
  setDefault: z.boolean().nullish(),
});

export const highlightMessageSchema = z.discriminatedUnion('action', [
  z.object({
    type: z.literal('highlight'),
    action: z.literal('set_range'),
    start: z.coerce.number().int().default(0),
    end: z.coerce.number().int().optional(),
    color: z.string().nullish(),
    t: z.number().nullish(),
  }),
  z.object({
    type: z.literal('highlight'),
    action: z.literal('clear_all'),
    t: z.number().nullish(),
  }),
]);

export type HighlightMessage = z.infer<typeof highlightMessageSchema>;

/** Parse a request body, turning the first zod issue into a 400. */
export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? `${issue.path.join('.')}: ` : '';
    throw new ResourceError('invalid_request', `${where}${issue?.message ?? 'Invalid request body'}`, 400);
  }
  return parsed.data;
}
