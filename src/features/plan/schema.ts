import { z } from 'zod';
import type { ContentPlan, CreateDocumentRequest, Scene } from './types.js';

const optionalText = z
  .string()
  .nullish()
  .transform(v => {
    const trimmed = v?.trim();
    return trimmed ? trimmed : undefined;
  });

// Whole seconds or scene numbers; no-code frontends often send them as strings.
const optionalCount = z
  .union([
    z.number().int().nonnegative(),
    z.string().trim().regex(/^\d+$/, 'Expected a whole number').transform(Number),
  ])
  .nullish()
  .transform(v => v ?? undefined);

export const SceneSchema: z.ZodType<Scene, z.ZodTypeDef, unknown> = z.object({
  scene_number: optionalCount,
  duration: optionalCount,
  subtitle: optionalText,
  narration: optionalText,
  visual_description: optionalText,
});

export const ContentPlanSchema: z.ZodType<ContentPlan, z.ZodTypeDef, unknown> = z.object({
  title: optionalText,
  topic: z
    .string({ required_error: 'Topic is required', invalid_type_error: 'Topic must be a string' })
    .trim()
    .min(1, 'Topic is required'),
  duration: optionalCount,
  key_message: optionalText,
  scenes: z.array(SceneSchema).nullish().transform(v => v ?? []),
  conclusion: optionalText,
});

// Bubble's API connector can only send the plan as a string field, so a JSON
// string is accepted alongside an object.
const planFromString = z.string().transform((raw, ctx): unknown => {
  try {
    return JSON.parse(raw);
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Content plan is not valid JSON' });
    return z.NEVER;
  }
});

export const CreateDocumentRequestSchema: z.ZodType<CreateDocumentRequest, z.ZodTypeDef, unknown> = z.object({
  content_plan: z.union([planFromString, z.record(z.unknown())], {
    errorMap: (_issue, ctx) => ({
      message: ctx.data === undefined || ctx.data === null
        ? 'Content plan is required'
        : 'Content plan must be an object or JSON string',
    }),
  }).pipe(ContentPlanSchema),
  user_email: z
    .string({ required_error: 'User email is required', invalid_type_error: 'User email must be a string' })
    .trim()
    .min(1, 'User email is required'),
});
