import { z } from 'zod';

// ── ElementDescriptor ────────────────────────────────────────

export const classificationSchema = z.enum(['static', 'dynamic', 'visual-only']);

export type Classification = z.infer<typeof classificationSchema>;

export const boundingBoxSchema = z.object({
  x: z.number(),
  y: z.number(),
  width: z.number().nonnegative(),
  height: z.number().nonnegative(),
});

export type BoundingBox = z.infer<typeof boundingBoxSchema>;

export const ancestorSchema = z.object({
  tag: z.string().min(1),
  position: z.number().int().nonnegative(),
});

export type Ancestor = z.infer<typeof ancestorSchema>;

export const elementDescriptorSchema = z
  .object({
    tag: z.string().min(1),
    attributes: z.record(z.string()),
    text: z.string(),
    bbox: boundingBoxSchema,
    /** Root first, parent last. Ends at the frame's document element. */
    ancestors: z.array(ancestorSchema),
    /** 1-based index among same-tag siblings, 0 when the tag is unique under its parent. */
    position: z.number().int().nonnegative(),
    classification: classificationSchema,
    frame: z.string().nullable(),
  })
  .strict();

export type ElementDescriptor = z.infer<typeof elementDescriptorSchema>;

// ── SelectorCandidate ────────────────────────────────────────

export const selectorKindSchema = z.enum([
  'id',
  'css-attribute',
  'css-structural',
  'xpath',
  'text-match',
]);

export type SelectorKind = z.infer<typeof selectorKindSchema>;

export const selectorCandidateSchema = z
  .object({
    kind: selectorKindSchema,
    selector: z.string().min(1),
    score: z.number().min(0).max(1),
    frame: z.string().nullable(),
  })
  .strict();

export type SelectorCandidate = z.infer<typeof selectorCandidateSchema>;

// ── DOM context tree ─────────────────────────────────────────

export interface ContextNode {
  /** `<frameIndex>:<preorderIndex>`, valid only for the capture that produced it. */
  id: string;
  descriptor: ElementDescriptor;
  relevant: boolean;
  children: ContextNode[];
}

export interface FrameTree {
  frame: string | null;
  url: string;
  root: ContextNode | null;
}

export interface DOMContextTree {
  capturedAt: string;
  url: string;
  frames: FrameTree[];
}
