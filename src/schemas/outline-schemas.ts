import { z } from 'zod';

export const OUTLINE_SECTION_SCHEMA = z.object({
  number: z.number().int().positive(),
  name: z.string().min(1),
  slug: z.string().regex(/^[a-z0-9-]+$/).optional(),
  description: z.string().default(''),
  guidingQuestions: z.array(z.string()).default([]),
  targetWords: z.number().int().positive().default(500),
});

export const OUTLINE_SCHEMA = z
  .object({
    name: z.string().min(1),
    description: z.string().default(''),
    sections: z.array(OUTLINE_SECTION_SCHEMA).min(1),
  })
  .refine((o) => new Set(o.sections.map((s) => s.number)).size === o.sections.length, {
    message: 'Section numbers must be unique',
    path: ['sections'],
  });

export type OutlineSectionInput = z.infer<typeof OUTLINE_SECTION_SCHEMA>;
export type OutlineInput = z.infer<typeof OUTLINE_SCHEMA>;

/** An outline section with its slug resolved. */
export interface OutlineSection extends OutlineSectionInput {
  slug: string;
}

export interface Outline {
  name: string;
  description: string;
  sections: OutlineSection[];
}
