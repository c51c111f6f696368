/**
 * Zod schemas for worker output, one artifact schema per agent.
 */

import { z } from 'zod'
import type { AgentName } from '../../core/types.js'

export const VerdictSchema = z.enum(['Approved', 'NeedsRevision', 'Rejected'])

// ---------------------------------------------------------------------------
// Per-agent artifacts
// ---------------------------------------------------------------------------

export const PlannerReviewerArtifactsSchema = z.object({
  notes: z.array(z.string()).default([]),
})

export const ChildTaskSpecSchema = z.object({
  title: z.string().min(1),
  requirements: z.string().default(''),
  test_plan: z.string().default(''),
  steps: z
    .array(
      z.object({
        description: z.string().min(1),
        acceptance_criteria: z.array(z.string()).default([]),
      }),
    )
    .default([]),
})

export type ChildTaskSpec = z.infer<typeof ChildTaskSpecSchema>

/** Zero children means "no split"; exactly one is not a split and is rejected */
export const SplitterArtifactsSchema = z.object({
  children: z
    .array(ChildTaskSpecSchema)
    .default([])
    .refine((children) => children.length !== 1, {
      message: 'a split needs at least two children (use an empty list for no split)',
    }),
})

export type SplitterArtifacts = z.infer<typeof SplitterArtifactsSchema>

export const ValidatorArtifactsSchema = z.object({
  unmet_criteria: z.array(z.string()).default([]),
})

export const PrCreatorArtifactsSchema = z.union([
  z.object({ title: z.string().min(1), body: z.string() }),
  z.object({ change_request_ref: z.string().min(1) }),
])

export type PrCreatorArtifacts = z.infer<typeof PrCreatorArtifactsSchema>

export const DocUpdaterArtifactsSchema = z.object({
  updated_documents: z.array(z.string()).default([]),
})

export const ChangelogWriterArtifactsSchema = z.object({
  entries: z
    .array(
      z.object({
        component: z.string().min(1),
        summary: z.string().min(1),
        effect: z.string().min(1),
      }),
    )
    .default([]),
})

export type ChangelogWriterArtifacts = z.infer<typeof ChangelogWriterArtifactsSchema>

export const ARTIFACT_SCHEMAS: Record<AgentName, z.ZodType<unknown, z.ZodTypeDef, unknown>> = {
  'planner-reviewer': PlannerReviewerArtifactsSchema,
  splitter: SplitterArtifactsSchema,
  validator: ValidatorArtifactsSchema,
  'pr-creator': PrCreatorArtifactsSchema,
  'doc-updater': DocUpdaterArtifactsSchema,
  'changelog-writer': ChangelogWriterArtifactsSchema,
}

// ---------------------------------------------------------------------------
// Worker output envelope (what a command worker prints)
// ---------------------------------------------------------------------------

export const WorkerOutputSchema = z.object({
  verdict: VerdictSchema,
  notes: z.string().nullable().optional(),
  artifacts: z.unknown().optional(),
})
