import { z } from "zod"

import { LenientExperienceLevelSchema, TargetRoleSchema } from "./core"

export const SkillGapRequestSchema = z.object({
  target_role: TargetRoleSchema,
  current_skills: z.string({ invalid_type_error: "current_skills must be a comma-separated string." }).default(""),
  experience_level: LenientExperienceLevelSchema,
})
export type SkillGapRequest = z.infer<typeof SkillGapRequestSchema>

export const SkillGapResponseSchema = z.object({
  match_score: z.number().int().min(0).max(100),
  matching_skills: z.array(z.string()),
  missing_skills: z.array(z.string()),
  suggested_skills: z.array(z.string()).max(3),
})
export type SkillGapResponse = z.infer<typeof SkillGapResponseSchema>
