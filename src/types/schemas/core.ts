import { z } from "zod"

export const EXPERIENCE_LEVELS = ["beginner", "intermediate", "advanced"] as const
export const ExperienceLevelSchema = z.enum(EXPERIENCE_LEVELS)
export type ExperienceLevel = z.infer<typeof ExperienceLevelSchema>

export const DEFAULT_EXPERIENCE_LEVEL: ExperienceLevel = "intermediate"

// Missing or unrecognized labels fall back to the default level instead of failing the request.
export const LenientExperienceLevelSchema = z.preprocess(
  (value) => (typeof value === "string" ? value.trim().toLowerCase() : value),
  ExperienceLevelSchema.catch(DEFAULT_EXPERIENCE_LEVEL),
)

export const SKILL_TIERS = ["foundational", "intermediate", "advanced"] as const
export const SkillTierSchema = z.enum(SKILL_TIERS)
export type SkillTier = z.infer<typeof SkillTierSchema>

export const TargetRoleSchema = z
  .string({ required_error: "target_role is required.", invalid_type_error: "target_role must be a string." })
  .trim()
  .min(1, "target_role is required.")
