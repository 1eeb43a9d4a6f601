export {
  EXPERIENCE_LEVELS,
  ExperienceLevelSchema,
  LenientExperienceLevelSchema,
  DEFAULT_EXPERIENCE_LEVEL,
  SKILL_TIERS,
  SkillTierSchema,
  TargetRoleSchema,
} from "./schemas/core"
export type { ExperienceLevel, SkillTier } from "./schemas/core"

export { OptionalSkillSchema, RoleProfileSchema, RoleTableSchema } from "./schemas/roles"
export type { OptionalSkill, RoleProfile, RoleTable } from "./schemas/roles"

export { SkillGapRequestSchema, SkillGapResponseSchema } from "./schemas/skill-gap"
export type { SkillGapRequest, SkillGapResponse } from "./schemas/skill-gap"

export { SalaryRangeSchema, SalaryTableSchema, SalaryRequestSchema, SalaryResponseSchema } from "./schemas/salary"
export type { SalaryTable, SalaryResponse } from "./schemas/salary"

export { AssessSkillsRequestSchema, CareerGuidanceRequestSchema, CareerGuidanceResponseSchema } from "./schemas/ai"
export type { CareerGuidanceRequest, CareerGuidanceResponse } from "./schemas/ai"
