import type { ExperienceLevel, OptionalSkill, SkillGapResponse, SkillTier } from "@/types"
import { normalizeSkill, normalizeSkillText } from "@/lib/normalizers"
import { getRoleProfile } from "@/lib/role-profiles"

export const SUGGESTION_LIMIT = 3

/**
 * Order in which optional-skill tiers are surfaced for each experience level.
 * Within a tier, skills keep the order the role table lists them in.
 */
export const SUGGESTION_TIER_ORDER: Readonly<Record<ExperienceLevel, readonly SkillTier[]>> = {
  beginner: ["foundational", "intermediate", "advanced"],
  intermediate: ["intermediate", "foundational", "advanced"],
  advanced: ["advanced", "intermediate", "foundational"],
}

export type SkillGapResult = Readonly<{
  matchPercentage: number
  matchingSkills: readonly string[]
  missingSkills: readonly string[]
  suggestedSkills: readonly string[]
}>

export const computeMatchPercentage = (coreHits: number, coreSize: number) =>
  coreSize === 0 ? 0 : Math.round((100 * coreHits) / coreSize)

export const rankSuggestions = (
  optional: readonly OptionalSkill[],
  matched: ReadonlySet<string>,
  level: ExperienceLevel,
  limit = SUGGESTION_LIMIT,
): string[] => {
  const tierOrder = SUGGESTION_TIER_ORDER[level]
  return optional
    .filter((skill) => !matched.has(normalizeSkill(skill.name)))
    .sort((a, b) => tierOrder.indexOf(a.tier) - tierOrder.indexOf(b.tier))
    .slice(0, limit)
    .map((skill) => skill.name)
}

/**
 * Scores a user's comma-separated skills against a role's reference skill set.
 *
 * Matching is exact-token equality after normalization; there is no fuzzy or synonym
 * matching, so "JS" does not match "JavaScript". Throws `UnknownRoleError` when the role
 * is not in the reference table.
 */
export function computeSkillGap(role: string, userSkillsText: string, experienceLevel: ExperienceLevel): SkillGapResult {
  const profile = getRoleProfile(role)
  const userSkills = new Set(normalizeSkillText(userSkillsText))
  const has = (skill: string) => userSkills.has(normalizeSkill(skill))

  const optionalNames = profile.optional.map((skill) => skill.name)
  const matchingSkills = [...profile.core, ...optionalNames].filter(has)
  const missingSkills = profile.core.filter((skill) => !has(skill))
  const coreHits = profile.core.length - missingSkills.length

  const suggestedSkills = rankSuggestions(profile.optional, new Set(matchingSkills.map(normalizeSkill)), experienceLevel)

  return Object.freeze({
    matchPercentage: computeMatchPercentage(coreHits, profile.core.length),
    matchingSkills: Object.freeze(matchingSkills),
    missingSkills: Object.freeze(missingSkills),
    suggestedSkills: Object.freeze(suggestedSkills),
  })
}

export const toSkillGapResponse = (result: SkillGapResult): SkillGapResponse => ({
  match_score: result.matchPercentage,
  matching_skills: [...result.matchingSkills],
  missing_skills: [...result.missingSkills],
  suggested_skills: [...result.suggestedSkills],
})
