const whitespaceRegex = /\s+/g

export function normalizeSkill(skill: string) {
  return skill.replace(whitespaceRegex, " ").trim().toLowerCase()
}

/**
 * Splits comma-separated skill text into normalized tokens.
 * Tokens are trimmed, whitespace-collapsed and case-folded; blanks are dropped and
 * the first occurrence of a duplicate wins. Blank input yields an empty list.
 */
export function normalizeSkillText(text: string): string[] {
  const seen = new Set<string>()
  return text
    .split(",")
    .map(normalizeSkill)
    .filter((skill) => skill && !seen.has(skill) && (seen.add(skill), true))
}

export const joinSkills = (skills: readonly string[]) => skills.join(", ")

export const normalizeRoleId = (role: string) => role.trim().toLowerCase()

export const normalizeFreeText = (text: string) => text.replace(/\r\n?/g, "\n").replace(/[ \t]{2,}/g, " ").trim()
