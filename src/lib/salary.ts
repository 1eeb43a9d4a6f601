import rawSalaryTable from "@/data/salaries.json"
import { SalaryTableSchema } from "@/types"
import type { ExperienceLevel, SalaryResponse, SalaryTable } from "@/types"
import { ROLE_TABLE, getRoleProfile } from "@/lib/role-profiles"

export const assertSalaryCoverage = (table: SalaryTable, roleIds: readonly string[]) => {
  const uncovered = roleIds.filter((id) => !(id in table.ranges))
  if (uncovered.length > 0) {
    throw new Error(`[salary] No salary ranges for roles: ${uncovered.join(", ")}`)
  }
}

export const SALARY_TABLE: SalaryTable = SalaryTableSchema.parse(rawSalaryTable)
assertSalaryCoverage(
  SALARY_TABLE,
  ROLE_TABLE.roles.map((role) => role.id),
)

export type SalaryEstimate = Readonly<{
  role: string
  experienceLevel: ExperienceLevel
  currency: string
  min: number
  median: number
  max: number
}>

export function estimateSalary(role: string, experienceLevel: ExperienceLevel): SalaryEstimate {
  const profile = getRoleProfile(role)
  const range = SALARY_TABLE.ranges[profile.id]?.[experienceLevel]
  if (!range) {
    throw new Error(`[salary] Missing ${experienceLevel} range for role ${profile.id}`)
  }

  return Object.freeze({
    role: profile.id,
    experienceLevel,
    currency: SALARY_TABLE.currency,
    min: range.min,
    median: Math.round((range.min + range.max) / 2),
    max: range.max,
  })
}

export const toSalaryResponse = (estimate: SalaryEstimate): SalaryResponse => ({
  target_role: estimate.role,
  experience_level: estimate.experienceLevel,
  currency: estimate.currency,
  min: estimate.min,
  median: estimate.median,
  max: estimate.max,
})
