import { EXPERIENCE_LEVELS, SalaryTableSchema } from "@/types"

import { UnknownRoleError } from "./errors"
import { SUPPORTED_ROLES } from "./role-profiles"
import { SALARY_TABLE, assertSalaryCoverage, estimateSalary, toSalaryResponse } from "./salary"

describe("estimateSalary", () => {
  it("looks up the range for a role and level and derives the median", () => {
    expect(estimateSalary("backend", "intermediate")).toEqual({
      role: "backend",
      experienceLevel: "intermediate",
      currency: "USD",
      min: 85000,
      median: 107500,
      max: 130000,
    })
  })

  it("resolves role ids in any casing", () => {
    const estimate = estimateSalary(" Frontend ", "beginner")
    expect(estimate.role).toBe("frontend")
    expect(estimate.median).toBe(70000)
  })

  it("throws UnknownRoleError for roles outside the table", () => {
    expect(() => estimateSalary("quantum-pilot", "advanced")).toThrow(UnknownRoleError)
  })

  it("covers every supported role and level with an ordered range", () => {
    for (const role of SUPPORTED_ROLES) {
      for (const level of EXPERIENCE_LEVELS) {
        const { min, median, max } = estimateSalary(role, level)
        expect(min).toBeLessThanOrEqual(median)
        expect(median).toBeLessThanOrEqual(max)
      }
    }
  })

  it("maps an estimate onto the wire field names", () => {
    expect(toSalaryResponse(estimateSalary("devops", "advanced"))).toEqual({
      target_role: "devops",
      experience_level: "advanced",
      currency: "USD",
      min: 150000,
      median: 200000,
      max: 250000,
    })
  })
})

describe("salary table validation", () => {
  it("reports roles that have no salary row", () => {
    expect(() => assertSalaryCoverage(SALARY_TABLE, ["backend", "astronaut"])).toThrow(
      "[salary] No salary ranges for roles: astronaut",
    )
  })

  it("rejects ranges whose minimum exceeds the maximum", () => {
    const range = { min: 10, max: 20 }
    const result = SalaryTableSchema.safeParse({
      currency: "USD",
      ranges: { backend: { beginner: { min: 30, max: 20 }, intermediate: range, advanced: range } },
    })
    expect(result.success).toBe(false)
  })
})
