import { joinSkills, normalizeFreeText, normalizeRoleId, normalizeSkill, normalizeSkillText } from "./normalizers"

describe("normalizer helpers", () => {
  it("trims, case-folds and collapses inner whitespace of a single skill", () => {
    expect(normalizeSkill("  REST   APIs ")).toBe("rest apis")
    expect(normalizeSkill("Node.JS")).toBe("node.js")
  })

  it("splits skill text on commas, drops blanks and keeps the first of each duplicate", () => {
    expect(normalizeSkillText("  Python ,python, SQL,, ,  rest   APIs ")).toEqual(["python", "sql", "rest apis"])
  })

  it("normalizes empty and whitespace-only skill text to an empty list", () => {
    expect(normalizeSkillText("")).toEqual([])
    expect(normalizeSkillText("   ")).toEqual([])
    expect(normalizeSkillText(" , ,, ")).toEqual([])
  })

  it("joins skills back into comma-separated text", () => {
    expect(joinSkills(["python", "sql"])).toBe("python, sql")
  })

  it("normalizes role ids and free text", () => {
    expect(normalizeRoleId("  Data-Scientist ")).toBe("data-scientist")
    expect(normalizeFreeText("line one\r\nline   two  ")).toBe("line one\nline two")
  })
})
