import { z } from "zod"

import { normalizeSkill } from "@/lib/normalizers"

import { SkillTierSchema } from "./core"

export const OptionalSkillSchema = z
  .object({
    name: z.string().trim().min(1),
    tier: SkillTierSchema,
  })
  .readonly()
export type OptionalSkill = z.infer<typeof OptionalSkillSchema>

export const RoleProfileSchema = z
  .object({
    id: z.string().regex(/^[a-z0-9]+(-[a-z0-9]+)*$/, "Role ids are lowercase kebab-case."),
    label: z.string().trim().min(1),
    core: z.array(z.string().trim().min(1)).readonly(),
    optional: z.array(OptionalSkillSchema).readonly().default([]),
  })
  .superRefine((role, ctx) => {
    const seen = new Set<string>()
    for (const skill of [...role.core, ...role.optional.map((entry) => entry.name)]) {
      const key = normalizeSkill(skill)
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Skill "${skill}" is listed more than once for role "${role.id}".`,
        })
      }
      seen.add(key)
    }
  })
  .readonly()
export type RoleProfile = z.infer<typeof RoleProfileSchema>

export const RoleTableSchema = z
  .object({
    version: z.string().trim().min(1),
    roles: z.array(RoleProfileSchema).min(1).readonly(),
  })
  .superRefine((table, ctx) => {
    const ids = new Set<string>()
    for (const role of table.roles) {
      if (ids.has(role.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate role id "${role.id}".`, path: ["roles"] })
      }
      ids.add(role.id)
    }
  })
  .readonly()
export type RoleTable = z.infer<typeof RoleTableSchema>
