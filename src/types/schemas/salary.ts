import { z } from "zod"

import { ExperienceLevelSchema, LenientExperienceLevelSchema, TargetRoleSchema } from "./core"

export const SalaryRangeSchema = z
  .object({
    min: z.number().int().nonnegative(),
    max: z.number().int().nonnegative(),
  })
  .refine((range) => range.min <= range.max, "Salary range min must not exceed max.")
  .readonly()

export const SalaryTableSchema = z
  .object({
    currency: z.string().length(3),
    ranges: z.record(
      z.string(),
      z
        .object({
          beginner: SalaryRangeSchema,
          intermediate: SalaryRangeSchema,
          advanced: SalaryRangeSchema,
        })
        .readonly(),
    ),
  })
  .readonly()
export type SalaryTable = z.infer<typeof SalaryTableSchema>

export const SalaryRequestSchema = z.object({
  target_role: TargetRoleSchema,
  experience_level: LenientExperienceLevelSchema,
})

export const SalaryResponseSchema = z.object({
  target_role: z.string(),
  experience_level: ExperienceLevelSchema,
  currency: z.string(),
  min: z.number().int(),
  median: z.number().int(),
  max: z.number().int(),
})
export type SalaryResponse = z.infer<typeof SalaryResponseSchema>
