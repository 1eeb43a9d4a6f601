import { z } from "zod"

const requiredText = (message: string) =>
  z.string({ required_error: message, invalid_type_error: message }).trim().min(1, message)

export const AssessSkillsRequestSchema = z.object({
  skills_description: requiredText("Skills description is required."),
})

export const CareerGuidanceRequestSchema = z.object({
  current_role: requiredText("Current role is required."),
  career_goals: requiredText("Career goals are required."),
  additional_context: z.string().trim().optional(),
})
export type CareerGuidanceRequest = z.infer<typeof CareerGuidanceRequestSchema>

export const CareerGuidanceResponseSchema = z.object({
  career_guidance: z.string(),
  ai_provider: z.string(),
  model: z.string(),
  timestamp: z.string(),
})
export type CareerGuidanceResponse = z.infer<typeof CareerGuidanceResponseSchema>
