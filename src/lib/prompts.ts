import type { ChatCompletionMessageParam } from "openai/resources/chat/completions"

import type { CareerGuidanceRequest } from "@/types"
import { normalizeFreeText } from "@/lib/normalizers"

const BASE_ADVISOR_RULES = `
- Ground every statement in what the user wrote. If information is missing, say so instead of guessing.
- Never invent employers, certifications, dates, or salary figures.
- Prefer short sections with concrete, actionable next steps.
`.trim()

export const ASSESS_SKILLS_SYSTEM_PROMPT = `
You are an expert career advisor and skills assessor.
Analyze the provided skills description and provide:
1) Skill categories and proficiency levels (1-10 scale)
2) Strengths and areas for improvement
3) Career recommendations
4) Learning path suggestions
5) Market demand insights

${BASE_ADVISOR_RULES}
`.trim()

export const CAREER_GUIDANCE_SYSTEM_PROMPT = `
You are a career guidance expert. Provide personalized career advice including:
1) Career transition roadmap
2) Skills gap analysis
3) Industry insights and trends
4) Networking recommendations
5) Timeline and milestones

${BASE_ADVISOR_RULES}
Be specific, actionable, and encouraging.
`.trim()

export const buildAssessSkillsMessages = (skillsDescription: string): ChatCompletionMessageParam[] => [
  { role: "system", content: ASSESS_SKILLS_SYSTEM_PROMPT },
  {
    role: "user",
    content: `Please assess these skills and provide detailed analysis: ${normalizeFreeText(skillsDescription)}`,
  },
]

export const buildCareerGuidanceMessages = ({
  current_role,
  career_goals,
  additional_context,
}: CareerGuidanceRequest): ChatCompletionMessageParam[] => [
  { role: "system", content: CAREER_GUIDANCE_SYSTEM_PROMPT },
  {
    role: "user",
    content: [
      `Current role: ${normalizeFreeText(current_role)}.`,
      `Career goals: ${normalizeFreeText(career_goals)}.`,
      `Additional context: ${additional_context ? normalizeFreeText(additional_context) : "None provided"}`,
    ].join(" "),
  },
]
