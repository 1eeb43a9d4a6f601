import { NextRequest, NextResponse } from "next/server"

import { AssessSkillsRequestSchema } from "@/types"
import { assessSkills } from "@/lib/ai"
import { invalidJsonResponse, readJsonBody, toErrorResponse } from "@/lib/api-errors"

export const runtime = "nodejs"

export async function POST(req: NextRequest) {
  try {
    const json = await readJsonBody(req)
    if (!json) {
      return invalidJsonResponse()
    }

    const parsed = AssessSkillsRequestSchema.safeParse(json)
    if (!parsed.success) {
      return NextResponse.json(
        { error: "Skills description is required.", details: parsed.error.format() },
        { status: 400 },
      )
    }

    const result = await assessSkills(parsed.data.skills_description)
    if (result.provider === "mock") {
      console.warn("[api/ai/assess-skills] Returning mock assessment; no AI provider configured.")
    }

    return NextResponse.json({
      assessment: result.text,
      ai_provider: result.provider,
      model: result.model,
      timestamp: new Date().toISOString(),
      tokens_used: result.tokensUsed,
    })
  } catch (error) {
    return toErrorResponse("api/ai/assess-skills", error, "Failed to assess skills.")
  }
}
