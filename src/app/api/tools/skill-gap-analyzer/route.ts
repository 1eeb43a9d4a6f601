import { NextRequest, NextResponse } from "next/server"

import { SkillGapRequestSchema } from "@/types"
import { invalidJsonResponse, readJsonBody, toErrorResponse } from "@/lib/api-errors"
import { computeSkillGap, toSkillGapResponse } from "@/lib/skill-gap"

export async function POST(req: NextRequest) {
  try {
    const json = await readJsonBody(req)
    if (!json) {
      return invalidJsonResponse()
    }

    const parsed = SkillGapRequestSchema.safeParse(json)
    if (!parsed.success) {
      return NextResponse.json({ error: "Invalid request body.", details: parsed.error.format() }, { status: 400 })
    }

    const { target_role, current_skills, experience_level } = parsed.data
    const result = computeSkillGap(target_role, current_skills, experience_level)

    return NextResponse.json(toSkillGapResponse(result))
  } catch (error) {
    return toErrorResponse("api/tools/skill-gap-analyzer", error, "Unable to analyze skill gap.")
  }
}
