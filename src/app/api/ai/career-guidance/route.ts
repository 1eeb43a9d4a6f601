import { NextRequest, NextResponse } from "next/server"

import { CareerGuidanceRequestSchema } from "@/types"
import { generateCareerGuidance } from "@/lib/ai"
import { invalidJsonResponse, readJsonBody, toErrorResponse } from "@/lib/api-errors"

export const runtime = "nodejs"

export async function POST(req: NextRequest) {
  try {
    const json = await readJsonBody(req)
    if (!json) {
      return invalidJsonResponse()
    }

    const parsed = CareerGuidanceRequestSchema.safeParse(json)
    if (!parsed.success) {
      return NextResponse.json(
        { error: "Current role and career goals are required.", details: parsed.error.format() },
        { status: 400 },
      )
    }

    const result = await generateCareerGuidance(parsed.data)

    return NextResponse.json({
      career_guidance: result.text,
      ai_provider: result.provider,
      model: result.model,
      timestamp: new Date().toISOString(),
    })
  } catch (error) {
    return toErrorResponse("api/ai/career-guidance", error, "Failed to generate career guidance.")
  }
}
