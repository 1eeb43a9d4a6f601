import { NextRequest, NextResponse } from "next/server"

import { SalaryRequestSchema } from "@/types"
import { invalidJsonResponse, readJsonBody, toErrorResponse } from "@/lib/api-errors"
import { estimateSalary, toSalaryResponse } from "@/lib/salary"

export async function POST(req: NextRequest) {
  try {
    const json = await readJsonBody(req)
    if (!json) {
      return invalidJsonResponse()
    }

    const parsed = SalaryRequestSchema.safeParse(json)
    if (!parsed.success) {
      return NextResponse.json({ error: "Invalid request body.", details: parsed.error.format() }, { status: 400 })
    }

    const estimate = estimateSalary(parsed.data.target_role, parsed.data.experience_level)
    return NextResponse.json(toSalaryResponse(estimate))
  } catch (error) {
    return toErrorResponse("api/tools/salary-calculator", error, "Unable to estimate salary.")
  }
}
