import { NextResponse } from "next/server"

import { toErrorResponse } from "@/lib/api-errors"
import { loadConfig } from "@/lib/config"

export const dynamic = "force-dynamic"

export function GET() {
  try {
    const config = loadConfig()
    return NextResponse.json({
      status: "healthy",
      timestamp: new Date().toISOString(),
      ai_status: config.openaiApiKey ? "ready" : "api key required",
    })
  } catch (error) {
    return toErrorResponse("api/health", error, "Health check failed.")
  }
}
