import { NextRequest, NextResponse } from "next/server"

import { AiProviderError, UnknownRoleError } from "@/lib/errors"

export const INVALID_JSON = "Invalid JSON payload."

export const readJsonBody = (req: NextRequest): Promise<unknown> => req.json().catch(() => null)

export const invalidJsonResponse = () => NextResponse.json({ error: INVALID_JSON }, { status: 400 })

export const unknownRoleResponse = (error: UnknownRoleError) =>
  NextResponse.json(
    { error: error.message, details: { target_role: error.role, supported_roles: error.supportedRoles } },
    { status: 400 },
  )

/** Maps a thrown error to the JSON error response for `route`, logging anything unexpected. */
export function toErrorResponse(route: string, error: unknown, fallbackMessage: string) {
  if (error instanceof UnknownRoleError) {
    return unknownRoleResponse(error)
  }

  if (error instanceof AiProviderError) {
    console.error(`[${route}] provider error`, error)
    return NextResponse.json({ error: fallbackMessage, details: error.message }, { status: 502 })
  }

  console.error(`[${route}] error`, error)
  return NextResponse.json(
    { error: fallbackMessage, details: error instanceof Error ? error.message : error },
    { status: 500 },
  )
}
