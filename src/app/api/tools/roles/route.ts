import { NextResponse } from "next/server"

import { ROLE_TABLE } from "@/lib/role-profiles"

export function GET() {
  return NextResponse.json({
    version: ROLE_TABLE.version,
    roles: ROLE_TABLE.roles.map((role) => ({
      id: role.id,
      label: role.label,
      core_skills: role.core,
      optional_skills: role.optional.map((skill) => skill.name),
    })),
  })
}
