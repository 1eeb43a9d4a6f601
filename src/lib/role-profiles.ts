import rawRoleTable from "@/data/roles.json"
import { RoleTableSchema } from "@/types"
import type { RoleProfile, RoleTable } from "@/types"
import { UnknownRoleError } from "@/lib/errors"
import { normalizeRoleId } from "@/lib/normalizers"

// Parsed once at module load; the readonly schemas freeze every object and array.
export const ROLE_TABLE: RoleTable = RoleTableSchema.parse(rawRoleTable)

const ROLE_INDEX: ReadonlyMap<string, RoleProfile> = new Map(ROLE_TABLE.roles.map((role) => [role.id, role]))

export const SUPPORTED_ROLES: readonly string[] = Object.freeze(ROLE_TABLE.roles.map((role) => role.id))

export const findRoleProfile = (role: string): RoleProfile | undefined => ROLE_INDEX.get(normalizeRoleId(role))

export function getRoleProfile(role: string): RoleProfile {
  const profile = findRoleProfile(role)
  if (!profile) {
    throw new UnknownRoleError(role, SUPPORTED_ROLES)
  }
  return profile
}
