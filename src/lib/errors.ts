export class UnknownRoleError extends Error {
  readonly role: string
  readonly supportedRoles: readonly string[]

  constructor(role: string, supportedRoles: readonly string[]) {
    super(`Unknown target role: ${role}`)
    this.name = "UnknownRoleError"
    this.role = role
    this.supportedRoles = supportedRoles
  }
}

/** Raised when the chat-completions provider fails or returns nothing usable. */
export class AiProviderError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = "AiProviderError"
  }
}
