import { NextRequest } from "next/server"

import { POST } from "./route"

const post = (body: unknown) =>
  POST(
    new NextRequest("http://localhost/api/ai/career-guidance", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    }),
  )

describe("POST /api/ai/career-guidance", () => {
  beforeEach(() => {
    vi.stubEnv("OPENAI_API_KEY", "")
    vi.stubEnv("OPENAI_BASE_URL", "")
    vi.stubEnv("AI_TIMEOUT_MS", "")
  })

  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it("requires both the current role and career goals", async () => {
    const res = await post({ current_role: "Analyst" })
    const body = await res.json()

    expect(res.status).toBe(400)
    expect(body.error).toBe("Current role and career goals are required.")
  })

  it("returns mock guidance when no key is configured", async () => {
    const res = await post({ current_role: " Analyst ", career_goals: "Data scientist" })
    const body = await res.json()

    expect(res.status).toBe(200)
    expect(body.career_guidance).toBe(
      "Mock career guidance: no AI provider is configured.\nCurrent role: Analyst.\nCareer goals: Data scientist.\nSet OPENAI_API_KEY for a personalized roadmap.",
    )
    expect(body.ai_provider).toBe("mock")
    expect(body.model).toBe("mock")
  })
})
