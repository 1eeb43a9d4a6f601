import OpenAI from "openai"

import { assessSkills, generateCareerGuidance } from "./ai"
import type { AppConfig } from "./config"
import { AiProviderError } from "./errors"

const createCompletion = vi.hoisted(() => vi.fn())

vi.mock("openai", () => ({
  default: vi.fn(function OpenAI() {
    return { chat: { completions: { create: createCompletion } } }
  }),
}))

const MOCK_CONFIG: AppConfig = { model: "gpt-4o-mini", aiTimeoutMs: 30000 }

const PROVIDER_CONFIG: AppConfig = {
  openaiApiKey: "test-key",
  openaiBaseUrl: "https://api.x.ai/v1",
  model: "grok-beta",
  aiTimeoutMs: 30000,
}

const completion = (content: string | null) => ({
  model: "grok-beta",
  choices: [{ message: { role: "assistant", content } }],
  usage: { total_tokens: 42 },
})

describe("assessSkills", () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it("returns a mock assessment without calling the provider when no key is configured", async () => {
    const result = await assessSkills("Python, SQL, python", MOCK_CONFIG)

    expect(result).toEqual({
      text: "Mock assessment: no AI provider is configured.\nSkills mentioned: python, sql.\nSet OPENAI_API_KEY for a full assessment.",
      provider: "mock",
      model: "mock",
      tokensUsed: null,
    })
    expect(OpenAI).not.toHaveBeenCalled()
  })

  it("calls the configured provider and trims the completion", async () => {
    createCompletion.mockResolvedValue(completion("  Strong SQL foundation.  "))

    const result = await assessSkills("SQL", PROVIDER_CONFIG)

    expect(result).toEqual({ text: "Strong SQL foundation.", provider: "api.x.ai", model: "grok-beta", tokensUsed: 42 })
    expect(OpenAI).toHaveBeenCalledWith({ apiKey: "test-key", baseURL: "https://api.x.ai/v1", timeout: 30000 })
    expect(createCompletion).toHaveBeenCalledWith(
      expect.objectContaining({ model: "grok-beta", temperature: 0.7, max_tokens: 800 }),
    )
  })

  it("raises AiProviderError when the completion is empty", async () => {
    createCompletion.mockResolvedValue(completion(null))

    await expect(assessSkills("SQL", PROVIDER_CONFIG)).rejects.toThrow(
      new AiProviderError("No content returned from the AI provider."),
    )
  })

  it("wraps provider failures in AiProviderError", async () => {
    createCompletion.mockRejectedValue(new Error("upstream down"))

    await expect(assessSkills("SQL", PROVIDER_CONFIG)).rejects.toBeInstanceOf(AiProviderError)
    await expect(assessSkills("SQL", PROVIDER_CONFIG)).rejects.toThrow("AI provider call failed: upstream down")
  })
})

describe("generateCareerGuidance", () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it("returns mock guidance when no key is configured", async () => {
    const result = await generateCareerGuidance(
      { current_role: "Analyst", career_goals: "Data scientist" },
      MOCK_CONFIG,
    )

    expect(result.text).toBe(
      "Mock career guidance: no AI provider is configured.\nCurrent role: Analyst.\nCareer goals: Data scientist.\nSet OPENAI_API_KEY for a personalized roadmap.",
    )
    expect(result.provider).toBe("mock")
  })

  it("sends the role, goals and a placeholder for missing context", async () => {
    createCompletion.mockResolvedValue(completion("Start with statistics."))

    await generateCareerGuidance({ current_role: "Analyst", career_goals: "Become a data scientist" }, PROVIDER_CONFIG)

    expect(createCompletion).toHaveBeenCalledTimes(1)
    const request = createCompletion.mock.calls[0]?.[0]
    expect(request.max_tokens).toBe(600)
    expect(request.messages[1]).toEqual({
      role: "user",
      content: "Current role: Analyst. Career goals: Become a data scientist. Additional context: None provided",
    })
  })
})
