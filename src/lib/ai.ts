import OpenAI from "openai"
import type { ChatCompletion, ChatCompletionMessageParam } from "openai/resources/chat/completions"

import type { CareerGuidanceRequest } from "@/types"
import { loadConfig, providerName } from "@/lib/config"
import type { AppConfig } from "@/lib/config"
import { AiProviderError } from "@/lib/errors"
import { joinSkills, normalizeSkillText } from "@/lib/normalizers"
import { buildAssessSkillsMessages, buildCareerGuidanceMessages } from "@/lib/prompts"

export type AiTextResult = {
  text: string
  provider: string
  model: string
  tokensUsed: number | null
}

type CompletionRequest = {
  messages: ChatCompletionMessageParam[]
  maxTokens: number
  buildMockText: () => string
}

const TEMPERATURE = 0.7

export const createAiClient = (config: AppConfig & { openaiApiKey: string }) =>
  new OpenAI({
    apiKey: config.openaiApiKey,
    baseURL: config.openaiBaseUrl,
    timeout: config.aiTimeoutMs,
  })

async function completeText(
  { messages, maxTokens, buildMockText }: CompletionRequest,
  config: AppConfig,
): Promise<AiTextResult> {
  const apiKey = config.openaiApiKey
  if (!apiKey) {
    return { text: buildMockText(), provider: providerName(config), model: "mock", tokensUsed: null }
  }

  const client = createAiClient({ ...config, openaiApiKey: apiKey })

  let completion: ChatCompletion
  try {
    completion = await client.chat.completions.create({
      model: config.model,
      messages,
      temperature: TEMPERATURE,
      max_tokens: maxTokens,
    })
  } catch (error) {
    throw new AiProviderError(
      `AI provider call failed: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    )
  }

  const content = completion.choices[0]?.message?.content?.trim()
  if (!content) {
    throw new AiProviderError("No content returned from the AI provider.")
  }

  return {
    text: content,
    provider: providerName(config),
    model: completion.model || config.model,
    tokensUsed: completion.usage?.total_tokens ?? null,
  }
}

export const assessSkills = (skillsDescription: string, config: AppConfig = loadConfig()) =>
  completeText(
    {
      messages: buildAssessSkillsMessages(skillsDescription),
      maxTokens: 800,
      buildMockText: () => {
        const skills = normalizeSkillText(skillsDescription)
        return [
          "Mock assessment: no AI provider is configured.",
          `Skills mentioned: ${skills.length > 0 ? joinSkills(skills) : "none"}.`,
          "Set OPENAI_API_KEY for a full assessment.",
        ].join("\n")
      },
    },
    config,
  )

export const generateCareerGuidance = (request: CareerGuidanceRequest, config: AppConfig = loadConfig()) =>
  completeText(
    {
      messages: buildCareerGuidanceMessages(request),
      maxTokens: 600,
      buildMockText: () =>
        [
          "Mock career guidance: no AI provider is configured.",
          `Current role: ${request.current_role}.`,
          `Career goals: ${request.career_goals}.`,
          "Set OPENAI_API_KEY for a personalized roadmap.",
        ].join("\n"),
    },
    config,
  )
