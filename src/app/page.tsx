"use client"

import { useState } from "react"
import { useForm } from "react-hook-form"
import { zodResolver } from "@hookform/resolvers/zod"
import { z } from "zod"
import {
  Button,
  Card,
  CardContent,
  CardDescription,
  CardHeader,
  CardTitle,
  Input,
  Label,
  Select,
  Textarea,
  ThemeToggle,
} from "@/components/ui"
import {
  CareerGuidanceResponseSchema,
  EXPERIENCE_LEVELS,
  ExperienceLevelSchema,
  SalaryResponseSchema,
  SkillGapResponseSchema,
} from "@/types"
import type { CareerGuidanceResponse, SalaryResponse, SkillGapResponse } from "@/types"
import { postJson } from "@/lib/client/api"
import { ROLE_TABLE } from "@/lib/role-profiles"

const analyzerFormSchema = z.object({
  targetRole: z.string().min(1, "Pick a target role."),
  currentSkills: z.string().max(2000, "Keep it under 2000 characters."),
  experienceLevel: ExperienceLevelSchema,
})

type AnalyzerFormValues = z.infer<typeof analyzerFormSchema>

const guidanceFormSchema = z.object({
  currentRole: z.string().trim().min(1, "Current role is required."),
  careerGoals: z.string().trim().min(1, "Career goals are required."),
  additionalContext: z.string().max(2000, "Keep it under 2000 characters.").optional(),
})

type GuidanceFormValues = z.infer<typeof guidanceFormSchema>

const currency = (value: number, code: string) =>
  new Intl.NumberFormat("en-US", { style: "currency", currency: code, maximumFractionDigits: 0 }).format(value)

const scoreTone = (score: number) => {
  if (score >= 70) return "text-emerald-600 dark:text-emerald-400"
  if (score >= 40) return "text-amber-600 dark:text-amber-400"
  return "text-rose-600 dark:text-rose-400"
}

const SkillList = ({ title, skills, empty }: { title: string; skills: string[]; empty: string }) => (
  <div className="space-y-2">
    <h4 className="text-sm font-semibold">{title}</h4>
    {skills.length > 0 ? (
      <ul className="flex flex-wrap gap-2">
        {skills.map((skill) => (
          <li key={skill} className="rounded-full border border-slate-300 px-3 py-1 text-xs dark:border-slate-700">
            {skill}
          </li>
        ))}
      </ul>
    ) : (
      <p className="text-xs text-slate-500">{empty}</p>
    )}
  </div>
)

export default function Home() {
  const [analysisLoading, setAnalysisLoading] = useState(false)
  const [analysisError, setAnalysisError] = useState<string | null>(null)
  const [skillGap, setSkillGap] = useState<SkillGapResponse | null>(null)
  const [salary, setSalary] = useState<SalaryResponse | null>(null)
  const [guidanceLoading, setGuidanceLoading] = useState(false)
  const [guidanceError, setGuidanceError] = useState<string | null>(null)
  const [guidance, setGuidance] = useState<CareerGuidanceResponse | null>(null)

  const analyzerForm = useForm<AnalyzerFormValues>({
    resolver: zodResolver(analyzerFormSchema),
    defaultValues: {
      targetRole: ROLE_TABLE.roles[0]?.id ?? "",
      currentSkills: "",
      experienceLevel: "beginner",
    },
  })

  const guidanceForm = useForm<GuidanceFormValues>({
    resolver: zodResolver(guidanceFormSchema),
    defaultValues: { currentRole: "", careerGoals: "", additionalContext: "" },
  })

  const onAnalyze = analyzerForm.handleSubmit(async (values) => {
    setAnalysisLoading(true)
    setAnalysisError(null)

    try {
      const [gap, estimate] = await Promise.all([
        postJson(
          "/api/tools/skill-gap-analyzer",
          {
            target_role: values.targetRole,
            current_skills: values.currentSkills,
            experience_level: values.experienceLevel,
          },
          SkillGapResponseSchema,
        ),
        postJson(
          "/api/tools/salary-calculator",
          { target_role: values.targetRole, experience_level: values.experienceLevel },
          SalaryResponseSchema,
        ),
      ])
      setSkillGap(gap)
      setSalary(estimate)
    } catch (error) {
      setSkillGap(null)
      setSalary(null)
      setAnalysisError(error instanceof Error ? error.message : "Unexpected error while analyzing skills.")
    } finally {
      setAnalysisLoading(false)
    }
  })

  const onRequestGuidance = guidanceForm.handleSubmit(async (values) => {
    setGuidanceLoading(true)
    setGuidanceError(null)

    try {
      const result = await postJson(
        "/api/ai/career-guidance",
        {
          current_role: values.currentRole,
          career_goals: values.careerGoals,
          additional_context: values.additionalContext?.trim() || undefined,
        },
        CareerGuidanceResponseSchema,
      )
      setGuidance(result)
    } catch (error) {
      setGuidanceError(error instanceof Error ? error.message : "Unexpected error while generating guidance.")
    } finally {
      setGuidanceLoading(false)
    }
  })

  const analyzerErrors = analyzerForm.formState.errors
  const guidanceErrors = guidanceForm.formState.errors

  return (
    <main className="mx-auto flex min-h-screen max-w-5xl flex-col gap-8 px-6 py-10">
      <header className="flex items-start justify-between gap-4">
        <div className="space-y-1">
          <h1 className="text-3xl font-bold tracking-tight">SkillSync</h1>
          <p className="text-sm text-slate-500 dark:text-slate-400">
            Compare your skills with a target role, see where the gaps are, and check the salary range.
          </p>
        </div>
        <ThemeToggle />
      </header>

      <div className="grid gap-6 md:grid-cols-2">
        <Card>
          <CardHeader>
            <CardTitle>Skill-gap analyzer</CardTitle>
            <CardDescription>Skills are matched exactly after trimming and ignoring case.</CardDescription>
          </CardHeader>
          <CardContent>
            <form className="space-y-4" onSubmit={onAnalyze} noValidate>
              <div className="space-y-2">
                <Label htmlFor="targetRole">Target role</Label>
                <Select id="targetRole" {...analyzerForm.register("targetRole")}>
                  {ROLE_TABLE.roles.map((role) => (
                    <option key={role.id} value={role.id}>
                      {role.label}
                    </option>
                  ))}
                </Select>
                {analyzerErrors.targetRole && <p className="text-xs text-rose-600">{analyzerErrors.targetRole.message}</p>}
              </div>

              <div className="space-y-2">
                <Label htmlFor="currentSkills">Current skills</Label>
                <Input id="currentSkills" placeholder="Python, SQL, Git" {...analyzerForm.register("currentSkills")} />
                {analyzerErrors.currentSkills && (
                  <p className="text-xs text-rose-600">{analyzerErrors.currentSkills.message}</p>
                )}
              </div>

              <div className="space-y-2">
                <Label htmlFor="experienceLevel">Experience level</Label>
                <Select id="experienceLevel" {...analyzerForm.register("experienceLevel")}>
                  {EXPERIENCE_LEVELS.map((level) => (
                    <option key={level} value={level}>
                      {level}
                    </option>
                  ))}
                </Select>
              </div>

              <Button type="submit" disabled={analysisLoading}>
                {analysisLoading ? "Analyzing..." : "Analyze"}
              </Button>
              {analysisError && <p className="text-sm text-rose-600">{analysisError}</p>}
            </form>
          </CardContent>
        </Card>

        <Card>
          <CardHeader>
            <CardTitle>Results</CardTitle>
            <CardDescription>Match score covers the role&apos;s core skills only.</CardDescription>
          </CardHeader>
          <CardContent className="space-y-5">
            {skillGap ? (
              <>
                <p className={`text-4xl font-bold ${scoreTone(skillGap.match_score)}`}>{skillGap.match_score}%</p>
                <SkillList title="Matching" skills={skillGap.matching_skills} empty="No matching skills yet." />
                <SkillList title="Missing" skills={skillGap.missing_skills} empty="Every core skill is covered." />
                <SkillList title="Learn next" skills={skillGap.suggested_skills} empty="Nothing left to suggest." />
              </>
            ) : (
              <p className="text-sm text-slate-500">Run the analyzer to see your match.</p>
            )}
            {salary && (
              <div className="rounded-lg border border-slate-200 p-4 text-sm dark:border-slate-800">
                <p className="font-semibold">Estimated salary ({salary.experience_level})</p>
                <p>
                  {currency(salary.min, salary.currency)} to {currency(salary.max, salary.currency)}, median{" "}
                  {currency(salary.median, salary.currency)}
                </p>
              </div>
            )}
          </CardContent>
        </Card>
      </div>

      <Card>
        <CardHeader>
          <CardTitle>Career guidance</CardTitle>
          <CardDescription>Describe where you are and where you want to go.</CardDescription>
        </CardHeader>
        <CardContent>
          <form className="space-y-4" onSubmit={onRequestGuidance} noValidate>
            <div className="grid gap-4 md:grid-cols-2">
              <div className="space-y-2">
                <Label htmlFor="currentRole">Current role</Label>
                <Input id="currentRole" {...guidanceForm.register("currentRole")} />
                {guidanceErrors.currentRole && <p className="text-xs text-rose-600">{guidanceErrors.currentRole.message}</p>}
              </div>
              <div className="space-y-2">
                <Label htmlFor="careerGoals">Career goals</Label>
                <Input id="careerGoals" {...guidanceForm.register("careerGoals")} />
                {guidanceErrors.careerGoals && <p className="text-xs text-rose-600">{guidanceErrors.careerGoals.message}</p>}
              </div>
            </div>
            <div className="space-y-2">
              <Label htmlFor="additionalContext">Additional context</Label>
              <Textarea id="additionalContext" {...guidanceForm.register("additionalContext")} />
              {guidanceErrors.additionalContext && (
                <p className="text-xs text-rose-600">{guidanceErrors.additionalContext.message}</p>
              )}
            </div>
            <Button type="submit" variant="outline" disabled={guidanceLoading}>
              {guidanceLoading ? "Thinking..." : "Get guidance"}
            </Button>
            {guidanceError && <p className="text-sm text-rose-600">{guidanceError}</p>}
          </form>
          {guidance && (
            <div className="mt-6 space-y-2">
              <p className="text-xs text-slate-500">
                {guidance.ai_provider} · {guidance.model}
              </p>
              <p className="whitespace-pre-wrap text-sm leading-relaxed">{guidance.career_guidance}</p>
            </div>
          )}
        </CardContent>
      </Card>
    </main>
  )
}
