const REQUIRED_IN_PRODUCTION = ['OPENAI_API_KEY'] as const

export function missingRequiredEnv(env: NodeJS.ProcessEnv = process.env): string[] {
  return REQUIRED_IN_PRODUCTION.filter((key) => !env[key])
}
