import { OpenAI } from 'openai'
import type { z } from 'zod'
import type { AgentRole, AgentStage, TokenUsage } from '@deepseeker/shared'
import { getAgentTimeoutMs, getMaxOutputTokens, getModelName } from '../utils/model'
import { buildRepairInstruction, decode, type DecodeError } from './protocol-codec'
import type { RunTrace } from './run-trace'
import type { UsageTracker } from './usage-tracker'

export type AgentMessage = {
  role: 'system' | 'user' | 'assistant'
  content: string
}

export type AgentInvocation = {
  role: AgentRole
  stage: AgentStage
  messages: AgentMessage[]
  signal?: AbortSignal
}

export type AgentReply = {
  text: string
  usage: TokenUsage
}

export interface AgentInvoker {
  invoke(request: AgentInvocation): Promise<AgentReply>
}

export type AgentInvocationFailureReason = 'provider_error' | 'timeout' | 'aborted'

export class AgentInvocationError extends Error {
  constructor(
    message: string,
    public readonly reason: AgentInvocationFailureReason,
    public readonly role: AgentRole,
    public readonly stage: AgentStage,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'AgentInvocationError'
  }
}

type OpenAiAgentInvokerOptions = {
  client?: OpenAI
  models?: Partial<Record<AgentRole, string>>
  maxOutputTokens?: Partial<Record<AgentRole, number>>
  timeoutMs?: number
}

function flattenMessages(messages: AgentMessage[]): string {
  return messages.map((msg) => `${msg.role.toUpperCase()}:\n${msg.content}`).join('\n\n')
}

/** Agent invoker backed by the OpenAI Responses API. */
export class OpenAiAgentInvoker implements AgentInvoker {
  private readonly client: OpenAI
  private readonly models: Record<AgentRole, string>
  private readonly maxOutputTokens: Record<AgentRole, number>
  private readonly timeoutMs: number

  constructor(options?: OpenAiAgentInvokerOptions) {
    this.client =
      options?.client ??
      new OpenAI({
        apiKey: process.env.OPENAI_API_KEY,
        baseURL: process.env.OPENAI_BASE_URL || undefined
      })
    this.models = {
      planner: options?.models?.planner ?? getModelName('planner'),
      reader: options?.models?.reader ?? getModelName('reader')
    }
    this.maxOutputTokens = {
      planner: options?.maxOutputTokens?.planner ?? getMaxOutputTokens('planner'),
      reader: options?.maxOutputTokens?.reader ?? getMaxOutputTokens('reader')
    }
    this.timeoutMs = options?.timeoutMs ?? getAgentTimeoutMs()
  }

  async invoke(request: AgentInvocation): Promise<AgentReply> {
    const { role, stage, signal } = request
    if (signal?.aborted) {
      throw new AgentInvocationError('Agent call aborted before start', 'aborted', role, stage)
    }

    const llmPromise = this.client.responses.create(
      {
        model: this.models[role],
        input: flattenMessages(request.messages),
        max_output_tokens: this.maxOutputTokens[role]
      },
      { signal }
    )

    let timer: ReturnType<typeof setTimeout> | undefined
    const timeoutPromise = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new AgentInvocationError(`Agent call timed out after ${this.timeoutMs}ms`, 'timeout', role, stage)),
        Math.max(this.timeoutMs, 1000)
      )
    })

    try {
      const response = await Promise.race([llmPromise, timeoutPromise])
      const segments = response.output.flatMap((item) =>
        item.type === 'message' ? item.content.flatMap((part) => (part.type === 'output_text' ? [part.text] : [])) : []
      )
      const text = (response.output_text ?? '').trim() || segments.join('\n').trim()
      return {
        text,
        usage: {
          inputTokens: response.usage?.input_tokens ?? 0,
          outputTokens: response.usage?.output_tokens ?? 0
        }
      }
    } catch (error) {
      llmPromise.catch(() => undefined)
      if (error instanceof AgentInvocationError) throw error
      if (signal?.aborted) {
        throw new AgentInvocationError('Agent call aborted', 'aborted', role, stage, { cause: error })
      }
      const message = error instanceof Error ? error.message : String(error)
      throw new AgentInvocationError(`Agent provider failure: ${message}`, 'provider_error', role, stage, { cause: error })
    } finally {
      clearTimeout(timer)
    }
  }
}

export type AgentCallContext = {
  trace: RunTrace
  usage: UsageTracker
  documentId?: string
}

export type AgentStageFailure = {
  cause: 'decode' | 'provider'
  reason: string
  detail: string
  /** Raw output of every attempt that produced text, oldest first */
  rawTexts: string[]
}

export type InvokeAndDecodeResult<T> =
  | { ok: true; message: T; rawText: string; attempts: number }
  | { ok: false; failure: AgentStageFailure }

type AttemptOutcome<T> =
  | { kind: 'decoded'; message: T; rawText: string }
  | { kind: 'invalid'; error: DecodeError; rawText: string }
  | { kind: 'provider_failed'; error: AgentInvocationError }

function toInvocationError(error: unknown, request: AgentInvocation): AgentInvocationError {
  if (error instanceof AgentInvocationError) return error
  const message = error instanceof Error ? error.message : String(error)
  const reason = request.signal?.aborted ? 'aborted' : 'provider_error'
  return new AgentInvocationError(message, reason, request.role, request.stage, { cause: error })
}

async function attemptOnce<S extends z.ZodTypeAny>(
  invoker: AgentInvoker,
  request: AgentInvocation,
  schema: S,
  ctx: AgentCallContext,
  attempt: number
): Promise<AttemptOutcome<z.output<S>>> {
  const { role, stage } = request
  const started = Date.now()
  let reply: AgentReply
  try {
    reply = await invoker.invoke(request)
  } catch (error) {
    const invocationError = toInvocationError(error, request)
    ctx.trace.record({
      type: 'error',
      kind: invocationError.reason === 'aborted' ? 'cancelled' : 'agent',
      stage,
      documentId: ctx.documentId,
      reason: invocationError.reason,
      message: invocationError.message
    })
    return { kind: 'provider_failed', error: invocationError }
  }

  ctx.usage.record(stage, reply.usage)
  const decoded = decode(reply.text, schema)
  ctx.trace.record({
    type: 'agent_output',
    role,
    stage,
    attempt,
    documentId: ctx.documentId,
    raw: reply.text,
    validated: decoded.ok ? decoded.message : undefined,
    usage: reply.usage,
    durationMs: Date.now() - started
  })
  if (decoded.ok) return { kind: 'decoded', message: decoded.message, rawText: reply.text }
  return { kind: 'invalid', error: decoded.error, rawText: reply.text }
}

/**
 * One agent call plus at most one repair call. The repair turn replays the
 * invalid output and tells the agent why it was rejected.
 */
export async function invokeAndDecode<S extends z.ZodTypeAny>(
  invoker: AgentInvoker,
  request: AgentInvocation,
  schema: S,
  ctx: AgentCallContext
): Promise<InvokeAndDecodeResult<z.output<S>>> {
  const first = await attemptOnce(invoker, request, schema, ctx, 1)
  if (first.kind === 'decoded') return { ok: true, message: first.message, rawText: first.rawText, attempts: 1 }
  if (first.kind === 'provider_failed') {
    return {
      ok: false,
      failure: { cause: 'provider', reason: first.error.reason, detail: first.error.message, rawTexts: [] }
    }
  }

  recordDecodeFailure(ctx, request, first.error, 1, true)
  const repairRequest: AgentInvocation = {
    ...request,
    messages: [
      ...request.messages,
      { role: 'assistant', content: first.rawText },
      { role: 'user', content: buildRepairInstruction(first.error) }
    ]
  }

  const second = await attemptOnce(invoker, repairRequest, schema, ctx, 2)
  if (second.kind === 'decoded') return { ok: true, message: second.message, rawText: second.rawText, attempts: 2 }
  if (second.kind === 'provider_failed') {
    return {
      ok: false,
      failure: { cause: 'provider', reason: second.error.reason, detail: second.error.message, rawTexts: [first.rawText] }
    }
  }

  recordDecodeFailure(ctx, request, second.error, 2, false)
  return {
    ok: false,
    failure: {
      cause: 'decode',
      reason: second.error.reason,
      detail: second.error.detail,
      rawTexts: [first.rawText, second.rawText]
    }
  }
}

function recordDecodeFailure(
  ctx: AgentCallContext,
  request: AgentInvocation,
  error: DecodeError,
  attempt: number,
  willRepair: boolean
) {
  ctx.trace.record({
    type: 'decode_failure',
    role: request.role,
    stage: request.stage,
    attempt,
    documentId: ctx.documentId,
    reason: error.reason,
    detail: error.detail,
    willRepair
  })
}
